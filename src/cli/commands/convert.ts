/**
 * Convert command - convert one POD file to thread
 *
 * Reads standard input and writes standard output unless paths are given.
 * `-` also names standard input or output.
 */

import { convertFile } from '../../parser/threadConvert';
import type { ConvertOptions } from '../../parser/threadConvert';
import type { Pod2ThreadSettings } from '../settings';

export interface ParsedArgs {
    command: string;
    subcommand?: string;
    args: string[];
    flags: Record<string, string | boolean>;
}

/**
 * Read a string-valued flag; a flag given without a value counts as unset
 */
export function stringFlag(flags: Record<string, string | boolean>, name: string): string | undefined {
    const value = flags[name];
    return typeof value === 'string' ? value : undefined;
}

/**
 * Conversion options from the command-line flags, falling back to settings
 */
export function buildConvertOptions(args: ParsedArgs, settings: Pod2ThreadSettings): ConvertOptions {
    const style = stringFlag(args.flags, 'style') ?? settings.style;
    return {
        contents: args.flags.contents === true || settings.contents,
        navbar: args.flags.navbar === true || settings.navbar,
        style: style || undefined,
        title: stringFlag(args.flags, 'title'),
        id: stringFlag(args.flags, 'id'),
    };
}

export function convertCommand(args: ParsedArgs, settings: Pod2ThreadSettings): number {
    if (args.args.length > 2) {
        console.error('Usage: pod2thread convert [options] [input [output]]');
        return 1;
    }

    const [input, output] = args.args;
    convertFile(
        input === undefined || input === '-' ? 0 : input,
        output === undefined || output === '-' ? 1 : output,
        buildConvertOptions(args, settings)
    );
    return 0;
}
