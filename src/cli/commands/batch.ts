/**
 * Batch command - convert every POD file under a directory
 */

import * as fs from 'fs';
import * as path from 'path';
import { convertFile } from '../../parser/threadConvert';
import { cliLogger } from '../../utils/logger';
import { findPodFiles } from '../settings';
import type { Pod2ThreadSettings } from '../settings';
import { buildConvertOptions, stringFlag } from './convert';
import type { ParsedArgs } from './convert';

/**
 * Output path for a source file: beside it, or mirrored under the output
 * directory, with the output extension
 */
export function outputPathFor(
    file: string,
    root: string,
    outputExtension: string,
    outputDir?: string
): string {
    const parsed = path.parse(file);
    const renamed = path.join(parsed.dir, parsed.name + outputExtension);
    if (!outputDir) {
        return renamed;
    }
    return path.join(path.resolve(outputDir), path.relative(root, renamed));
}

export function batchCommand(args: ParsedArgs, settings: Pod2ThreadSettings): number {
    const dir = args.args[0];
    if (!dir) {
        console.error('Usage: pod2thread batch <directory> [--output DIR] [options]');
        return 1;
    }

    const root = path.resolve(dir);
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
        console.error(`Not a directory: ${root}`);
        return 1;
    }

    const outputDir = stringFlag(args.flags, 'output');
    const options = buildConvertOptions(args, settings);
    const files = findPodFiles(root, settings.exclude, settings.extensions);
    if (files.length === 0) {
        console.log(`No POD files found in ${root}`);
        return 0;
    }

    let failures = 0;
    for (const file of files) {
        const relative = path.relative(root, file);
        const target = outputPathFor(file, root, settings.outputExtension, outputDir);
        try {
            fs.mkdirSync(path.dirname(target), { recursive: true });
            convertFile(file, target, { ...options, file: relative });
            console.log(`${relative} -> ${target}`);
        } catch (error) {
            failures++;
            cliLogger.error(
                `Failed to convert ${relative}: ${error instanceof Error ? error.message : String(error)}`,
                error instanceof Error ? error : undefined
            );
        }
    }

    console.log(`Converted ${files.length - failures} of ${files.length} files`);
    return failures > 0 ? 1 : 0;
}
