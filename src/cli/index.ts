#!/usr/bin/env node
/**
 * pod2thread CLI - Command-line interface for POD to thread conversion
 *
 * Usage:
 *   pod2thread [convert] [options] [input [output]]
 *   pod2thread batch <directory> [--output DIR] [options]
 *   pod2thread help
 */

import { batchCommand } from './commands/batch';
import { convertCommand } from './commands/convert';
import type { ParsedArgs } from './commands/convert';
import { loadSettings } from './settings';
import { configureLogging } from '../utils/logger';

const COMMANDS = new Set(['convert', 'batch', 'help']);

/** Flags that take a value */
const VALUE_FLAGS = new Set(['style', 'title', 'id', 'output', 'log-level']);

const ALIASES: Record<string, string> = {
    c: 'contents',
    n: 'navbar',
    s: 'style',
    t: 'title',
    o: 'output',
    h: 'help',
};

/**
 * Parse command-line arguments into structured format.
 * Without a command name, the arguments are those of convert.
 */
export function parseArgs(args: string[]): ParsedArgs {
    const flags: Record<string, string | boolean> = {};
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith('-') && arg !== '-') {
            let key = arg.replace(/^--?/, '');
            let value: string | undefined;
            const eq = key.indexOf('=');
            if (arg.startsWith('--') && eq >= 0) {
                value = key.slice(eq + 1);
                key = key.slice(0, eq);
            }
            key = ALIASES[key] ?? key;

            if (VALUE_FLAGS.has(key)) {
                if (value === undefined && i + 1 < args.length) {
                    value = args[++i];
                }
                flags[key] = value ?? true;
            } else {
                flags[key] = true;
            }
        } else {
            positional.push(arg);
        }
    }

    if (positional.length > 0 && COMMANDS.has(positional[0])) {
        return {
            command: positional[0],
            subcommand: positional[1],
            args: positional.slice(1),
            flags,
        };
    }
    return {
        command: 'convert',
        subcommand: positional[0],
        args: positional,
        flags,
    };
}

function printHelp(): void {
    console.log(`
pod2thread - Convert POD documentation to thread

USAGE:
    pod2thread [convert] [options] [input [output]]
    pod2thread batch <directory> [options]

COMMANDS:
    convert                 Convert one file (standard input/output by default)
    batch <directory>       Convert every POD file under a directory
    help                    Show this help message

EXAMPLES:
    pod2thread lib/Module.pm module.th
    pod2thread --contents --navbar -s page < doc.pod > doc.th
    pod2thread batch docs --output site

OPTIONS:
    --contents, -c          Add a table of contents
    --navbar, -n            Add a navigation bar
    --style, -s <name>      Style sheet for the page
    --title, -t <title>     Page title (instead of the NAME section)
    --id <id>               Document identifier
    --output, -o <dir>      Output directory for batch
    --log-level <level>     debug, info, warn or error
    --help, -h              Show this help message

Settings are read from the nearest .pod2thread.json.
`);
}

/**
 * Run the CLI
 * @returns Exit status
 */
export function main(argv: string[]): number {
    const args = parseArgs(argv);

    if (args.flags.help || args.command === 'help') {
        printHelp();
        return 0;
    }

    try {
        const settings = loadSettings();
        const logLevel = typeof args.flags['log-level'] === 'string' ? args.flags['log-level'] : settings.logLevel;
        if (logLevel !== undefined) {
            configureLogging({ level: logLevel });
        }

        switch (args.command) {
            case 'batch':
                return batchCommand(args, settings);
            case 'convert':
            default:
                return convertCommand(args, settings);
        }
    } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        return 1;
    }
}

if (require.main === module) {
    process.exit(main(process.argv.slice(2)));
}
