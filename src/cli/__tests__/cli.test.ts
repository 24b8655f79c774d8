/**
 * Tests for command-line parsing and the convert and batch commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { main, parseArgs } from '../index';
import { outputPathFor } from '../commands/batch';
import { buildConvertOptions } from '../commands/convert';
import { DEFAULT_SETTINGS } from '../settings';
import { configureLogging, resetLogging } from '../../utils/logger';

describe('parseArgs', () => {
    it('treats arguments without a command as convert', () => {
        expect(parseArgs(['--contents', '-n', '-s', 'page', 'in.pod', 'out.th'])).toEqual({
            command: 'convert',
            subcommand: 'in.pod',
            args: ['in.pod', 'out.th'],
            flags: { contents: true, navbar: true, style: 'page' },
        });
    });

    it('parses named commands and --flag=value', () => {
        expect(parseArgs(['batch', 'docs', '--output=site'])).toEqual({
            command: 'batch',
            subcommand: 'docs',
            args: ['docs'],
            flags: { output: 'site' },
        });
    });

    it('keeps - as a positional argument', () => {
        expect(parseArgs(['-', 'out.th']).args).toEqual(['-', 'out.th']);
    });

    it('marks a value flag without a value as set', () => {
        expect(parseArgs(['--title']).flags).toEqual({ title: true });
    });

    it('reads from standard input when given nothing', () => {
        expect(parseArgs([])).toEqual({ command: 'convert', subcommand: undefined, args: [], flags: {} });
    });
});

describe('buildConvertOptions', () => {
    it('falls back to settings for flags that are not given', () => {
        const settings = { ...DEFAULT_SETTINGS, navbar: true, style: 'site' };
        expect(buildConvertOptions(parseArgs(['-c', '-t', 'Manual']), settings)).toEqual({
            contents: true,
            navbar: true,
            style: 'site',
            title: 'Manual',
            id: undefined,
        });
    });

    it('leaves the style unset when neither flag nor setting gives one', () => {
        expect(buildConvertOptions(parseArgs([]), DEFAULT_SETTINGS).style).toBeUndefined();
    });
});

describe('outputPathFor', () => {
    it('places output beside the source', () => {
        expect(outputPathFor(path.join('/r', 'sub', 'x.pm'), '/r', '.th')).toBe(path.join('/r', 'sub', 'x.th'));
    });

    it('mirrors the source tree under an output directory', () => {
        expect(outputPathFor(path.join('/r', 'sub', 'x.pm'), '/r', '.th', '/o')).toBe(path.join('/o', 'sub', 'x.th'));
    });
});

describe('main', () => {
    let tempDir: string;
    let logged: unknown[][];
    let errors: unknown[][];

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pod-thread-cli-'));
        logged = [];
        errors = [];
        vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
            logged.push(args);
        });
        vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
            errors.push(args);
        });
        configureLogging({ sink: () => undefined });
    });

    afterEach(() => {
        fs.rmSync(tempDir, { recursive: true, force: true });
        vi.restoreAllMocks();
        resetLogging();
    });

    function writePod(relative: string, content: string): string {
        const file = path.join(tempDir, relative);
        fs.mkdirSync(path.dirname(file), { recursive: true });
        fs.writeFileSync(file, content);
        return file;
    }

    it('prints help', () => {
        expect(main(['help'])).toBe(0);
        expect(main(['--help'])).toBe(0);
        expect(logged).toHaveLength(2);
    });

    it('converts a file with the given flags', () => {
        const input = writePod('doc.pod', '=head1 NAME\n\ndoc - A document\n\n=head1 USE\n\nText.\n');
        const output = path.join(tempDir, 'doc.th');
        expect(main(['--navbar', '--style', 'plain', input, output])).toBe(0);
        expect(fs.readFileSync(output, 'utf-8')).toBe(
            '\\heading[doc][plain]\n\n\\h1[doc]\n\n\\p(subhead)[(A document)]\n\n'
            + '\\div(navbar)[\n  \\link[#S1][Use]\n]\n\n'
            + '\\h2(#S1)[USE]\n\nText.\n\n\\signature\n'
        );
    });

    it('reports errors and fails', () => {
        const missing = path.join(tempDir, 'missing.pod');
        expect(main(['convert', missing, path.join(tempDir, 'out.th')])).toBe(1);
        expect(errors).toContainEqual(['Error:', expect.stringContaining(`Can't read ${missing}`)]);
    });

    it('fails on syntax errors after writing the output', () => {
        const input = writePod('bad.pod', '=pod\n\nB<open\n');
        const output = path.join(tempDir, 'bad.th');
        expect(main([input, output])).toBe(1);
        expect(fs.readFileSync(output, 'utf-8')).toBe('\\bold[open]\n\n\\signature\n');
        expect(errors).toContainEqual(['Error:', expect.stringContaining('had 1 POD syntax error')]);
    });

    it('rejects extra arguments', () => {
        expect(main(['convert', 'a', 'b', 'c'])).toBe(1);
        expect(errors).toEqual([['Usage: pod2thread convert [options] [input [output]]']]);
    });

    it('converts a directory in place', () => {
        writePod('lib/A.pm', '=pod\n\nA.\n');
        writePod('lib/sub/B.pod', '=pod\n\nB.\n');
        writePod('lib/node_modules/C.pod', '=pod\n\nC.\n');

        expect(main(['batch', path.join(tempDir, 'lib')])).toBe(0);
        expect(fs.readFileSync(path.join(tempDir, 'lib', 'A.th'), 'utf-8')).toBe('A.\n\n\\signature\n');
        expect(fs.readFileSync(path.join(tempDir, 'lib', 'sub', 'B.th'), 'utf-8')).toBe('B.\n\n\\signature\n');
        expect(fs.existsSync(path.join(tempDir, 'lib', 'node_modules', 'C.th'))).toBe(false);
        expect(logged[logged.length - 1]).toEqual(['Converted 2 of 2 files']);
    });

    it('converts a directory into an output directory and reports failures', () => {
        writePod('lib/Good.pod', '=pod\n\nGood.\n');
        writePod('lib/Bad.pod', '=pod\n\nI<open\n');
        const out = path.join(tempDir, 'site');

        expect(main(['batch', path.join(tempDir, 'lib'), '-o', out])).toBe(1);
        expect(fs.readFileSync(path.join(out, 'Good.th'), 'utf-8')).toBe('Good.\n\n\\signature\n');
        expect(logged[logged.length - 1]).toEqual(['Converted 1 of 2 files']);
    });

    it('requires a directory for batch', () => {
        expect(main(['batch'])).toBe(1);
        expect(main(['batch', path.join(tempDir, 'nope')])).toBe(1);
    });
});
