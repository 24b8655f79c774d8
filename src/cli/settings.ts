/**
 * CLI Settings - Read .pod2thread.json for CLI operations
 *
 * The nearest settings file from the working directory upwards supplies
 * defaults for the conversion flags and for batch file discovery.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { minimatch } from 'minimatch';
import { cliLogger } from '../utils/logger';

export const SETTINGS_FILENAME = '.pod2thread.json';

/**
 * All pod2thread settings
 */
export interface Pod2ThreadSettings {
    /** Default for --contents */
    contents: boolean;
    /** Default for --navbar */
    navbar: boolean;
    /** Default for --style */
    style: string;
    /** File extensions converted by batch */
    extensions: string[];
    /** Extension given to batch output files */
    outputExtension: string;
    /** Glob patterns skipped by batch */
    exclude: string[];
    logLevel?: string;
}

export const DEFAULT_SETTINGS: Readonly<Pod2ThreadSettings> = Object.freeze({
    contents: false,
    navbar: false,
    style: '',
    extensions: ['.pod', '.pm', '.pl'],
    outputExtension: '.th',
    exclude: [
        '**/node_modules/**',
        '**/.git/**',
        '**/blib/**'
    ],
});

/**
 * Find the nearest settings file, starting at a directory and walking up
 */
export function findSettingsFile(startDir: string = process.cwd()): string | undefined {
    let dir = path.resolve(startDir);
    for (;;) {
        const candidate = path.join(dir, SETTINGS_FILENAME);
        if (fs.existsSync(candidate)) {
            return candidate;
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            return undefined;
        }
        dir = parent;
    }
}

/**
 * Read a settings file. A missing or malformed file gives no settings.
 */
function readSettingsFile(settingsPath: string): Record<string, unknown> {
    try {
        const parsed: unknown = JSON.parse(fs.readFileSync(settingsPath, 'utf-8'));
        if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
            return { ...parsed };
        }
        cliLogger.warn(`Ignoring ${settingsPath}: expected a JSON object`);
    } catch (err) {
        cliLogger.warn(`Failed to read ${settingsPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
    return {};
}

/**
 * Expand ~ to home directory in path
 */
export function expandPath(p: string): string {
    if (p.startsWith('~')) {
        return p.replace(/^~/, os.homedir());
    }
    return p;
}

/**
 * Check if a file path should be excluded based on patterns.
 * Glob patterns are matched with minimatch; other patterns are paths whose
 * contents are all excluded.
 */
export function shouldExclude(filePath: string, excludePatterns: string[]): boolean {
    for (const pattern of excludePatterns) {
        const expandedPattern = expandPath(pattern);

        if (pattern.includes('*')) {
            if (minimatch(filePath, expandedPattern, { matchBase: true })) {
                return true;
            }
        } else {
            const resolved = path.resolve(expandedPattern);
            if (filePath === resolved || filePath.startsWith(resolved + path.sep)) {
                return true;
            }
        }
    }
    return false;
}

// =============================================================================
// Typed Setting Access
// =============================================================================

function getBoolean(settings: Record<string, unknown>, key: string, defaultValue: boolean): boolean {
    const value = settings[key];
    return typeof value === 'boolean' ? value : defaultValue;
}

function getString(settings: Record<string, unknown>, key: string, defaultValue: string): string {
    const value = settings[key];
    return typeof value === 'string' ? value : defaultValue;
}

function getStringArray(settings: Record<string, unknown>, key: string, defaultValue: string[]): string[] {
    const value = settings[key];
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
        return value;
    }
    return [...defaultValue];
}

/**
 * Load settings from the nearest .pod2thread.json, with defaults for
 * anything it leaves out or gets the type of wrong
 */
export function loadSettings(startDir: string = process.cwd()): Pod2ThreadSettings {
    const settingsPath = findSettingsFile(startDir);
    const settings = settingsPath ? readSettingsFile(settingsPath) : {};
    if (settingsPath) {
        cliLogger.debug('Loaded settings', { path: settingsPath });
    }

    const logLevel = settings['logLevel'];
    return {
        contents: getBoolean(settings, 'contents', DEFAULT_SETTINGS.contents),
        navbar: getBoolean(settings, 'navbar', DEFAULT_SETTINGS.navbar),
        style: getString(settings, 'style', DEFAULT_SETTINGS.style),
        extensions: getStringArray(settings, 'extensions', DEFAULT_SETTINGS.extensions),
        outputExtension: getString(settings, 'outputExtension', DEFAULT_SETTINGS.outputExtension),
        exclude: getStringArray(settings, 'exclude', DEFAULT_SETTINGS.exclude),
        logLevel: typeof logLevel === 'string' ? logLevel : undefined,
    };
}

/**
 * Find POD files in a directory, respecting exclude patterns.
 * Hidden directories are skipped. Results are sorted.
 */
export function findPodFiles(
    dir: string,
    excludePatterns: string[],
    extensions: string[] = DEFAULT_SETTINGS.extensions
): string[] {
    const files: string[] = [];

    const scan = (currentDir: string): void => {
        let entries: fs.Dirent[];
        try {
            entries = fs.readdirSync(currentDir, { withFileTypes: true });
        } catch (err) {
            cliLogger.debug('Skipping unreadable directory', {
                dir: currentDir,
                error: err instanceof Error ? err.message : String(err)
            });
            return;
        }

        for (const entry of entries) {
            const fullPath = path.join(currentDir, entry.name);

            if (shouldExclude(fullPath, excludePatterns)) {
                continue;
            }

            if (entry.isDirectory()) {
                if (entry.name.startsWith('.')) {
                    continue;
                }
                scan(fullPath);
            } else if (entry.isFile() && extensions.includes(path.extname(entry.name))) {
                files.push(fullPath);
            }
        }
    };

    scan(path.resolve(dir));
    return files.sort();
}
