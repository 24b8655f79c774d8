/**
 * Entry points for converting POD to thread
 */

import * as fs from 'fs';
import { TextDecoder } from 'util';
import { parsePod } from './podParser';
import { OutputWriteError, PodReadError, PodSyntaxError } from './threadErrors';
import type { Diagnostic, ThreadExportOptions } from './threadExport';
import { ThreadExportBackend } from './threadExport';
import type { OutputTarget } from './threadOutput';
import { FileDescriptorTarget, StringTarget } from './threadOutput';
import { createLogger } from '../utils/logger';

const logger = createLogger('Convert');

/** Name used in diagnostics for standard input */
export const STDIN_NAME = '<standard input>';

export interface ConvertOptions extends ThreadExportOptions {
    /** Name used in diagnostics */
    file?: string;
}

export interface ConversionResult {
    output: string;
    diagnostics: Diagnostic[];
}

/** A path, or an open file descriptor (0 is standard input) */
export type ConvertSource = string | number;

/** A path, an open file descriptor (1 is standard output), or a target */
export type ConvertDestination = string | number | OutputTarget;

/**
 * Find the anchors the top-level headings of a document will get, so that
 * links to sections later in the document can be resolved in a single
 * conversion pass.
 */
export function scanSectionAnchors(source: string, options: ConvertOptions = {}): Record<string, string> {
    const backend = new ThreadExportBackend(new StringTarget(), {
        ...options,
        contents: true,
        anchors: undefined,
    });
    try {
        parsePod(source, backend, { file: options.file });
    } catch (error) {
        // Syntax errors are reported by the conversion itself
        if (!(error instanceof PodSyntaxError)) {
            throw error;
        }
        logger.debug('Section scan found syntax errors', { file: error.file, errors: error.errata.length });
    }
    return backend.getSectionAnchors();
}

function resolveAnchors(source: string, options: ConvertOptions): Record<string, string> | undefined {
    if (options.anchors) {
        return options.anchors;
    }
    return options.contents || options.navbar ? scanSectionAnchors(source, options) : undefined;
}

/**
 * Log conversion warnings as `file:line: message`. Errors are carried by
 * the PodSyntaxError instead.
 */
export function logDiagnostics(diagnostics: Diagnostic[]): void {
    for (const diagnostic of diagnostics) {
        if (diagnostic.severity === 'warning') {
            logger.warn(`${diagnostic.file}:${diagnostic.line}: ${diagnostic.message}`);
        }
    }
}

/**
 * Convert POD text to thread
 *
 * @throws PodSyntaxError after converting, if the source had syntax errors;
 *   the error carries the output produced
 */
export function convertPod(source: string, options: ConvertOptions = {}): ConversionResult {
    const target = new StringTarget();
    const backend = new ThreadExportBackend(target, { ...options, anchors: resolveAnchors(source, options) });
    try {
        parsePod(source, backend, { file: options.file });
    } catch (error) {
        if (error instanceof PodSyntaxError) {
            throw new PodSyntaxError(error.file, error.errata, target.toString());
        }
        throw error;
    } finally {
        logDiagnostics(backend.getDiagnostics());
    }
    return { output: target.toString(), diagnostics: backend.getDiagnostics() };
}

// =============================================================================
// File Conversion
// =============================================================================

function describeSource(source: ConvertSource): string {
    if (typeof source === 'string') {
        return source;
    }
    return source === 0 ? STDIN_NAME : `file descriptor ${source}`;
}

function readSource(source: ConvertSource): Buffer {
    try {
        return fs.readFileSync(source);
    } catch (error) {
        throw new PodReadError(describeSource(source), error);
    }
}

/**
 * Decode source bytes: UTF-8, unless an =encoding command names another
 * encoding the runtime can decode
 */
export function decodeSource(buffer: Buffer, file: string = STDIN_NAME): string {
    const declared = /^=encoding[ \t]+(\S+)/m.exec(buffer.toString('latin1'));
    if (!declared) {
        return new TextDecoder('utf-8').decode(buffer);
    }

    let decoder: TextDecoder;
    try {
        decoder = new TextDecoder(declared[1]);
    } catch (error) {
        logger.warn(`${file}: unsupported encoding ${declared[1]}, reading as UTF-8`, {
            error: error instanceof Error ? error.message : String(error)
        });
        decoder = new TextDecoder('utf-8');
    }
    return decoder.decode(buffer);
}

function openDestination(destination: ConvertDestination): { target: OutputTarget; close: () => void } {
    if (typeof destination === 'number') {
        return { target: new FileDescriptorTarget(destination), close: () => undefined };
    }
    if (typeof destination === 'string') {
        let fd: number;
        try {
            fd = fs.openSync(destination, 'w');
        } catch (error) {
            throw new OutputWriteError(
                `Can't open ${destination} for writing: ${error instanceof Error ? error.message : String(error)}`,
                error
            );
        }
        return { target: new FileDescriptorTarget(fd), close: () => fs.closeSync(fd) };
    }
    return { target: destination, close: () => undefined };
}

/**
 * Convert a POD file
 *
 * @param source - Path or file descriptor to read, standard input by default
 * @param destination - Path, file descriptor or target to write, standard
 *   output by default
 * @returns Warnings and errors found while converting
 * @throws PodReadError, OutputWriteError, or PodSyntaxError after writing
 *   the output, if the source had syntax errors
 */
export function convertFile(
    source: ConvertSource = 0,
    destination: ConvertDestination = 1,
    options: ConvertOptions = {}
): Diagnostic[] {
    const file = options.file ?? describeSource(source);
    const text = decodeSource(readSource(source), file);
    const anchors = resolveAnchors(text, { ...options, file });

    const { target, close } = openDestination(destination);
    const backend = new ThreadExportBackend(target, { ...options, anchors });
    try {
        parsePod(text, backend, { file });
    } finally {
        close();
        logDiagnostics(backend.getDiagnostics());
    }

    logger.debug('Converted', { file, diagnostics: backend.getDiagnostics().length });
    return backend.getDiagnostics();
}
