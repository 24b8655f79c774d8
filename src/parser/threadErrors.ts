/**
 * Error classes raised by the thread converter
 */

import type { Erratum } from './podElementTypes';

/**
 * The POD source had syntax errors. Raised at the end of the document,
 * after everything that could be converted has been written.
 */
export class PodSyntaxError extends Error {
    constructor(
        public readonly file: string,
        public readonly errata: Erratum[],
        /** Output produced before the error was raised, when it was buffered */
        public readonly output: string = ''
    ) {
        super(
            `${file} had ${errata.length} POD syntax error${errata.length === 1 ? '' : 's'}:\n`
            + errata.map(e => `  ${file}:${e.line}: ${e.message}`).join('\n')
        );
        this.name = 'PodSyntaxError';
    }
}

/**
 * Writing to the output destination failed. The conversion stops at once.
 */
export class OutputWriteError extends Error {
    constructor(message: string, public readonly cause?: unknown) {
        super(message);
        this.name = 'OutputWriteError';
    }
}

/**
 * The POD source could not be read
 */
export class PodReadError extends Error {
    constructor(public readonly source: string, public readonly cause?: unknown) {
        super(`Can't read ${source}: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'PodReadError';
    }
}

/**
 * A supplied section anchor does not start with a letter
 */
export class InvalidAnchorError extends Error {
    constructor(public readonly anchor: string, public readonly heading: string) {
        super(`Invalid anchor "${anchor}" for section "${heading}": anchors must start with a letter`);
        this.name = 'InvalidAnchorError';
    }
}
