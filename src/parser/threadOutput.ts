/**
 * Output handling for thread conversion
 *
 * The sink holds back blank lines at the end of each chunk until the next
 * chunk arrives, so that a closing `]` can be written straight after the
 * text it closes and before the blank line that separates blocks.
 */

import * as fs from 'fs';
import { OutputWriteError } from './threadErrors';

// =============================================================================
// Output Targets
// =============================================================================

/**
 * Destination for converted text
 */
export interface OutputTarget {
    write(text: string): void;
}

/**
 * Collects output in memory
 */
export class StringTarget implements OutputTarget {
    private chunks: string[] = [];

    write(text: string): void {
        this.chunks.push(text);
    }

    toString(): string {
        return this.chunks.join('');
    }
}

/**
 * Writes output synchronously to an open file descriptor as UTF-8
 */
export class FileDescriptorTarget implements OutputTarget {
    constructor(private readonly fd: number) {}

    write(text: string): void {
        const buffer = Buffer.from(text, 'utf8');
        let offset = 0;
        while (offset < buffer.length) {
            offset += fs.writeSync(this.fd, buffer, offset, buffer.length - offset);
        }
    }
}

// =============================================================================
// Output Sink
// =============================================================================

export class OutputSink {
    /** Deferred blank lines */
    private space = '';
    /** Output held after the navigation slot, or null when streaming */
    private held: string[] | null = null;

    constructor(private readonly target: OutputTarget) {}

    /**
     * Write a chunk of output.
     *
     * Deferred blank lines are written first, unless the chunk starts with
     * a closing bracket line, which then goes before them. Blank lines at
     * the end of the chunk are deferred in turn.
     */
    output(text: string): void {
        let chunk = text;
        if (this.space) {
            const close = /^\]\s*\n/.exec(chunk);
            if (close) {
                this.write(']\n');
                chunk = chunk.slice(close[0].length);
            }
            this.write(this.space);
            this.space = '';
        }

        const trailing = /\n(\n*)$/.exec(chunk);
        if (trailing) {
            this.space = trailing[1];
            chunk = chunk.slice(0, trailing.index + 1);
        }
        this.write(chunk);
    }

    /**
     * Mark the current position as the place for navigation that can only
     * be rendered once the whole document has been seen. Output after this
     * point is held until {@link finish}.
     */
    reserveNavigation(): void {
        if (this.held !== null) {
            return;
        }
        if (this.space) {
            this.write(this.space);
            this.space = '';
        }
        this.held = [];
    }

    /**
     * Write the navigation into its slot, if one was reserved, and release
     * everything held behind it.
     */
    finish(navigation: string = ''): void {
        const held = this.held;
        this.held = null;
        if (held !== null) {
            this.write(navigation);
            for (const chunk of held) {
                this.write(chunk);
            }
        }
        if (this.space) {
            this.write(this.space);
            this.space = '';
        }
    }

    private write(text: string): void {
        if (!text) {
            return;
        }
        if (this.held !== null) {
            this.held.push(text);
            return;
        }
        try {
            this.target.write(text);
        } catch (error) {
            throw new OutputWriteError(
                `Write to output failed: ${error instanceof Error ? error.message : String(error)}`,
                error
            );
        }
    }
}
