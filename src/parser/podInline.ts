/**
 * Tokenizer for POD formatting codes.
 *
 * Handles both delimiter forms:
 * - `B<text>`, where the first unmatched `>` closes the code
 * - `B<< text >>`, where whitespace followed by as many `>` as were opened
 *   closes the code and single `>` characters inside are literal
 *
 * Codes nest to any depth. An unterminated code is reported as an erratum
 * and runs to the end of the paragraph.
 */

import type { Erratum } from './podElementTypes';
import { resolveEscape } from './podEscapes';

/**
 * A formatting code and its parsed content
 */
export interface InlineCode {
    code: string;
    children: InlineNode[];
    /** Source text between the delimiters, with the padding of the << >> form removed */
    raw: string;
    line: number;
}

export type InlineNode = string | InlineCode;

interface Cursor {
    text: string;
    pos: number;
    line: number;
    errata: Erratum[];
}

/**
 * How a code's content ends: a single `>` or whitespace plus `count` of `>`
 */
interface Closer {
    count: number;
}

/**
 * Parse the formatting codes in a paragraph
 * @param text - Paragraph text
 * @param line - Line number of the first line of the paragraph
 * @param errata - Receives unterminated-code errors
 */
export function parseInline(text: string, line: number, errata: Erratum[] = []): InlineNode[] {
    const cursor: Cursor = { text, pos: 0, line, errata };
    return parseNodes(cursor, null).nodes;
}

function parseNodes(cursor: Cursor, closer: Closer | null): { nodes: InlineNode[]; closed: boolean } {
    const nodes: InlineNode[] = [];
    let buffer = '';
    const { text } = cursor;

    const flush = (): void => {
        if (buffer) {
            nodes.push(buffer);
            buffer = '';
        }
    };

    while (cursor.pos < text.length) {
        if (closer) {
            const closeLength = matchCloser(text, cursor.pos, closer);
            if (closeLength > 0) {
                cursor.pos += closeLength;
                flush();
                return { nodes, closed: true };
            }
        }

        if (/[A-Z]/.test(text[cursor.pos]) && text[cursor.pos + 1] === '<') {
            flush();
            nodes.push(parseCode(cursor));
            continue;
        }

        if (text[cursor.pos] === '\n') {
            cursor.line++;
        }
        buffer += text[cursor.pos];
        cursor.pos++;
    }

    flush();
    return { nodes, closed: closer === null };
}

/**
 * Length of the closing delimiter at `pos`, or 0 if there is none
 */
function matchCloser(text: string, pos: number, closer: Closer): number {
    if (closer.count === 1) {
        return text[pos] === '>' ? 1 : 0;
    }
    const pattern = new RegExp(`\\s+>{${closer.count}}`, 'y');
    pattern.lastIndex = pos;
    const match = pattern.exec(text);
    return match ? match[0].length : 0;
}

function parseCode(cursor: Cursor): InlineCode {
    const { text } = cursor;
    const code = text[cursor.pos];
    const line = cursor.line;
    const start = cursor.pos;
    cursor.pos += 2;

    // Count extra brackets; they only open the multi-bracket form when
    // followed by whitespace, otherwise they are literal content.
    let count = 1;
    while (text[start + 1 + count] === '<') {
        count++;
    }
    if (count > 1 && /\s/.test(text[start + 1 + count] ?? '')) {
        cursor.pos = start + 1 + count;
        while (cursor.pos < text.length && /\s/.test(text[cursor.pos])) {
            if (text[cursor.pos] === '\n') cursor.line++;
            cursor.pos++;
        }
    } else {
        count = 1;
    }

    const contentStart = cursor.pos;
    const { nodes, closed } = parseNodes(cursor, { count });
    let raw: string;
    if (closed) {
        const closeStart = count === 1
            ? cursor.pos - 1
            : text.slice(0, cursor.pos - count).trimEnd().length;
        raw = text.slice(contentStart, closeStart);
    } else {
        raw = text.slice(contentStart);
        cursor.errata.push({
            line,
            message: `Unterminated ${code}<${'<'.repeat(count - 1)}...${'>'.repeat(count)} sequence`
        });
    }

    return { code, children: nodes, raw, line };
}

/**
 * Flatten parsed content to plain text: formatting removed, escapes
 * resolved, index entries and zero-width codes dropped, links reduced to
 * their content.
 */
export function plainText(nodes: InlineNode[]): string {
    let result = '';
    for (const node of nodes) {
        if (typeof node === 'string') {
            result += node;
            continue;
        }
        switch (node.code) {
            case 'X':
            case 'Z':
                break;
            case 'E': {
                const name = plainText(node.children).trim();
                result += resolveEscape(name) ?? `E<${name}>`;
                break;
            }
            default:
                result += plainText(node.children);
                break;
        }
    }
    return result;
}

/**
 * Find the first occurrence of `ch` that is not inside a formatting code
 * @returns The index, or -1
 */
export function indexOfTopLevel(text: string, ch: string): number {
    let depth = 0;
    for (let i = 0; i < text.length; i++) {
        if (/[A-Z]/.test(text[i]) && text[i + 1] === '<') {
            depth++;
            i++;
        } else if (text[i] === '>' && depth > 0) {
            depth--;
        } else if (text[i] === ch && depth === 0) {
            return i;
        }
    }
    return -1;
}
