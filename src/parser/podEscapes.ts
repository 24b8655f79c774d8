/**
 * POD escape definitions
 * Maps the names accepted by E<> to the characters they stand for
 */

import escapeTable from './data/podEscapes.json';

/**
 * Named escapes: the HTML names for the markup characters and the Latin-1
 * range, plus the POD-specific `sol`, `verbar`, `lchevron` and `rchevron`.
 * `shy` maps to nothing and `nbsp` to a plain space.
 */
export const POD_ESCAPES: Readonly<Record<string, string>> = Object.freeze({ ...escapeTable });

/** Highest Unicode code point */
const MAX_CODE_POINT = 0x10ffff;

/**
 * Parse a numeric escape: decimal, 0x-prefixed hexadecimal, or octal with
 * a leading zero.
 * @returns The code point, or undefined if the name is not a number
 */
export function parseNumericEscape(name: string): number | undefined {
    let codePoint: number;
    if (/^0x[0-9a-f]+$/i.test(name)) {
        codePoint = parseInt(name.slice(2), 16);
    } else if (/^0[0-7]+$/.test(name)) {
        codePoint = parseInt(name.slice(1), 8);
    } else if (/^\d+$/.test(name)) {
        codePoint = parseInt(name, 10);
    } else {
        return undefined;
    }
    return codePoint <= MAX_CODE_POINT ? codePoint : undefined;
}

/**
 * Resolve an E<> escape to its literal text
 * @returns The character(s), or undefined for an unknown escape
 */
export function resolveEscape(name: string): string | undefined {
    const codePoint = parseNumericEscape(name);
    if (codePoint !== undefined) {
        return String.fromCodePoint(codePoint);
    }
    return getEscape(name);
}

/**
 * Get a named escape by name
 */
export function getEscape(name: string): string | undefined {
    return Object.prototype.hasOwnProperty.call(POD_ESCAPES, name) ? POD_ESCAPES[name] : undefined;
}
