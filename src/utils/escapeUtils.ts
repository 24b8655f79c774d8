/**
 * Shared escape utilities for thread output and source text normalization
 */

/** Tab stops used when expanding tabs in POD source */
export const TAB_WIDTH = 8;

/**
 * Normalize line endings to Unix-style (LF only)
 * Converts CRLF (\r\n) and standalone CR (\r) to LF (\n)
 * @param str - String to normalize
 * @returns String with consistent LF line endings
 */
export function normalizeLineEndings(str: string): string {
    if (str === null || str === undefined) return '';
    return str.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

/**
 * Escape the thread metacharacters in a piece of text.
 *
 * Backslashes are doubled and brackets become entity references to their
 * code points, so `[` and `]` in the text never open or close a macro
 * argument. The replacement runs in a single pass: the brackets of an
 * inserted `\entity[91]` are never escaped again.
 */
export function escapeThread(str: string): string {
    if (str === null || str === undefined) return '';
    return String(str).replace(/[\\[\]]/g, (ch) => {
        switch (ch) {
            case '\\':
                return '\\\\';
            case '[':
                return '\\entity[91]';
            default:
                return '\\entity[93]';
        }
    });
}

/**
 * Expand tabs to spaces, with tab stops every `tabWidth` columns.
 * Columns restart at each newline.
 */
export function expandTabs(str: string, tabWidth: number = TAB_WIDTH): string {
    if (!str.includes('\t')) return str;
    return str
        .split('\n')
        .map(line => {
            let result = '';
            for (const ch of line) {
                if (ch === '\t') {
                    result += ' '.repeat(tabWidth - (result.length % tabWidth));
                } else {
                    result += ch;
                }
            }
            return result;
        })
        .join('\n');
}
