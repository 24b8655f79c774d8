/**
 * Paragraph reformatting for thread output
 */

/** Column at which paragraph text is wrapped */
export const WRAP_WIDTH = 74;

/**
 * Reformat a paragraph of converted text.
 *
 * Line breaks are collapsed to spaces (two after a sentence-ending period),
 * runs of three or more spaces shrink to two, and the result is wrapped at
 * `width` columns. A line is broken at the last whitespace that keeps it
 * within the width; a word longer than the width is kept whole and the
 * break goes after it. The result ends in a blank line.
 *
 * @returns The wrapped paragraph, or '' if the text is empty or whitespace
 */
export function reformat(text: string, width: number = WRAP_WIDTH): string {
    let rest = text
        .replace(/[ \t]+$/gm, '')
        .replace(/\.\n/g, '. \n')
        .replace(/\n/g, ' ')
        .replace(/ {3,}/g, '  ')
        .replace(/^\s+/, '');

    if (rest.trim() === '') {
        return '';
    }

    const withinWidth = new RegExp(`^(.{0,${width - 1}}\\S)\\s+`);
    const firstWord = /^(\S+)\s+/;
    const lines: string[] = [];

    while (rest.length > width) {
        const match = withinWidth.exec(rest) ?? firstWord.exec(rest);
        if (!match) {
            break;
        }
        lines.push(match[1]);
        rest = rest.slice(match[0].length);
    }
    lines.push(rest);

    return lines.join('\n').replace(/\s+$/, '') + '\n\n';
}
