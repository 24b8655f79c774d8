/**
 * Section registry for thread output
 *
 * Assigns anchors to top-level headings and renders the table of contents
 * and navigation bar that link to them. Anchors are either supplied up
 * front (heading text to anchor) or assigned as headings are registered,
 * as `S1`, `S2`, ... in the order the headings appear.
 */

import { escapeThread } from '../utils/escapeUtils';
import { InvalidAnchorError } from './threadErrors';

/** Visible heading text allowed on one line of the navigation bar */
export const NAVBAR_LINE_BUDGET = 65;

interface SectionEntry {
    /** Heading text with formatting removed */
    text: string;
    /** Heading as converted thread text */
    label: string;
    anchor: string;
}

/**
 * Title-case a heading for the navigation bar. "and" stays lowercase.
 *
 * @example
 * navbarName('COPYRIGHT AND LICENSE')  // 'Copyright and License'
 */
export function navbarName(text: string): string {
    return text
        .trim()
        .split(/\s+/)
        .map(word => {
            const lower = word.toLowerCase();
            return lower === 'and' ? lower : lower.charAt(0).toUpperCase() + lower.slice(1);
        })
        .join(' ');
}

export class SectionRegistry {
    /** Supplied anchors, by heading text */
    private readonly supplied = new Map<string, string>();
    /** Registered sections, in heading order */
    private readonly sections: SectionEntry[] = [];
    private readonly usedAnchors = new Set<string>();
    private counter = 0;

    /**
     * @param anchors - Heading text to anchor, usually from a scan of the
     *   document; headings missing from it get the next free `S<n>` anchor
     */
    constructor(anchors?: Record<string, string>) {
        if (anchors) {
            for (const [heading, anchor] of Object.entries(anchors)) {
                if (!/^[A-Za-z]/.test(anchor)) {
                    throw new InvalidAnchorError(anchor, heading);
                }
                this.supplied.set(heading, anchor);
            }
        }
    }

    /**
     * Register a heading and return its anchor. A heading that appears
     * twice gets a second anchor; {@link lookup} finds the first.
     */
    register(text: string, label: string): string {
        let anchor = this.supplied.get(text);
        if (anchor === undefined || this.usedAnchors.has(anchor)) {
            anchor = this.nextAnchor();
        }
        this.usedAnchors.add(anchor);
        this.sections.push({ text, label, anchor });
        return anchor;
    }

    /**
     * Anchor for a heading, if it has been registered or was supplied
     */
    lookup(text: string): string | undefined {
        return this.sections.find(section => section.text === text)?.anchor ?? this.supplied.get(text);
    }

    get size(): number {
        return this.sections.length;
    }

    /**
     * Heading text to anchor for every registered heading (first anchor
     * for repeated headings), suitable for passing back to the constructor
     */
    toAnchorMap(): Record<string, string> {
        const map: Record<string, string> = {};
        for (const section of this.sections) {
            if (!Object.prototype.hasOwnProperty.call(map, section.text)) {
                map[section.text] = section.anchor;
            }
        }
        return map;
    }

    private nextAnchor(): string {
        const reserved = new Set(this.supplied.values());
        let anchor: string;
        do {
            anchor = `S${++this.counter}`;
        } while (this.usedAnchors.has(anchor) || reserved.has(anchor));
        return anchor;
    }

    // =========================================================================
    // Rendering
    // =========================================================================

    /**
     * Table of contents: a packed numbered list linking to every section
     */
    renderContents(): string {
        if (this.sections.length === 0) {
            return '';
        }
        const lines = this.sections.map(
            section => `\\number(packed)[\\link[#${section.anchor}][${section.label}]]\n`
        );
        return `\\h2[Table of Contents]\n\n${lines.join('')}\n`;
    }

    /**
     * Navigation bar: links to every section separated by `|`, wrapped when
     * the visible heading text on a line would pass the budget
     */
    renderNavbar(budget: number = NAVBAR_LINE_BUDGET): string {
        if (this.sections.length === 0) {
            return '';
        }

        const lines: string[][] = [];
        let current: string[] = [];
        let length = 0;
        for (const section of this.sections) {
            const name = navbarName(section.text);
            if (current.length > 0 && length + name.length > budget) {
                lines.push(current);
                current = [];
                length = 0;
            }
            current.push(`\\link[#${section.anchor}][${escapeThread(name)}]`);
            length += name.length;
        }
        lines.push(current);

        const body = lines
            .map((links, index) => `  ${links.join(' | ')}${index < lines.length - 1 ? ' |' : ''}\n`)
            .join('');
        return `\\div(navbar)[\n${body}]\n\n`;
    }
}
