/**
 * POD parser
 *
 * Splits POD source into paragraphs and reports the document structure to
 * a PodEventHandler: block elements for headings, paragraphs, verbatim and
 * data blocks and lists, with inline elements for formatting codes and
 * links nested inside them.
 *
 * Syntax errors (unterminated formatting codes, unbalanced =over/=back or
 * =begin/=end, =item outside a list) do not stop the parse. They are
 * collected and handed to the handler at the end of the document.
 */

import type {
    CommandElement,
    DataElement,
    Erratum,
    FormatElement,
    HeadElement,
    HeadLevel,
    ItemElement,
    LinkElement,
    ListKind,
    OverElement,
    ParaElement,
    PodEventHandler,
    VerbatimElement,
} from './podElementTypes';
import type { InlineCode, InlineNode } from './podInline';
import { parseInline, plainText } from './podInline';
import { parseLink } from './podLinks';
import { expandTabs, normalizeLineEndings } from '../utils/escapeUtils';
import { parserLogger } from '../utils/logger';

// =============================================================================
// Options
// =============================================================================

export interface PodParseOptions {
    /** Name used in errata and diagnostics */
    file?: string;
}

/** Formats whose =for and =begin blocks are kept */
const ACCEPT_TARGETS = new Set(['thread']);

/** Default file name when none is given */
export const DEFAULT_FILE_NAME = '<string>';

const HEAD_LEVELS: Record<string, HeadLevel> = {
    head1: 1,
    head2: 2,
    head3: 3,
    head4: 4,
};

/** Commands that carry no content of their own */
const STRUCTURAL_COMMANDS = new Set(['pod', 'cut', 'encoding']);

// =============================================================================
// Paragraph Splitting
// =============================================================================

/**
 * A paragraph of POD source before interpretation
 */
export interface RawParagraph {
    kind: 'command' | 'verbatim' | 'ordinary';
    /** Command name without the `=`, empty for text paragraphs */
    command: string;
    /** 1-based line of the first line */
    line: number;
    /** For commands, the first entry is the text after the command name */
    lines: string[];
}

const COMMAND_START = /^=[a-zA-Z]/;
const COMMAND_LINE = /^=([a-zA-Z]\w*)(?:\s+(.*))?$/;

/**
 * Split source into POD paragraphs.
 *
 * POD starts at any line beginning with `=` and a letter and ends at
 * `=cut`. Paragraphs are separated by blank lines, and a line beginning
 * with `=` and a letter always starts a new command paragraph. Other lines
 * continue the open paragraph, except that unindented text after an
 * `=item` label starts the item's body.
 */
export function splitPodParagraphs(source: string): RawParagraph[] {
    const lines = normalizeLineEndings(source).split('\n');
    const paragraphs: RawParagraph[] = [];
    let inPod = false;
    let open: RawParagraph | null = null;

    for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        if (!inPod) {
            if (!COMMAND_START.test(line)) continue;
            inPod = true;
        }

        if (/^\s*$/.test(line)) {
            open = null;
            continue;
        }

        const command = COMMAND_LINE.exec(line.trimEnd());
        if (command) {
            const paragraph: RawParagraph = {
                kind: 'command',
                command: command[1],
                line: i + 1,
                lines: [command[2] ?? ''],
            };
            paragraphs.push(paragraph);
            if (command[1] === 'cut') {
                inPod = false;
            }
            open = paragraph;
            continue;
        }

        if (open?.kind === 'command' && open.command === 'item' && !/^[ \t]/.test(line)) {
            open = null;
        }

        if (open) {
            open.lines.push(line);
        } else {
            open = {
                kind: /^[ \t]/.test(line) ? 'verbatim' : 'ordinary',
                command: '',
                line: i + 1,
                lines: [line],
            };
            paragraphs.push(open);
        }
    }

    return mergeVerbatim(paragraphs);
}

/**
 * Join consecutive verbatim paragraphs, keeping the blank lines between them
 */
function mergeVerbatim(paragraphs: RawParagraph[]): RawParagraph[] {
    const merged: RawParagraph[] = [];
    for (const paragraph of paragraphs) {
        const previous = merged[merged.length - 1];
        if (paragraph.kind === 'verbatim' && previous?.kind === 'verbatim') {
            const gap = paragraph.line - (previous.line + previous.lines.length);
            previous.lines.push(...new Array<string>(gap).fill(''), ...paragraph.lines);
        } else {
            merged.push(paragraph);
        }
    }
    return merged;
}

function paragraphText(paragraph: RawParagraph): string {
    return paragraph.lines.join('\n');
}

/**
 * Text of a command paragraph with its lines joined by single spaces
 */
function joinedText(paragraph: RawParagraph): string {
    return paragraph.lines.map(line => line.trim()).filter(line => line !== '').join(' ');
}

function firstWord(text: string): string {
    const match = /^\s*(\S+)/.exec(text);
    return match ? match[1] : '';
}

// =============================================================================
// Parser
// =============================================================================

/**
 * How the paragraphs of a =begin region are handled
 */
interface Region {
    target: string;
    mode: 'data' | 'pod' | 'skip';
    line: number;
}

export class PodParser {
    private readonly file: string;
    private errata: Erratum[] = [];
    private lists: OverElement[] = [];
    private regions: Region[] = [];

    constructor(private readonly handler: PodEventHandler, options: PodParseOptions = {}) {
        this.file = options.file ?? DEFAULT_FILE_NAME;
    }

    /**
     * Parse a complete document, reporting it to the handler
     */
    parse(source: string): void {
        this.errata = [];
        this.lists = [];
        this.regions = [];

        const text = normalizeLineEndings(source);
        const paragraphs = splitPodParagraphs(text);
        const id = /\$Id:[^$\n]*\$/.exec(text);

        parserLogger.debug('Parsing POD', { file: this.file, paragraphs: paragraphs.length });

        this.handler.onDocumentStart({
            contentless: !paragraphs.some(p => p.kind !== 'command' || !STRUCTURAL_COMMANDS.has(p.command)),
            id: id ? id[0] : undefined,
            file: this.file,
        });

        for (let i = 0; i < paragraphs.length; i++) {
            this.dispatch(paragraphs[i], paragraphs[i + 1]);
        }

        for (const region of this.regions) {
            this.errata.push({ line: region.line, message: `=begin ${region.target} without matching =end` });
        }
        while (this.lists.length > 0) {
            const list = this.lists.pop();
            if (list) {
                this.errata.push({ line: list.line, message: '=over without closing =back' });
                this.handler.onElementEnd(list);
            }
        }

        this.errata.sort((a, b) => a.line - b.line);
        this.handler.onDocumentEnd({ errata: this.errata });
    }

    private currentRegion(): Region | undefined {
        return this.regions[this.regions.length - 1];
    }

    /**
     * Region mode for a format name: `:name` regions hold POD, plain
     * `name` regions hold raw data, and formats not accepted are skipped.
     */
    private regionMode(target: string): Region['mode'] {
        if (!ACCEPT_TARGETS.has(target.replace(/^:/, ''))) {
            return 'skip';
        }
        return target.startsWith(':') ? 'pod' : 'data';
    }

    private dispatch(paragraph: RawParagraph, next: RawParagraph | undefined): void {
        const region = this.currentRegion();
        const isRegionCommand = paragraph.kind === 'command'
            && (paragraph.command === 'begin' || paragraph.command === 'end');

        if (region?.mode === 'skip' && !isRegionCommand) {
            return;
        }

        if (paragraph.kind !== 'command') {
            if (region?.mode === 'data') {
                this.emitData(region.target, paragraphText(paragraph), paragraph.line);
            } else if (paragraph.kind === 'verbatim') {
                this.emitVerbatim(paragraph);
            } else {
                this.emitBlock({ type: 'para', line: paragraph.line }, paragraphText(paragraph));
            }
            return;
        }

        const text = paragraphText(paragraph).trim();
        switch (paragraph.command) {
            case 'head1':
            case 'head2':
            case 'head3':
            case 'head4':
                this.emitBlock(
                    { type: 'head', level: HEAD_LEVELS[paragraph.command], line: paragraph.line },
                    joinedText(paragraph),
                );
                break;
            case 'over':
                this.startList(paragraph, next);
                break;
            case 'item':
                this.emitItem(paragraph, joinedText(paragraph));
                break;
            case 'back':
                this.endList(paragraph);
                break;
            case 'begin':
                this.beginRegion(paragraph, text);
                break;
            case 'end':
                this.endRegion(paragraph, text);
                break;
            case 'for':
                this.emitFor(paragraph);
                break;
            case 'pod':
            case 'cut':
            case 'encoding':
                break;
            default: {
                const element: CommandElement = { type: 'command', name: paragraph.command, text, line: paragraph.line };
                this.handler.onElementStart(element);
                this.handler.onElementEnd(element);
                break;
            }
        }
    }

    // =========================================================================
    // Lists
    // =========================================================================

    /**
     * Decide a list's kind from the paragraph that follows =over
     */
    private classifyList(next: RawParagraph | undefined): ListKind {
        if (!next || next.kind !== 'command' || next.command !== 'item') {
            return 'block';
        }
        const marker = joinedText(next);
        if (marker === '' || /^\*(?:\s|$)/.test(marker)) {
            return 'bullet';
        }
        if (/^1[.)]?(?:\s|$)/.test(marker)) {
            return 'number';
        }
        return 'text';
    }

    private startList(paragraph: RawParagraph, next: RawParagraph | undefined): void {
        const element: OverElement = { type: 'over', kind: this.classifyList(next), line: paragraph.line };
        this.lists.push(element);
        this.handler.onElementStart(element);
    }

    private endList(paragraph: RawParagraph): void {
        const list = this.lists.pop();
        // An unmatched =back still reaches the handler, which decides how to report it
        this.handler.onElementEnd(list ?? { type: 'over', kind: 'block', line: paragraph.line });
    }

    private emitItem(paragraph: RawParagraph, marker: string): void {
        const list = this.lists[this.lists.length - 1];
        if (!list) {
            this.errata.push({ line: paragraph.line, message: '=item outside of any =over' });
            if (marker) {
                this.emitBlock({ type: 'para', line: paragraph.line }, marker);
            }
            return;
        }

        const bullet = /^\*(?:\s+([\s\S]*))?$/.exec(marker);
        const numbered = list.kind === 'number' ? /^\d+[.)]?(?:\s+([\s\S]*))?$/.exec(marker) : null;

        let kind: ListKind = 'text';
        let label = marker;
        let rest = '';
        if (marker === '') {
            kind = 'bullet';
        } else if (bullet) {
            kind = 'bullet';
            label = '';
            rest = bullet[1] ?? '';
        } else if (numbered) {
            kind = 'number';
            label = '';
            rest = numbered[1] ?? '';
        }

        const element: ItemElement = { type: 'item', kind, marker, line: paragraph.line };
        this.handler.onElementStart(element);
        if (label) {
            this.emitInline(parseInline(expandTabs(label), paragraph.line, this.errata));
        }
        this.handler.onElementEnd(element);

        if (rest.trim()) {
            this.emitBlock({ type: 'para', line: paragraph.line }, rest);
        }
    }

    // =========================================================================
    // Format Regions
    // =========================================================================

    private beginRegion(paragraph: RawParagraph, text: string): void {
        const target = firstWord(text);
        if (!target) {
            this.errata.push({ line: paragraph.line, message: '=begin without a format name' });
            return;
        }
        const parent = this.currentRegion();
        this.regions.push({
            target,
            mode: parent?.mode === 'skip' ? 'skip' : this.regionMode(target),
            line: paragraph.line,
        });
    }

    private endRegion(paragraph: RawParagraph, text: string): void {
        const target = firstWord(text);
        const region = this.regions.pop();
        if (!region) {
            this.errata.push({ line: paragraph.line, message: `=end ${target} without matching =begin` });
        } else if (region.target !== target) {
            this.errata.push({ line: paragraph.line, message: `=end ${target} doesn't match =begin ${region.target}` });
        }
    }

    private emitFor(paragraph: RawParagraph): void {
        const match = /^[ \t]*(\S+)[ \t]*\n?([\s\S]*)$/.exec(paragraphText(paragraph));
        if (!match) {
            this.errata.push({ line: paragraph.line, message: '=for without a format name' });
            return;
        }
        const [, target, content] = match;
        switch (this.regionMode(target)) {
            case 'data':
                this.emitData(target, content, paragraph.line);
                break;
            case 'pod':
                this.emitBlock({ type: 'para', line: paragraph.line }, content);
                break;
            case 'skip':
                break;
        }
    }

    // =========================================================================
    // Blocks
    // =========================================================================

    private emitBlock(element: HeadElement | ParaElement, text: string): void {
        this.handler.onElementStart(element);
        this.emitInline(parseInline(expandTabs(text), element.line, this.errata));
        this.handler.onElementEnd(element);
    }

    private emitVerbatim(paragraph: RawParagraph): void {
        const element: VerbatimElement = { type: 'verbatim', line: paragraph.line };
        const text = expandTabs(paragraphText(paragraph)).replace(/[ \t]+$/gm, '');
        this.handler.onElementStart(element);
        this.handler.onText(text);
        this.handler.onElementEnd(element);
    }

    private emitData(target: string, text: string, line: number): void {
        const element: DataElement = { type: 'data', target, line };
        this.handler.onElementStart(element);
        this.handler.onText(text);
        this.handler.onElementEnd(element);
    }

    // =========================================================================
    // Inline Content
    // =========================================================================

    private emitInline(nodes: InlineNode[]): void {
        for (const node of nodes) {
            if (typeof node === 'string') {
                this.handler.onText(node);
            } else if (node.code === 'L') {
                this.emitLink(node);
            } else {
                const element: FormatElement = { type: 'format', code: node.code, line: node.line };
                this.handler.onElementStart(element);
                this.emitInline(node.children);
                this.handler.onElementEnd(element);
            }
        }
    }

    private emitLink(node: InlineCode): void {
        const link = parseLink(node.raw);
        const element: LinkElement = {
            type: 'link',
            linkType: link.linkType,
            to: link.to,
            section: link.section === undefined ? undefined : plainText(parseInline(link.section, node.line)),
            hasText: link.text !== undefined,
            line: node.line,
        };
        this.handler.onElementStart(element);
        this.emitInline(parseInline(link.display, node.line));
        this.handler.onElementEnd(element);
    }
}

/**
 * Parse POD source, reporting its structure to a handler
 */
export function parsePod(source: string, handler: PodEventHandler, options: PodParseOptions = {}): void {
    new PodParser(handler, options).parse(source);
}
