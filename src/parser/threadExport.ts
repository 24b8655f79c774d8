/**
 * Thread export backend
 *
 * Receives POD parser events and writes thread, the macro language read
 * by the page generator. Text is escaped as it arrives and collected per
 * element; each block is formatted and written when its element ends.
 *
 * Output shape:
 *
 *   \heading[name][style]          page header, from NAME or the title option
 *   \h1[name]
 *   \p(subhead)[(description)]
 *   \div(navbar)[...]              navigation, when requested
 *   \h2[Table of Contents] ...
 *   \h2(#S1)[SECTION]              headings, anchored when sections are tracked
 *   \bullet / \number / \desc[..]  list items, body in [...]
 *   \pre\n[...]                    verbatim blocks
 *   \signature                     always last
 */

import type {
    DocumentAttributes,
    DocumentEndInfo,
    FormatElement,
    HeadElement,
    ItemElement,
    LinkElement,
    PodElement,
    PodEventHandler,
} from './podElementTypes';
import { resolveEscape } from './podEscapes';
import { PodSyntaxError } from './threadErrors';
import { reformat } from './threadFormat';
import { BLOCK_TAG, ListStack } from './threadLists';
import type { OutputTarget } from './threadOutput';
import { OutputSink } from './threadOutput';
import { SectionRegistry } from './threadSections';
import { escapeThread } from '../utils/escapeUtils';
import { exportLogger } from '../utils/logger';

// =============================================================================
// Export Options
// =============================================================================

export interface ThreadExportOptions {
    /** Add a table of contents after the page header */
    contents?: boolean;
    /** Add a navigation bar after the page header */
    navbar?: boolean;
    /** Style sheet named in the \heading macro */
    style?: string;
    /** Page title; when set, the NAME section is not used for the header */
    title?: string;
    /** Document identifier for \id, overriding any $Id$ string in the source */
    id?: string;
    /** Heading text to anchor, from {@link scanSectionAnchors} or the caller */
    anchors?: Record<string, string>;
}

export type DiagnosticSeverity = 'warning' | 'error';

/**
 * A warning or error found while converting
 */
export interface Diagnostic {
    severity: DiagnosticSeverity;
    file: string;
    line: number;
    message: string;
}

// =============================================================================
// Conversion State
// =============================================================================

/**
 * Text collected for an open element: converted thread text and the same
 * content with all formatting removed
 */
interface TextFrame {
    element: PodElement;
    text: string;
    plain: string;
}

interface RenderedText {
    text: string;
    plain: string;
}

const EMPTY: RenderedText = { text: '', plain: '' };

/**
 * Per-document state, created at document start
 */
interface ConversionContext {
    file: string;
    id?: string;
    contentless: boolean;
    sink: OutputSink;
    lists: ListStack;
    sections: SectionRegistry;
    frames: TextFrame[];
    /** Between a NAME heading and the page header it produces */
    inName: boolean;
    headerDone: boolean;
}

function createConversionContext(
    target: OutputTarget,
    options: ThreadExportOptions,
    attributes: DocumentAttributes
): ConversionContext {
    const sink = new OutputSink(target);
    return {
        file: attributes.file,
        id: options.id ?? attributes.id,
        contentless: attributes.contentless,
        sink,
        lists: new ListStack(sink),
        sections: new SectionRegistry(options.anchors),
        frames: [],
        inName: false,
        headerDone: false,
    };
}

// =============================================================================
// Thread Export Backend
// =============================================================================

export class ThreadExportBackend implements PodEventHandler {
    public readonly name = 'thread';
    private context: ConversionContext | null = null;
    private lastSections: SectionRegistry | null = null;
    private diagnostics: Diagnostic[] = [];

    constructor(
        private readonly target: OutputTarget,
        private readonly options: ThreadExportOptions = {}
    ) {}

    /**
     * Warnings and errors from the most recent document
     */
    getDiagnostics(): Diagnostic[] {
        return [...this.diagnostics];
    }

    /**
     * Heading text to anchor for the sections of the most recent document
     */
    getSectionAnchors(): Record<string, string> {
        return this.lastSections ? this.lastSections.toAnchorMap() : {};
    }

    private get wantsNavigation(): boolean {
        return Boolean(this.options.contents || this.options.navbar);
    }

    /** Whether top-level headings get anchors */
    private get tracksSections(): boolean {
        return this.wantsNavigation || this.options.anchors !== undefined;
    }

    private requireContext(): ConversionContext {
        if (!this.context) {
            throw new Error('POD event received outside of a document');
        }
        return this.context;
    }

    // =========================================================================
    // Parser Events
    // =========================================================================

    onDocumentStart(attributes: DocumentAttributes): void {
        this.diagnostics = [];
        const ctx = createConversionContext(this.target, this.options, attributes);
        this.context = ctx;
        this.lastSections = ctx.sections;
        exportLogger.debug('Document start', { file: ctx.file, contentless: ctx.contentless });

        if (!ctx.contentless && this.options.title) {
            this.emitHeader(ctx, escapeThread(this.options.title));
        }
    }

    onElementStart(element: PodElement): void {
        const ctx = this.requireContext();
        if (element.type === 'over') {
            ctx.lists.enter(element.kind);
            return;
        }
        ctx.frames.push({ element, text: '', plain: '' });
    }

    onText(text: string): void {
        const frames = this.requireContext().frames;
        const frame = frames[frames.length - 1];
        if (!frame) {
            return;
        }
        frame.text += frame.element.type === 'data' ? text : escapeThread(text);
        frame.plain += text;
    }

    onElementEnd(element: PodElement): void {
        const ctx = this.requireContext();
        if (element.type === 'over') {
            if (!ctx.lists.exit()) {
                this.warn(ctx, element.line, 'Unmatched =back');
            }
            return;
        }

        const frame = ctx.frames.pop();
        if (!frame) {
            return;
        }

        switch (element.type) {
            case 'format':
                this.appendInline(ctx, this.formatCode(ctx, element, frame));
                break;
            case 'link':
                this.appendInline(ctx, this.formatLink(ctx, element, frame));
                break;
            case 'head':
                this.heading(ctx, element, frame);
                break;
            case 'para':
                this.paragraph(ctx, frame);
                break;
            case 'verbatim':
                this.verbatim(ctx, frame);
                break;
            case 'data':
                this.data(ctx, frame);
                break;
            case 'item':
                this.item(ctx, element, frame);
                break;
            case 'command': {
                const text = element.text ? ` ${element.text}` : '';
                this.warn(ctx, element.line, `Unknown command paragraph: =${element.name}${text}`);
                break;
            }
        }
    }

    onDocumentEnd(info: DocumentEndInfo): void {
        const ctx = this.requireContext();
        for (const erratum of info.errata) {
            this.diagnostics.push({ severity: 'error', file: ctx.file, line: erratum.line, message: erratum.message });
        }

        if (!ctx.contentless) {
            ctx.lists.exitAll();
            ctx.sink.output('\\signature\n');
            ctx.sink.finish(this.renderNavigation(ctx));
        }
        this.context = null;
        exportLogger.debug('Document end', { file: ctx.file, sections: ctx.sections.size });

        if (info.errata.length > 0) {
            throw new PodSyntaxError(ctx.file, info.errata);
        }
    }

    // =========================================================================
    // Block Elements
    // =========================================================================

    private heading(ctx: ConversionContext, element: HeadElement, frame: TextFrame): void {
        const text = frame.text.trim();
        const plain = frame.plain.trim().replace(/\s+/g, ' ');

        if (element.level === 1 && plain === 'NAME' && !this.options.title && !ctx.headerDone) {
            ctx.inName = true;
            return;
        }
        ctx.inName = false;

        // Headings end any list item visually, even inside an unclosed list
        ctx.lists.closeItem();

        let anchor = '';
        if (element.level === 1 && this.tracksSections) {
            anchor = `(#${ctx.sections.register(plain, text)})`;
        }
        ctx.sink.output(`\\h${element.level + 1}${anchor}[${text}]\n\n`);
    }

    private paragraph(ctx: ConversionContext, frame: TextFrame): void {
        if (frame.text.trim() === '') {
            return;
        }

        if (ctx.inName && !ctx.headerDone) {
            const match = /(\S+) - (.*)/.exec(frame.text.replace(/\s+/g, ' ').trim());
            if (match) {
                this.emitHeader(ctx, match[1], match[2].trim());
                return;
            }
        }

        const body = reformat(frame.text);
        if (!body) {
            return;
        }
        if (ctx.lists.inList) {
            ctx.lists.item(body);
        } else {
            ctx.sink.output(body);
        }
    }

    private verbatim(ctx: ConversionContext, frame: TextFrame): void {
        const text = frame.text.replace(/\s+$/, '');
        if (text.trim() === '') {
            return;
        }
        const block = `\\pre\n[${text}]\n\n`;
        if (ctx.lists.inList) {
            ctx.lists.item(block);
        } else {
            ctx.sink.output(block);
        }
    }

    private data(ctx: ConversionContext, frame: TextFrame): void {
        const text = frame.text.replace(/\s+$/, '');
        if (text) {
            ctx.sink.output(`${text}\n\n`);
        }
    }

    private item(ctx: ConversionContext, element: ItemElement, frame: TextFrame): void {
        ctx.lists.startItem(itemTag(element, frame.text.trim()));
    }

    /**
     * Page header. Navigation is rendered at the end of the document, once
     * every section is known, into the slot reserved here.
     */
    private emitHeader(ctx: ConversionContext, title: string, description?: string): void {
        const { sink } = ctx;
        if (ctx.id) {
            sink.output(`\\id[${escapeThread(ctx.id)}]\n\n`);
        }
        sink.output(`\\heading[${title}][${escapeThread(this.options.style ?? '')}]\n\n`);
        sink.output(`\\h1[${title}]\n\n`);
        if (description) {
            sink.output(`\\p(subhead)[(${description})]\n\n`);
        }
        if (this.wantsNavigation) {
            sink.reserveNavigation();
        }
        ctx.headerDone = true;
        ctx.inName = false;
    }

    private renderNavigation(ctx: ConversionContext): string {
        let navigation = '';
        if (this.options.navbar) {
            navigation += ctx.sections.renderNavbar();
        }
        if (this.options.contents) {
            navigation += ctx.sections.renderContents();
        }
        return navigation;
    }

    // =========================================================================
    // Inline Elements
    // =========================================================================

    private appendInline(ctx: ConversionContext, rendered: RenderedText): void {
        const parent = ctx.frames[ctx.frames.length - 1];
        if (parent) {
            parent.text += rendered.text;
            parent.plain += rendered.plain;
        }
    }

    private formatCode(ctx: ConversionContext, element: FormatElement, frame: TextFrame): RenderedText {
        switch (element.code) {
            case 'B':
                return this.wrap('\\bold', frame);
            case 'C':
                return this.wrap('\\code', frame);
            case 'I':
                return this.wrap('\\italic', frame);
            case 'F':
                return this.wrap('\\italic(file)', frame);
            case 'S':
                return { text: frame.text, plain: frame.plain };
            case 'X':
            case 'Z':
                return EMPTY;
            case 'E':
                return this.formatEscape(ctx, element, frame);
            default:
                this.warn(ctx, element.line, `Unknown formatting code: ${element.code}<${frame.plain}>`);
                return {
                    text: `${element.code}<${frame.text}>`,
                    plain: `${element.code}<${frame.plain}>`,
                };
        }
    }

    private wrap(macro: string, frame: TextFrame): RenderedText {
        if (frame.text === '') {
            return EMPTY;
        }
        return { text: `${macro}[${frame.text}]`, plain: frame.plain };
    }

    private formatEscape(ctx: ConversionContext, element: FormatElement, frame: TextFrame): RenderedText {
        const name = frame.plain.trim();
        const value = resolveEscape(name);
        if (value !== undefined) {
            return { text: escapeThread(value), plain: value };
        }
        this.warn(ctx, element.line, `Unknown escape: E<${name}>`);
        return { text: `\\entity[${escapeThread(name)}]`, plain: `E<${name}>` };
    }

    /**
     * URLs become links; links to a section of this document become links
     * to its anchor when the section is known; everything else is shown as
     * its display text.
     */
    private formatLink(ctx: ConversionContext, element: LinkElement, frame: TextFrame): RenderedText {
        if (element.linkType === 'url' && element.to) {
            const url = escapeThread(element.to);
            if (!element.hasText || frame.plain === element.to) {
                return { text: `<\\link[${url}][${frame.text}]>`, plain: frame.plain };
            }
            return { text: `\\link[${url}][${frame.text}]`, plain: frame.plain };
        }

        if (element.linkType === 'pod' && !element.to && element.section) {
            const anchor = ctx.sections.lookup(element.section);
            if (anchor) {
                return {
                    text: `\\link[#${anchor}][${stripQuotes(frame.text)}]`,
                    plain: stripQuotes(frame.plain),
                };
            }
        }

        return { text: frame.text, plain: frame.plain };
    }

    private warn(ctx: ConversionContext, line: number, message: string): void {
        this.diagnostics.push({ severity: 'warning', file: ctx.file, line, message });
    }
}

function itemTag(element: ItemElement, label: string): string {
    switch (element.kind) {
        case 'bullet':
            return '\\bullet';
        case 'number':
            return '\\number';
        case 'block':
            return BLOCK_TAG;
        case 'text':
            return `\\desc[${label}]`;
    }
}

function stripQuotes(text: string): string {
    return text.replace(/^"/, '').replace(/"$/, '');
}
