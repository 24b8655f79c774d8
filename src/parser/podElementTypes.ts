/**
 * POD element types and the event interface between the POD parser and
 * the output backends.
 *
 * The parser walks a document once and reports its structure as nested
 * start/end pairs around text. Block elements (headings, paragraphs,
 * verbatim and data blocks, list items) contain inline elements
 * (formatting codes and links), which may nest.
 */

// =============================================================================
// Shared Types
// =============================================================================

/**
 * List kinds. A list's kind is decided by its first item: `*` for bullet,
 * `1` for number, anything else for text. A list with no leading item is a
 * block (indented) list.
 */
export type ListKind = 'bullet' | 'number' | 'text' | 'block';

/**
 * Link kinds, as classified from the L<> target
 */
export type LinkType = 'url' | 'pod' | 'man';

/**
 * Heading levels =head1 through =head4
 */
export type HeadLevel = 1 | 2 | 3 | 4;

/**
 * A syntax error found while parsing, reported at the end of the document
 */
export interface Erratum {
    line: number;
    message: string;
}

interface BaseElement {
    /** 1-based source line where the element starts */
    line: number;
}

// =============================================================================
// Block Elements
// =============================================================================

export interface HeadElement extends BaseElement {
    type: 'head';
    level: HeadLevel;
}

export interface ParaElement extends BaseElement {
    type: 'para';
}

/**
 * Verbatim (indented) text. Consecutive verbatim paragraphs are merged and
 * tabs are expanded before the text is delivered.
 */
export interface VerbatimElement extends BaseElement {
    type: 'verbatim';
}

/**
 * Raw text for an accepted output format, from `=for` or a `=begin` region.
 * Its text is delivered untouched.
 */
export interface DataElement extends BaseElement {
    type: 'data';
    target: string;
}

export interface OverElement extends BaseElement {
    type: 'over';
    kind: ListKind;
}

/**
 * A list item. Only text items carry content (their label); the text after
 * a `*` or number marker is delivered as a following paragraph.
 */
export interface ItemElement extends BaseElement {
    type: 'item';
    kind: ListKind;
    marker: string;
}

/**
 * A command paragraph the parser does not know
 */
export interface CommandElement extends BaseElement {
    type: 'command';
    name: string;
    text: string;
}

// =============================================================================
// Inline Elements
// =============================================================================

/**
 * A formatting code other than L<>, such as B<>, E<> or X<>. The code is
 * not validated; unknown codes are the backend's concern.
 */
export interface FormatElement extends BaseElement {
    type: 'format';
    code: string;
}

/**
 * L<> link. Its content is the display text: the explicit `text|` part, or
 * the default text built from the target.
 */
export interface LinkElement extends BaseElement {
    type: 'link';
    linkType: LinkType;
    /** URL, page name or manual page, absent for links within the document */
    to?: string;
    /** Section name with formatting removed */
    section?: string;
    /** True when the link had an explicit `text|` part */
    hasText: boolean;
}

export type PodBlockElement =
    | HeadElement
    | ParaElement
    | VerbatimElement
    | DataElement
    | OverElement
    | ItemElement
    | CommandElement;

export type PodInlineElement = FormatElement | LinkElement;

export type PodElement = PodBlockElement | PodInlineElement;

// =============================================================================
// Events
// =============================================================================

export interface DocumentAttributes {
    /** True when the source contains no POD at all */
    contentless: boolean;
    /** First `$Id: ... $` keyword string found in the source */
    id?: string;
    /** Name used in diagnostics */
    file: string;
}

export interface DocumentEndInfo {
    errata: Erratum[];
}

/**
 * Receiver for parser events. Events arrive synchronously, in document
 * order, and start/end pairs are always properly nested, except that an
 * unmatched =back is reported as an `over` end with no start.
 */
export interface PodEventHandler {
    onDocumentStart(attributes: DocumentAttributes): void;
    onElementStart(element: PodElement): void;
    onText(text: string): void;
    onElementEnd(element: PodElement): void;
    onDocumentEnd(info: DocumentEndInfo): void;
}
