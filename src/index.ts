/**
 * pod-thread - convert POD documentation to the thread macro language
 */

export {
    convertPod,
    convertFile,
    scanSectionAnchors,
    decodeSource,
    STDIN_NAME,
} from './parser/threadConvert';
export type {
    ConvertOptions,
    ConversionResult,
    ConvertSource,
    ConvertDestination,
} from './parser/threadConvert';

export { ThreadExportBackend } from './parser/threadExport';
export type { ThreadExportOptions, Diagnostic, DiagnosticSeverity } from './parser/threadExport';

export { PodParser, parsePod } from './parser/podParser';
export type { PodParseOptions } from './parser/podParser';
export type {
    CommandElement,
    DataElement,
    DocumentAttributes,
    DocumentEndInfo,
    Erratum,
    FormatElement,
    HeadElement,
    HeadLevel,
    ItemElement,
    LinkElement,
    LinkType,
    ListKind,
    OverElement,
    ParaElement,
    PodBlockElement,
    PodElement,
    PodEventHandler,
    PodInlineElement,
    VerbatimElement,
} from './parser/podElementTypes';

export { OutputSink, StringTarget, FileDescriptorTarget } from './parser/threadOutput';
export type { OutputTarget } from './parser/threadOutput';

export { SectionRegistry, navbarName } from './parser/threadSections';

export { reformat, WRAP_WIDTH } from './parser/threadFormat';
export { escapeThread } from './utils/escapeUtils';
export { resolveEscape } from './parser/podEscapes';

export {
    PodSyntaxError,
    OutputWriteError,
    PodReadError,
    InvalidAnchorError,
} from './parser/threadErrors';

export { configureLogging, LogLevel } from './utils/logger';
export type { LoggingOptions } from './utils/logger';
