/**
 * L<> link parsing
 *
 * Splits the content of an L<> code into display text, link type, target
 * and section, and builds the default display text used when the link has
 * no explicit text.
 */

import type { LinkType } from './podElementTypes';
import { indexOfTopLevel } from './podInline';

export interface ParsedLink {
    linkType: LinkType;
    /** Explicit display text (raw POD), if the link had a `text|` part */
    text?: string;
    /** URL, page name or manual page */
    to?: string;
    /** Section name (raw POD), without surrounding quotes */
    section?: string;
    /** Text to show: the explicit text or the default text (raw POD) */
    display: string;
}

/** scheme:rest with no whitespace, and not a Perl package name like Foo::Bar */
const URL_PATTERN = /^\w+:[^:\s]\S*$/;

/** Manual page reference such as `crontab(5)` */
const MAN_PAGE_PATTERN = /^[^\s(/]+\(\w+\)$/;

/**
 * Strip one pair of surrounding double quotes
 */
function unquote(text: string): string {
    const match = /^"([\s\S]*)"$/.exec(text);
    return match ? match[1] : text;
}

/**
 * Parse the content of an L<> code
 */
export function parseLink(content: string): ParsedLink {
    let text: string | undefined;
    let target = content;

    const bar = indexOfTopLevel(content, '|');
    if (bar >= 0) {
        text = content.slice(0, bar).trim();
        target = content.slice(bar + 1);
    }
    target = target.trim().replace(/\s+/g, ' ');

    if (URL_PATTERN.test(target)) {
        return { linkType: 'url', text, to: target, display: text ?? target };
    }

    let name: string | undefined;
    let section: string | undefined;

    if (/^"[\s\S]*"$/.test(target)) {
        section = unquote(target);
    } else {
        const slash = indexOfTopLevel(target, '/');
        if (slash >= 0) {
            name = target.slice(0, slash).trim() || undefined;
            section = unquote(target.slice(slash + 1).trim());
        } else if (/\s/.test(target)) {
            // Deprecated L<Section Name> form
            section = target;
        } else {
            name = target;
        }
    }

    const linkType: LinkType = name && MAN_PAGE_PATTERN.test(name) ? 'man' : 'pod';
    return {
        linkType,
        text,
        to: name,
        section,
        display: text ?? defaultLinkText(name, section),
    };
}

/**
 * Default display text for a link without an explicit `text|` part
 *
 * @example
 * defaultLinkText('Foo::Bar', undefined)  // 'Foo::Bar'
 * defaultLinkText(undefined, 'OPTIONS')   // '"OPTIONS"'
 * defaultLinkText('Foo::Bar', 'OPTIONS')  // '"OPTIONS" in Foo::Bar'
 */
export function defaultLinkText(name: string | undefined, section: string | undefined): string {
    if (section && name) {
        return `"${section}" in ${name}`;
    }
    if (section) {
        return `"${section}"`;
    }
    return name ?? '';
}
