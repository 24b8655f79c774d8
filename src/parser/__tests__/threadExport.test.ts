/**
 * Tests for the thread export backend
 */

import { describe, it, expect } from 'vitest';
import { parsePod } from '../podParser';
import { ThreadExportBackend } from '../threadExport';
import type { Diagnostic, ThreadExportOptions } from '../threadExport';
import { PodSyntaxError } from '../threadErrors';
import { StringTarget } from '../threadOutput';

// =============================================================================
// Test Helpers
// =============================================================================

interface ExportResult {
    output: string;
    diagnostics: Diagnostic[];
    error?: PodSyntaxError;
}

function exportPod(source: string, options: ThreadExportOptions = {}): ExportResult {
    const target = new StringTarget();
    const backend = new ThreadExportBackend(target, options);
    try {
        parsePod(source, backend);
    } catch (error) {
        if (error instanceof PodSyntaxError) {
            return { output: target.toString(), diagnostics: backend.getDiagnostics(), error };
        }
        throw error;
    }
    return { output: target.toString(), diagnostics: backend.getDiagnostics() };
}

function toThread(source: string, options: ThreadExportOptions = {}): string {
    return exportPod(source, options).output;
}

// =============================================================================
// Blocks
// =============================================================================

describe('headings and paragraphs', () => {
    it('converts a description list item without blank lines', () => {
        const source = '=head1 ITEM 0\n=over 4\n=item 0\nSome 0 item.\n=back\n';
        expect(toThread(source)).toBe(
            '\\h2[ITEM 0]\n\n\\desc[0]\n[Some 0 item.\n]\n\n\\signature\n'
        );
    });

    it('joins the lines of a multi-line heading', () => {
        expect(toThread('=head1 A very long\nheading text\n\nBody.\n')).toBe(
            '\\h2[A very long heading text]\n\nBody.\n\n\\signature\n'
        );
    });

    it('keeps a multi-line item label out of the item body', () => {
        const source = '=over 4\n\n=item B<--foo>=I<bar>,\n  B<-f> I<bar>\n\nSets foo.\n\n=back\n';
        expect(toThread(source)).toBe(
            '\\desc[\\bold[--foo]=\\italic[bar], \\bold[-f] \\italic[bar]]\n[Sets foo.\n]\n\n\\signature\n'
        );
    });

    it('maps heading levels one below their macro', () => {
        expect(toThread('=head1 A\n\n=head2 B\n\n=head3 C\n\n=head4 D\n')).toBe(
            '\\h2[A]\n\n\\h3[B]\n\n\\h4[C]\n\n\\h5[D]\n\n\\signature\n'
        );
    });

    it('reformats paragraphs', () => {
        expect(toThread('=pod\n\nFirst line.\nSecond   line\n')).toBe(
            'First line.  Second  line\n\n\\signature\n'
        );
    });

    it('produces nothing for a source without POD', () => {
        expect(toThread('package Foo;\n\n1;\n')).toBe('');
        expect(toThread('=pod\n\n=cut\n')).toBe('');
    });

    it('wraps verbatim text in a pre block', () => {
        expect(toThread('=pod\n\n  my $x = 1;\n\n  print $x;\n\nAfter.\n')).toBe(
            '\\pre\n[  my $x = 1;\n\n  print $x;]\n\nAfter.\n\n\\signature\n'
        );
    });

    it('escapes brackets and backslashes in text', () => {
        expect(toThread('=pod\n\nUse a[0] and C<\\n>.\n')).toBe(
            'Use a\\entity[91]0\\entity[93] and \\code[\\\\n].\n\n\\signature\n'
        );
    });
});

describe('document header', () => {
    it('builds the header from the NAME section', () => {
        const source = '=head1 NAME\n\nfoo - Some description of foo\n\n=head1 DESCRIPTION\n\nText.\n';
        expect(toThread(source, { style: 'page' })).toBe(
            '\\heading[foo][page]\n\n'
            + '\\h1[foo]\n\n'
            + '\\p(subhead)[(Some description of foo)]\n\n'
            + '\\h2[DESCRIPTION]\n\n'
            + 'Text.\n\n'
            + '\\signature\n'
        );
    });

    it('uses the title option instead of NAME', () => {
        expect(toThread('=head1 NAME\n\nfoo - bar\n', { title: 'Title' })).toBe(
            '\\heading[Title][]\n\n\\h1[Title]\n\n\\h2[NAME]\n\nfoo - bar\n\n\\signature\n'
        );
    });

    it('escapes the title', () => {
        expect(toThread('=pod\n\nText.\n', { title: 'A [B]' })).toBe(
            '\\heading[A \\entity[91]B\\entity[93]][]\n\n\\h1[A \\entity[91]B\\entity[93]]\n\nText.\n\n\\signature\n'
        );
    });

    it('adds the $Id$ string from the source as \\id', () => {
        const source = '# $Id: foo.pod 12 $\n\n=head1 NAME\n\nfoo - bar\n';
        expect(toThread(source)).toBe(
            '\\id[$Id: foo.pod 12 $]\n\n\\heading[foo][]\n\n\\h1[foo]\n\n\\p(subhead)[(bar)]\n\n\\signature\n'
        );
    });

    it('prefers the id option', () => {
        const source = '# $Id: foo.pod 12 $\n\n=head1 NAME\n\nfoo - bar\n';
        expect(toThread(source, { id: 'doc-1' })).toMatch(/^\\id\[doc-1\]\n\n\\heading\[foo\]/);
    });

    it('treats a NAME paragraph without a description as text', () => {
        expect(toThread('=head1 NAME\n\nfoo\n')).toBe('foo\n\n\\signature\n');
    });
});

// =============================================================================
// Lists
// =============================================================================

describe('lists', () => {
    it('converts bullet lists, with item text on the =item line', () => {
        expect(toThread('=over\n\n=item *\n\nFirst\n\n=item * Second\n\n=back\n')).toBe(
            '\\bullet\n[First\n]\n\n\\bullet\n[Second\n]\n\n\\signature\n'
        );
    });

    it('converts numbered lists', () => {
        expect(toThread('=over 4\n\n=item 1.\n\nOne\n\n=item 2.\n\nTwo\n\n=back\n')).toBe(
            '\\number\n[One\n]\n\n\\number\n[Two\n]\n\n\\signature\n'
        );
    });

    it('formats description labels', () => {
        expect(toThread('=over\n\n=item B<--verbose>\n\nBe loud.\n\n=back\n')).toBe(
            '\\desc[\\bold[--verbose]]\n[Be loud.\n]\n\n\\signature\n'
        );
    });

    it('wraps lists without items in a block', () => {
        expect(toThread('=over 4\n\nIndented text.\n\n=back\n')).toBe(
            '\\block\n[Indented text.\n]\n\n\\signature\n'
        );
    });

    it('closes the open item before a heading', () => {
        expect(toThread('=over\n\n=item *\n\nOne\n\n=head2 Inside\n\nTwo\n\n=back\n')).toBe(
            '\\bullet\n[One\n]\n\n\\h3[Inside]\n\nTwo\n\n\\signature\n'
        );
    });

    it('balances brackets in nested lists', () => {
        const source = [
            '=over', '', '=item *', '', 'Outer', '',
            '=over', '', '=item 1.', '', 'Inner', '', '=item 2.', '', '=back', '',
            '=item *', '', 'Last', '', '=back', '',
        ].join('\n');
        const output = toThread(source);
        expect(output).toBe(
            '\\bullet\n[Outer\n\n\\number\n[Inner\n]\n\n\\number\n[]\n]\n\\bullet\n[Last\n]\n\n\\signature\n'
        );
    });

    it('warns about an unmatched =back and keeps converting', () => {
        const result = exportPod('=pod\n\n=back\n\nStill here.\n');
        expect(result.output).toBe('Still here.\n\n\\signature\n');
        expect(result.error).toBeUndefined();
        expect(result.diagnostics).toEqual([
            { severity: 'warning', file: '<string>', line: 3, message: 'Unmatched =back' },
        ]);
    });
});

// =============================================================================
// Inline Formatting
// =============================================================================

describe('formatting codes', () => {
    it('converts the formatting codes', () => {
        expect(toThread('=pod\n\nB<bold> C<code> I<it> F<file.txt> S<a b>X<idx> end\n')).toBe(
            '\\bold[bold] \\code[code] \\italic[it] \\italic(file)[file.txt] a b end\n\n\\signature\n'
        );
    });

    it('drops empty formatting codes', () => {
        expect(toThread('=pod\n\nB<>x\n')).toBe('x\n\n\\signature\n');
    });

    it('resolves escapes and warns about unknown ones', () => {
        const result = exportPod('=pod\n\nE<lt>tag E<gt> E<0x263A> E<eacute> E<sol> E<bogus>\n');
        expect(result.output).toBe('<tag > ☺ é / \\entity[bogus]\n\n\\signature\n');
        expect(result.diagnostics).toEqual([
            { severity: 'warning', file: '<string>', line: 3, message: 'Unknown escape: E<bogus>' },
        ]);
    });

    it('passes unknown codes through with a warning', () => {
        const result = exportPod('=pod\n\nQ<odd>\n');
        expect(result.output).toBe('Q<odd>\n\n\\signature\n');
        expect(result.diagnostics[0].message).toBe('Unknown formatting code: Q<odd>');
    });

    it('warns about unknown commands', () => {
        const result = exportPod('=pod\n\n=frobnicate now\n\nText.\n');
        expect(result.output).toBe('Text.\n\n\\signature\n');
        expect(result.diagnostics).toEqual([
            { severity: 'warning', file: '<string>', line: 3, message: 'Unknown command paragraph: =frobnicate now' },
        ]);
    });
});

describe('links', () => {
    it('wraps URLs shown as themselves in angle brackets', () => {
        expect(toThread('=pod\n\nSee L<http://example.com/>.\n')).toBe(
            'See <\\link[http://example.com/][http://example.com/]>.\n\n\\signature\n'
        );
    });

    it('links URL text without angle brackets', () => {
        expect(toThread('=pod\n\nL<Example|http://example.com/>\n')).toBe(
            '\\link[http://example.com/][Example]\n\n\\signature\n'
        );
    });

    it('shows links to other pages as their default text', () => {
        expect(toThread('=pod\n\nSee L<Other::Module/FOO>.\n')).toBe(
            'See "FOO" in Other::Module.\n\n\\signature\n'
        );
        expect(toThread('=pod\n\nSee L<crontab(5)>.\n')).toBe('See crontab(5).\n\n\\signature\n');
    });

    it('shows links to unknown sections as quoted text', () => {
        expect(toThread('=pod\n\nSee L</FOO>.\n')).toBe('See "FOO".\n\n\\signature\n');
    });

    it('links to sections with supplied anchors', () => {
        const source = '=pod\n\nSee L</OPTIONS>.\n\n=head1 OPTIONS\n\nNone.\n';
        expect(toThread(source, { anchors: { OPTIONS: 'S1' } })).toBe(
            'See \\link[#S1][OPTIONS].\n\n\\h2(#S1)[OPTIONS]\n\nNone.\n\n\\signature\n'
        );
    });
});

// =============================================================================
// Data Blocks
// =============================================================================

describe('data blocks', () => {
    it('passes thread data through and drops other formats', () => {
        const source = '=for thread \\raw[markup]\n\n'
            + '=begin thread\n\n\\h2[Raw]\n\n=end thread\n\n'
            + '=for html <b>dropped</b>\n\n'
            + 'Text.\n';
        expect(toThread(source)).toBe('\\raw[markup]\n\n\\h2[Raw]\n\nText.\n\n\\signature\n');
    });

    it('converts :thread regions as POD', () => {
        expect(toThread('=begin :thread\n\nB<x>\n\n=end :thread\n')).toBe('\\bold[x]\n\n\\signature\n');
    });
});

// =============================================================================
// Navigation and Errors
// =============================================================================

describe('navigation', () => {
    it('anchors headings and reports them', () => {
        const target = new StringTarget();
        const backend = new ThreadExportBackend(target, { contents: true });
        parsePod('=head1 NAME\n\nfoo - bar\n\n=head1 ONE\n\n=head1 TWO\n', backend);
        expect(backend.getSectionAnchors()).toEqual({ ONE: 'S1', TWO: 'S2' });
        expect(target.toString()).toBe(
            '\\heading[foo][]\n\n\\h1[foo]\n\n\\p(subhead)[(bar)]\n\n'
            + '\\h2[Table of Contents]\n\n'
            + '\\number(packed)[\\link[#S1][ONE]]\n'
            + '\\number(packed)[\\link[#S2][TWO]]\n\n'
            + '\\h2(#S1)[ONE]\n\n\\h2(#S2)[TWO]\n\n\\signature\n'
        );
    });

    it('leaves navigation out when there is no header', () => {
        expect(toThread('=head1 ONE\n', { navbar: true })).toBe('\\h2(#S1)[ONE]\n\n\\signature\n');
    });
});

describe('syntax errors', () => {
    it('finishes the output and then raises', () => {
        const result = exportPod('=pod\n\n=item stray\n\nB<open\n');
        expect(result.output).toBe('stray\n\n\\bold[open]\n\n\\signature\n');
        expect(result.error?.message).toBe(
            '<string> had 2 POD syntax errors:\n'
            + '  <string>:3: =item outside of any =over\n'
            + '  <string>:5: Unterminated B<...> sequence'
        );
        expect(result.diagnostics.map(d => d.severity)).toEqual(['error', 'error']);
    });

    it('closes unclosed lists before the signature', () => {
        const result = exportPod('=over\n\n=item *\n\nx\n');
        expect(result.output).toBe('\\bullet\n[x\n]\n\n\\signature\n');
        expect(result.error?.errata).toEqual([{ line: 1, message: '=over without closing =back' }]);
    });
});
