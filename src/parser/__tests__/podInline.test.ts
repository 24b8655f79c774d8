/**
 * Tests for the formatting code tokenizer
 */

import { describe, it, expect } from 'vitest';
import { indexOfTopLevel, parseInline, plainText } from '../podInline';
import type { Erratum } from '../podElementTypes';

describe('parseInline', () => {
    it('returns plain text as a single node', () => {
        expect(parseInline('plain text', 1)).toEqual(['plain text']);
    });

    it('parses a formatting code between text', () => {
        expect(parseInline('a B<b> c', 1)).toEqual([
            'a ',
            { code: 'B', children: ['b'], raw: 'b', line: 1 },
            ' c',
        ]);
    });

    it('parses nested codes', () => {
        expect(parseInline('B<I<x>>', 1)).toEqual([
            {
                code: 'B',
                children: [{ code: 'I', children: ['x'], raw: 'x', line: 1 }],
                raw: 'I<x>',
                line: 1,
            },
        ]);
    });

    it('parses the multi-bracket form with literal > inside', () => {
        expect(parseInline('C<< $a->b >>', 1)).toEqual([
            { code: 'C', children: ['$a->b'], raw: '$a->b', line: 1 },
        ]);
    });

    it('treats doubled brackets without whitespace as content', () => {
        expect(parseInline('B<<x>>', 1)).toEqual([
            { code: 'B', children: ['<x'], raw: '<x', line: 1 },
            '>',
        ]);
    });

    it('ignores lowercase letters before <', () => {
        expect(parseInline('a<b> and 1<2', 1)).toEqual(['a<b> and 1<2']);
    });

    it('reports unterminated codes at their starting line', () => {
        const errata: Erratum[] = [];
        const nodes = parseInline('first\nB<open', 10, errata);
        expect(nodes).toEqual([
            'first\n',
            { code: 'B', children: ['open'], raw: 'open', line: 11 },
        ]);
        expect(errata).toEqual([{ line: 11, message: 'Unterminated B<...> sequence' }]);
    });

    it('names the multi-bracket form in unterminated errors', () => {
        const errata: Erratum[] = [];
        parseInline('C<< open', 1, errata);
        expect(errata).toEqual([{ line: 1, message: 'Unterminated C<<...>> sequence' }]);
    });
});

describe('plainText', () => {
    it('drops formatting, index entries and zero-width codes', () => {
        expect(plainText(parseInline('B<bold> X<idx>Z<>text', 1))).toBe('bold text');
    });

    it('resolves escapes and keeps unknown ones visible', () => {
        expect(plainText(parseInline('E<lt>tag E<gt> E<bogus>', 1))).toBe('<tag > E<bogus>');
    });
});

describe('indexOfTopLevel', () => {
    it('skips characters inside formatting codes', () => {
        expect(indexOfTopLevel('B<a|b>|c', '|')).toBe(6);
    });

    it('returns -1 when the character is absent', () => {
        expect(indexOfTopLevel('abc', '|')).toBe(-1);
    });
});
