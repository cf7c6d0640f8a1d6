import { LEX_RULES, Scanner, START_CURSOR, advanceCursor, tokenize, type LexRule } from '../../src/core/scanner';
import { LexError } from '../../src/core/errors';

/** Reduce tokens to `kind:text` pairs for compact assertions. */
function kinds(input: string): string[] {
  return tokenize(input).map((t) => `${t.kind}:${t.text}`);
}

describe('scanner', () => {
  // ---------------------------------------------------------------------------
  // Token classification
  // ---------------------------------------------------------------------------

  describe('token classification', () => {
    it('should scan a heading line', () => {
      expect(kinds('# Title\n')).toEqual(['heading:# ', 'text:Title', 'newline:\n']);
    });

    it('should scan emphasis spans as single tokens', () => {
      expect(kinds('**bold** and *it*')).toEqual([
        'bold:**bold**',
        'whitespace: ',
        'text:and',
        'whitespace: ',
        'italic:*it*',
      ]);
    });

    it('should scan inline code, links and math', () => {
      expect(kinds('`x` [a](b) $y$')).toEqual([
        'inlineCode:`x`',
        'whitespace: ',
        'link:[a](b)',
        'whitespace: ',
        'inlineMath:$y$',
      ]);
    });

    it('should prefer a frontmatter delimiter over text', () => {
      expect(kinds('---\n')).toEqual(['frontmatter:---\n']);
    });

    it('should prefer block math over inline math', () => {
      expect(kinds('$$a + b$$')).toEqual(['blockMath:$$a + b$$']);
    });

    it('should scan a comment only at the start of a line', () => {
      expect(kinds('%% note')).toEqual(['comment:%% note']);
      expect(kinds('a %% b')).toEqual([
        'text:a',
        'whitespace: ',
        'text:%%',
        'whitespace: ',
        'text:b',
      ]);
    });

    it('should include indentation in a list marker', () => {
      expect(kinds('  - item')).toEqual(['unorderedListMarker:  - ', 'text:item']);
      expect(kinds('12. item')).toEqual(['orderedListMarker:12. ', 'text:item']);
    });

    it('should recognise an indented fence', () => {
      expect(kinds('  ```js\n')).toEqual(['whitespace:  ', 'fence:```js\n']);
    });

    it('should scan component markers and annotations', () => {
      expect(kinds('[[component: card]]@[note: hi][[/component]]')).toEqual([
        'componentStart:[[component: card]]',
        'annotation:@[note: hi]',
        'componentEnd:[[/component]]',
      ]);
    });

    it('should fall back to a lone text character when a span does not close', () => {
      expect(kinds('*open')).toEqual(['text:*', 'text:open']);
    });

    it('should accept control characters in text', () => {
      expect(kinds('a\u001bb\u0000')).toEqual(['text:a\u001bb\u0000']);
    });

    it('should not treat seven hashes as a heading', () => {
      expect(kinds('####### x')).toEqual(['text:#######', 'whitespace: ', 'text:x']);
    });
  });

  // ---------------------------------------------------------------------------
  // Positions
  // ---------------------------------------------------------------------------

  describe('positions', () => {
    it('should count CRLF as a single line break', () => {
      const tokens = tokenize('a\r\nb');
      expect(tokens.map((t) => [t.kind, t.line, t.column])).toEqual([
        ['text', 1, 1],
        ['newline', 1, 2],
        ['text', 2, 1],
      ]);
    });

    it('should count columns in code points', () => {
      const tokens = tokenize('é\u{1F600} x');
      expect(tokens.map((t) => t.column)).toEqual([1, 3, 4]);
      expect(tokens[2].offset).toBe(4);
    });

    it('should advance a cursor over a lexeme', () => {
      expect(advanceCursor(START_CURSOR, 'ab\ncd')).toEqual({ offset: 5, line: 2, column: 3 });
      expect(advanceCursor(START_CURSOR, '\r\r\n')).toEqual({ offset: 3, line: 3, column: 1 });
    });
  });

  // ---------------------------------------------------------------------------
  // Scanner API
  // ---------------------------------------------------------------------------

  describe('Scanner', () => {
    it('should return the same step for the same cursor', () => {
      const scanner = new Scanner('# Title');
      expect(scanner.scanAt(START_CURSOR)).toEqual(scanner.scanAt(START_CURSOR));
    });

    it('should return undefined at end of input', () => {
      expect(new Scanner('').scanAt(START_CURSOR)).toBeUndefined();
    });

    it('should produce identical tokens on repeated scans', () => {
      const input = '---\ntitle: x\n---\n# A @[k: v]\n- item\n';
      expect(tokenize(input)).toEqual(tokenize(input));
    });

    it('should scan with a custom rule table', () => {
      const withoutComments = LEX_RULES.filter((rule) => rule.kind !== 'comment');
      const texts = [...new Scanner('%% x', withoutComments)].map((t) => `${t.kind}:${t.text}`);
      expect(texts).toEqual(['text:%%', 'whitespace: ', 'text:x']);
    });

    it('should raise LexError when a custom table has no catch-all', () => {
      const rules: LexRule[] = [{ kind: 'text', priority: 1, pattern: '[a-z]+', anchor: 'anywhere' }];
      expect(() => [...new Scanner('ab1', rules)]).toThrow(
        'Lexer error at line 1, column 3: Unexpected character U+0031',
      );
    });

    it('should be iterable', () => {
      const texts = [...new Scanner('a b')].map((t) => t.text);
      expect(texts).toEqual(['a', ' ', 'b']);
    });
  });

  // ---------------------------------------------------------------------------
  // Verbatim bodies
  // ---------------------------------------------------------------------------

  describe('scanVerbatim', () => {
    it('should read raw text up to an untagged fence line', () => {
      const scanner = new Scanner('x\n\f\n  ```\nafter');
      expect(scanner.scanVerbatim(START_CURSOR)).toEqual({
        body: 'x\n\f\n',
        next: { offset: 10, line: 4, column: 1 },
      });
    });

    it('should not stop at a tagged fence', () => {
      expect(new Scanner('```js\n```').scanVerbatim(START_CURSOR)).toEqual({
        body: '```js\n',
        next: { offset: 9, line: 2, column: 4 },
      });
    });

    it('should return undefined without a closing fence', () => {
      expect(new Scanner('a\nb').scanVerbatim(START_CURSOR)).toBeUndefined();
    });
  });

  // ---------------------------------------------------------------------------
  // Errors
  // ---------------------------------------------------------------------------

  describe('errors', () => {
    it('should raise LexError at an unclassifiable character', () => {
      expect(() => tokenize('ab\u000b')).toThrow(LexError);
      expect(() => tokenize('ab\u000b')).toThrow(
        'Lexer error at line 1, column 3: Unexpected character U+000B',
      );
    });

    it('should report the line of the offending character', () => {
      try {
        tokenize('ok\n\f');
        throw new Error('expected a LexError');
      } catch (err) {
        expect(err).toBeInstanceOf(LexError);
        if (err instanceof LexError) {
          expect(err.line).toBe(2);
          expect(err.column).toBe(1);
        }
      }
    });
  });
});
