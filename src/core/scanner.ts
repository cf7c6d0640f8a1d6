/**
 * MetaMark scanner.
 *
 * Turns raw source into typed tokens using an explicit, ordered rule table.
 * At each cursor position every rule whose anchor allows the position is
 * tried; the highest priority wins regardless of match length, and among
 * equal priorities the longest match wins.
 *
 * The scanner knows nothing about document structure. A {@link Cursor} is a
 * plain value, so callers can hold and pass positions around without
 * sharing mutable lexer state.
 *
 * @module core/scanner
 */
import { LexError } from './errors';

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

export type TokenKind =
  | 'fence'
  | 'frontmatter'
  | 'componentStart'
  | 'componentEnd'
  | 'annotation'
  | 'comment'
  | 'bold'
  | 'italic'
  | 'inlineCode'
  | 'link'
  | 'inlineMath'
  | 'blockMath'
  | 'unorderedListMarker'
  | 'orderedListMarker'
  | 'heading'
  | 'whitespace'
  | 'newline'
  | 'text';

export interface Token {
  readonly kind: TokenKind;
  /** The exact lexeme taken from the source. */
  readonly text: string;
  /** 1-based line of the first character of the lexeme. */
  readonly line: number;
  /** 1-based column (in code points) of the first character of the lexeme. */
  readonly column: number;
  /** UTF-16 offset of the lexeme in the source. */
  readonly offset: number;
}

/** A position in the source. */
export interface Cursor {
  readonly offset: number;
  readonly line: number;
  readonly column: number;
}

export const START_CURSOR: Cursor = { offset: 0, line: 1, column: 1 };

/** Result of scanning one token: the token and the cursor after it. */
export interface ScanStep {
  readonly token: Token;
  readonly next: Cursor;
}

/** Raw text up to a closing fence line, and the cursor after that line. */
export interface VerbatimStep {
  readonly body: string;
  readonly next: Cursor;
}

// ---------------------------------------------------------------------------
// Rule table
// ---------------------------------------------------------------------------

/**
 * Where a rule may match.
 *
 * - `anywhere`: no constraint.
 * - `lineStart`: only spaces or tabs precede the position on its line.
 * - `column1`: the position is the first character of a line.
 */
export type RuleAnchor = 'anywhere' | 'lineStart' | 'column1';

export interface LexRule {
  readonly kind: TokenKind;
  readonly priority: number;
  /** Pattern source, compiled sticky by each scanner. */
  readonly pattern: string;
  readonly anchor: RuleAnchor;
}

const LINE_END = '(?:\\r\\n|\\r|\\n|$)';

/**
 * Lexical rules, highest priority first.
 */
export const LEX_RULES: readonly LexRule[] = [
  { kind: 'fence', priority: 3, pattern: '```([A-Za-z0-9_+\\-]*)[ \\t]*' + LINE_END, anchor: 'lineStart' },
  { kind: 'frontmatter', priority: 2, pattern: '---[ \\t]*' + LINE_END, anchor: 'column1' },
  { kind: 'componentStart', priority: 2, pattern: '\\[\\[component:[^\\]\\r\\n]+\\]\\]', anchor: 'anywhere' },
  { kind: 'componentEnd', priority: 2, pattern: '\\[\\[/component\\]\\]', anchor: 'anywhere' },
  { kind: 'annotation', priority: 2, pattern: '@\\[[^\\]\\r\\n]+\\]', anchor: 'anywhere' },
  { kind: 'comment', priority: 2, pattern: '%%(?:[ \\t][^\\r\\n]*)?(?=[\\r\\n]|$)', anchor: 'lineStart' },
  { kind: 'bold', priority: 2, pattern: '\\*\\*[^*\\r\\n]+\\*\\*', anchor: 'anywhere' },
  { kind: 'italic', priority: 2, pattern: '\\*[^*\\r\\n]+\\*', anchor: 'anywhere' },
  { kind: 'inlineCode', priority: 2, pattern: '`[^`\\r\\n]+`', anchor: 'anywhere' },
  { kind: 'link', priority: 2, pattern: '\\[[^\\]\\r\\n]+\\]\\([^)\\r\\n]+\\)', anchor: 'anywhere' },
  { kind: 'blockMath', priority: 2, pattern: '\\$\\$[^$]+\\$\\$', anchor: 'anywhere' },
  { kind: 'inlineMath', priority: 2, pattern: '\\$[^$\\r\\n]+\\$', anchor: 'anywhere' },
  { kind: 'unorderedListMarker', priority: 2, pattern: '[ \\t]*- ', anchor: 'column1' },
  { kind: 'orderedListMarker', priority: 2, pattern: '[ \\t]*\\d+\\. ', anchor: 'column1' },
  { kind: 'heading', priority: 2, pattern: '#{1,6} ', anchor: 'lineStart' },
  { kind: 'whitespace', priority: 2, pattern: '[ \\t]+', anchor: 'anywhere' },
  { kind: 'newline', priority: 2, pattern: '(?:\\r\\n|\\r|\\n)+', anchor: 'anywhere' },
  {
    kind: 'text',
    priority: 1,
    // Runs that cannot start another construct, or one of the construct-opening
    // characters on its own when its construct did not match. Vertical tab and
    // form feed are left unmatched.
    pattern: '[^ \\t\\r\\n\\x0b\\x0c*`\\[$@]+|[*`\\[$@]',
    anchor: 'anywhere',
  },
];

interface CompiledRule {
  readonly rule: LexRule;
  readonly regex: RegExp;
}

function compileRules(rules: readonly LexRule[]): CompiledRule[] {
  return [...rules]
    .sort((a, b) => b.priority - a.priority)
    .map((rule) => ({ rule, regex: new RegExp(rule.pattern, 'y') }));
}

function isLineBreak(ch: string): boolean {
  return ch === '\n' || ch === '\r';
}

function anchorAllows(anchor: RuleAnchor, input: string, offset: number): boolean {
  switch (anchor) {
    case 'anywhere':
      return true;
    case 'column1':
      return offset === 0 || isLineBreak(input[offset - 1]);
    case 'lineStart': {
      let i = offset - 1;
      while (i >= 0 && (input[i] === ' ' || input[i] === '\t')) {
        i--;
      }
      return i < 0 || isLineBreak(input[i]);
    }
  }
}

/** Move `cursor` over `lexeme`. `\r\n` counts as a single line break. */
export function advanceCursor(cursor: Cursor, lexeme: string): Cursor {
  let { line, column } = cursor;
  let previous = '';
  for (const ch of lexeme) {
    if (ch === '\n') {
      if (previous !== '\r') {
        line += 1;
        column = 1;
      }
    } else if (ch === '\r') {
      line += 1;
      column = 1;
    } else {
      column += 1;
    }
    previous = ch;
  }
  return { offset: cursor.offset + lexeme.length, line, column };
}

/** An untagged fence alone on its line, indentation allowed. */
const CLOSING_FENCE = /[ \t]*```[ \t]*(?:\r\n|\r|\n|$)/y;

/** Offset of the line after the one containing `offset`, or -1 on the last line. */
function nextLineStart(input: string, offset: number): number {
  const found = input.slice(offset).search(/\r\n|\r|\n/);
  if (found === -1) return -1;
  const at = offset + found;
  return input.startsWith('\r\n', at) ? at + 2 : at + 1;
}

function describeCharacter(input: string, offset: number): string {
  const code = input.codePointAt(offset) ?? 0;
  return `U+${code.toString(16).toUpperCase().padStart(4, '0')}`;
}

// ---------------------------------------------------------------------------
// Scanner
// ---------------------------------------------------------------------------

/**
 * Lazy tokenizer over one source string.
 *
 * {@link Scanner.scanAt} is a pure lookup keyed by cursor; iterating the
 * scanner walks the whole input from the start.
 *
 * @example
 * ```ts
 * for (const token of new Scanner('# Title\n')) {
 *   console.log(token.kind, token.line, token.column);
 * }
 * // heading 1 1
 * // text 1 3
 * // newline 1 8
 * ```
 */
export class Scanner implements IterableIterator<Token> {
  private readonly rules: CompiledRule[];
  private cursor: Cursor = START_CURSOR;

  constructor(
    private readonly input: string,
    rules: readonly LexRule[] = LEX_RULES,
  ) {
    this.rules = compileRules(rules);
  }

  /**
   * Scan the token that starts at `cursor`.
   *
   * @returns The token and the cursor after it, or `undefined` at end of input.
   * @throws {LexError} When no rule matches at `cursor`.
   */
  scanAt(cursor: Cursor): ScanStep | undefined {
    if (cursor.offset >= this.input.length) {
      return undefined;
    }

    let best: { kind: TokenKind; priority: number; text: string } | undefined;
    for (const { rule, regex } of this.rules) {
      if (best && rule.priority < best.priority) break;
      if (!anchorAllows(rule.anchor, this.input, cursor.offset)) continue;

      regex.lastIndex = cursor.offset;
      const match = regex.exec(this.input);
      if (!match || match[0].length === 0) continue;

      if (!best || match[0].length > best.text.length) {
        best = { kind: rule.kind, priority: rule.priority, text: match[0] };
      }
    }

    if (!best) {
      throw new LexError(
        cursor.line,
        cursor.column,
        `Unexpected character ${describeCharacter(this.input, cursor.offset)}`,
      );
    }

    const token: Token = {
      kind: best.kind,
      text: best.text,
      line: cursor.line,
      column: cursor.column,
      offset: cursor.offset,
    };
    return { token, next: advanceCursor(cursor, best.text) };
  }

  /**
   * Read raw source from `cursor`, which must sit at the start of a line, up
   * to the next line holding only an untagged fence. No lexical rule is
   * applied to the text in between.
   *
   * @returns The text before the fence line and the cursor after that line,
   *   or `undefined` when no fence line follows.
   */
  scanVerbatim(cursor: Cursor): VerbatimStep | undefined {
    for (let offset = cursor.offset; offset !== -1; offset = nextLineStart(this.input, offset)) {
      if (offset >= this.input.length) break;

      CLOSING_FENCE.lastIndex = offset;
      const match = CLOSING_FENCE.exec(this.input);
      if (match) {
        const body = this.input.slice(cursor.offset, offset);
        return { body, next: advanceCursor(cursor, body + match[0]) };
      }
    }
    return undefined;
  }

  next(): IteratorResult<Token> {
    const step = this.scanAt(this.cursor);
    if (!step) {
      return { done: true, value: undefined };
    }
    this.cursor = step.next;
    return { done: false, value: step.token };
  }

  [Symbol.iterator](): IterableIterator<Token> {
    return this;
  }
}

/**
 * Lazily scan `input` from the start.
 *
 * @throws {LexError} When the stream reaches input no rule matches.
 */
export function* scan(input: string): Generator<Token, void, undefined> {
  yield* new Scanner(input);
}

/** Scan the whole of `input` into an array. */
export function tokenize(input: string): Token[] {
  return Array.from(scan(input));
}
