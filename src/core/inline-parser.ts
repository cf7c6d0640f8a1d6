/**
 * Inline token parser for MetaMark.
 *
 * Runs inside headings, paragraphs and list items. Inline spans arrive from
 * the scanner already delimited, so this module only strips delimiters and
 * wraps the remainder. Annotation tokens are collected for the enclosing
 * block instead of becoming inline nodes.
 *
 * @module core/inline-parser
 */
import type { Annotation, Inline } from './types';
import type { Token, TokenKind } from './scanner';
import { ParserError } from './errors';

// ---------------------------------------------------------------------------
// Token classes
// ---------------------------------------------------------------------------

const SPAN_KINDS: ReadonlySet<TokenKind> = new Set<TokenKind>([
  'bold',
  'italic',
  'inlineCode',
  'link',
  'inlineMath',
  'blockMath',
]);

/** Whether `kind` is a delimited inline span. */
export function isSpanToken(kind: TokenKind): boolean {
  return SPAN_KINDS.has(kind);
}

/** Whether a token of this kind can open a paragraph. */
export function isInlineToken(kind: TokenKind): boolean {
  return kind === 'text' || kind === 'annotation' || SPAN_KINDS.has(kind);
}

// ---------------------------------------------------------------------------
// Span conversion
// ---------------------------------------------------------------------------

/**
 * Convert a delimited span token into its inline node.
 *
 * Bold and italic wrap a single text node; their content is not parsed any
 * further.
 */
export function spanToInline(token: Token): Inline {
  const { text } = token;
  switch (token.kind) {
    case 'bold':
      return { type: 'bold', child: { type: 'text', value: text.slice(2, -2) } };
    case 'italic':
      return { type: 'italic', child: { type: 'text', value: text.slice(1, -1) } };
    case 'inlineCode':
      return { type: 'code', value: text.slice(1, -1) };
    case 'inlineMath':
      return { type: 'math', value: text.slice(1, -1) };
    case 'blockMath':
      return { type: 'math', value: text.slice(2, -2) };
    case 'link': {
      const split = text.indexOf('](');
      return {
        type: 'link',
        text: text.slice(1, split),
        url: text.slice(split + 2, -1),
      };
    }
    default:
      return { type: 'text', value: text };
  }
}

// ---------------------------------------------------------------------------
// Annotations
// ---------------------------------------------------------------------------

const ANNOTATION_SEPARATOR = ': ';

/**
 * Parse an `@[kind: content]` token.
 *
 * @throws {ParserError} At the annotation's start when the `": "` separator
 *   is missing.
 */
export function parseAnnotation(token: Token): Annotation {
  const body = token.text.slice(2, -1);
  const split = body.indexOf(ANNOTATION_SEPARATOR);
  if (split === -1) {
    throw new ParserError(
      token.line,
      token.column,
      `Invalid annotation "${token.text}": expected "@[kind: content]"`,
    );
  }
  return {
    kind: body.slice(0, split),
    content: body.slice(split + ANNOTATION_SEPARATOR.length),
  };
}

// ---------------------------------------------------------------------------
// Inline run
// ---------------------------------------------------------------------------

/** Source of tokens for the inline parser. */
export interface TokenSource {
  /** The current token, or `undefined` at end of input. */
  peek(): Token | undefined;
  /** Consume the current token. */
  advance(): void;
}

/** Inline content of one line plus the annotations that trail it. */
export interface InlineRun {
  content: Inline[];
  annotations: Annotation[];
}

function appendText(content: Inline[], value: string): void {
  const last = content[content.length - 1];
  if (last && last.type === 'text') {
    content[content.length - 1] = { type: 'text', value: last.value + value };
  } else {
    content.push({ type: 'text', value });
  }
}

/**
 * Consume inline tokens up to and including the next newline.
 *
 * Adjacent text and whitespace merge into one text node. A structural token
 * (component marker, fence, comment, ...) ends the run without being
 * consumed so the block parser can handle it.
 */
export function parseInlineRun(source: TokenSource): InlineRun {
  const content: Inline[] = [];
  const annotations: Annotation[] = [];

  for (let token = source.peek(); token; token = source.peek()) {
    if (token.kind === 'newline') {
      source.advance();
      break;
    }

    if (token.kind === 'text' || token.kind === 'whitespace') {
      appendText(content, token.text);
    } else if (token.kind === 'annotation') {
      annotations.push(parseAnnotation(token));
    } else if (SPAN_KINDS.has(token.kind)) {
      content.push(spanToInline(token));
    } else {
      break;
    }
    source.advance();
  }

  trimTrailingWhitespace(content);
  return { content, annotations };
}

/** Trailing spaces at the end of a line carry no meaning. */
function trimTrailingWhitespace(content: Inline[]): void {
  const last = content[content.length - 1];
  if (!last || last.type !== 'text') return;

  const value = last.value.replace(/[ \t]+$/, '');
  if (value.length === 0) {
    content.pop();
  } else {
    content[content.length - 1] = { type: 'text', value };
  }
}
