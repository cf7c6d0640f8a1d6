/**
 * Error types raised while processing MetaMark documents.
 *
 * Every error is fatal to the call that raised it: the parser does not
 * recover or return partial trees.
 *
 * @module core/errors
 */

/** Category of a {@link MetaMarkError}. */
export type MetaMarkErrorKind = 'lex' | 'parse' | 'metadata' | 'render';

const KIND_LABELS: Record<MetaMarkErrorKind, string> = {
  lex: 'Lexer error',
  parse: 'Parser error',
  metadata: 'Invalid metadata',
  render: 'Render error',
};

function formatMessage(
  kind: MetaMarkErrorKind,
  reason: string,
  line?: number,
  column?: number,
): string {
  const label = KIND_LABELS[kind];
  if (line === undefined || column === undefined) {
    return `${label}: ${reason}`;
  }
  return `${label} at line ${line}, column ${column}: ${reason}`;
}

/** Base error class for everything this package throws. */
export class MetaMarkError extends Error {
  constructor(
    public readonly kind: MetaMarkErrorKind,
    public readonly reason: string,
    public readonly line?: number,
    public readonly column?: number,
  ) {
    super(formatMessage(kind, reason, line, column));
    this.name = 'MetaMarkError';
  }
}

/** Raised when the scanner meets input that no lexical rule matches. */
export class LexError extends MetaMarkError {
  declare readonly line: number;
  declare readonly column: number;

  constructor(line: number, column: number, reason: string) {
    super('lex', reason, line, column);
    this.name = 'LexError';
  }
}

/** Raised when the token stream violates the block or inline grammar. */
export class ParserError extends MetaMarkError {
  declare readonly line: number;
  declare readonly column: number;

  constructor(line: number, column: number, reason: string) {
    super('parse', reason, line, column);
    this.name = 'ParserError';
  }
}

/** Raised when frontmatter is neither valid YAML nor valid TOML. */
export class MetadataError extends MetaMarkError {
  constructor(reason: string) {
    super('metadata', reason);
    this.name = 'MetadataError';
  }
}

/** Raised when a tree cannot be written back as MetaMark text. */
export class RenderError extends MetaMarkError {
  constructor(reason: string) {
    super('render', reason);
    this.name = 'RenderError';
  }
}
