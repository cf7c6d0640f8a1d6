/**
 * MetaMark block parser.
 *
 * A single-lookahead recursive-descent parser. It pulls tokens from the
 * scanner one at a time, dispatches on the current token's kind, and lets
 * each construct routine consume tokens up to its own terminator. Frontmatter
 * text is handed to the metadata resolver and inline content to the inline
 * parser.
 *
 * @module core/parser
 */
import type {
  Annotation,
  Block,
  CodeBlock,
  ComponentBlock,
  DiagramBlock,
  DiagramKind,
  Document,
  HeadingBlock,
  HeadingLevel,
  ListBlock,
  ListItem,
  Metadata,
  ParagraphBlock,
  ParseOptions,
  ResolvedParseOptions,
} from './types';
import { Scanner, START_CURSOR, type Cursor, type Token, type TokenKind } from './scanner';
import { isInlineToken, isSpanToken, parseAnnotation, parseInlineRun, type TokenSource } from './inline-parser';
import { resolveMetadataWithFormat } from './metadata';
import { ParserError } from './errors';
import { silentLogger } from './logger';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_DEPTH = 64;

/**
 * Apply defaults to user supplied parse options.
 *
 * @throws {RangeError} When `maxDepth` is not a positive integer.
 */
export function resolveParseOptions(options?: ParseOptions): ResolvedParseOptions {
  const maxDepth = options?.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
  }
  return {
    maxDepth,
    strictMetadata: options?.strictMetadata ?? false,
    preprocess: options?.preprocess ?? true,
    logger: options?.logger ?? silentLogger,
  };
}

// ---------------------------------------------------------------------------
// Lookup tables
// ---------------------------------------------------------------------------

const TOKEN_NAMES: Record<TokenKind, string> = {
  fence: 'code fence',
  frontmatter: 'frontmatter delimiter',
  componentStart: 'component start marker',
  componentEnd: 'component end marker',
  annotation: 'annotation',
  comment: 'comment',
  bold: 'bold span',
  italic: 'italic span',
  inlineCode: 'inline code span',
  link: 'link',
  inlineMath: 'inline math span',
  blockMath: 'block math span',
  unorderedListMarker: 'unordered list marker',
  orderedListMarker: 'ordered list marker',
  heading: 'heading marker',
  whitespace: 'whitespace',
  newline: 'line break',
  text: 'text',
};

const DIAGRAM_KINDS: ReadonlyMap<string, DiagramKind> = new Map<string, DiagramKind>([
  ['mermaid', 'mermaid'],
  ['plantuml', 'plantuml'],
  ['graphviz', 'graphviz'],
  ['dot', 'graphviz'],
]);

const HEADING_LEVELS: readonly HeadingLevel[] = [1, 2, 3, 4, 5, 6];

/** Tokens that may not appear between frontmatter delimiters. */
const METADATA_FORBIDDEN: ReadonlySet<TokenKind> = new Set<TokenKind>([
  'componentStart',
  'componentEnd',
  'fence',
  'comment',
  'annotation',
]);

const COMPONENT_PREFIX = '[[component:';

function isListMarker(kind: TokenKind): boolean {
  return kind === 'unorderedListMarker' || kind === 'orderedListMarker';
}

// ---------------------------------------------------------------------------
// Component header micro-grammar
// ---------------------------------------------------------------------------

export interface ComponentHeader {
  name: string;
  attributes: Record<string, string>;
}

/**
 * Split a component start marker into its name and attributes.
 *
 * The payload after `component:` is trimmed and split on its first space.
 * The tail is split on whitespace; each piece is split on its first `=` and
 * the value loses its surrounding `"` characters. There is no escaping and
 * no quoted whitespace: `title="two words"` yields `title` = `two`.
 *
 * @throws {ParserError} When the marker names no component.
 */
export function parseComponentHeader(token: Token): ComponentHeader {
  const payload = token.text.slice(COMPONENT_PREFIX.length, -2).trim();
  const split = payload.indexOf(' ');
  const name = split === -1 ? payload : payload.slice(0, split);
  const tail = split === -1 ? '' : payload.slice(split + 1);

  if (name.length === 0) {
    throw new ParserError(token.line, token.column, 'Component marker is missing a name');
  }

  const attributes = new Map<string, string>();
  for (const piece of tail.split(/\s+/)) {
    const eq = piece.indexOf('=');
    if (eq === -1) continue;
    attributes.set(piece.slice(0, eq).trim(), piece.slice(eq + 1).replace(/^"+|"+$/g, ''));
  }

  return { name, attributes: Object.fromEntries(attributes) };
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

/** Mutable list item used while a list is being assembled. */
interface PendingItem {
  content: Block[];
  level: number;
}

/**
 * Parser for one MetaMark source string. Instances are single-use.
 *
 * @example
 * ```ts
 * const doc = new Parser('# Title\n\nHello *world*\n').parse();
 * doc.blocks[0]; // { type: 'heading', level: 1, content: 'Title', annotations: [] }
 * ```
 */
export class Parser implements TokenSource {
  private readonly scanner: Scanner;
  private readonly options: ResolvedParseOptions;
  private current: Token | undefined;
  private cursor: Cursor = START_CURSOR;
  private used = false;

  constructor(input: string, options?: ParseOptions) {
    this.scanner = new Scanner(input);
    this.options = resolveParseOptions(options);
  }

  // -----------------------------------------------------------------------
  // Token source
  // -----------------------------------------------------------------------

  peek(): Token | undefined {
    return this.current;
  }

  advance(): void {
    const step = this.scanner.scanAt(this.cursor);
    this.current = step?.token;
    if (step) {
      this.cursor = step.next;
    }
  }

  // -----------------------------------------------------------------------
  // Document
  // -----------------------------------------------------------------------

  /**
   * Parse the whole input.
   *
   * @throws {LexError} On input the scanner cannot classify.
   * @throws {ParserError} On input that violates the block or inline grammar.
   * @throws {MetadataError} When the frontmatter is neither YAML nor TOML.
   */
  parse(): Document {
    if (this.used) {
      throw new Error('Parser instances are single-use; create a new Parser per document');
    }
    this.used = true;
    this.advance();

    const first = this.current;
    const metadata = first?.kind === 'frontmatter' ? this.parseFrontmatter(first) : undefined;
    const blocks = this.parseBlocks(0);

    this.options.logger.debug('parsed document', {
      blocks: blocks.length,
      metadata: metadata !== undefined,
    });
    return metadata === undefined ? { blocks } : { metadata, blocks };
  }

  private parseFrontmatter(opener: Token): Metadata {
    this.advance();

    let text = '';
    for (let token = this.current; token; token = this.current) {
      if (token.kind === 'frontmatter') {
        this.advance();
        const { format, metadata } = resolveMetadataWithFormat(text, {
          strict: this.options.strictMetadata,
          logger: this.options.logger,
        });
        this.options.logger.debug(`metadata resolved as ${format}`, {
          keys: Object.keys(metadata).length,
        });
        return metadata;
      }
      if (METADATA_FORBIDDEN.has(token.kind)) {
        throw new ParserError(
          token.line,
          token.column,
          `Unexpected ${TOKEN_NAMES[token.kind]} in metadata section; metadata may only contain text`,
        );
      }
      text += token.text;
      this.advance();
    }

    throw new ParserError(opener.line, opener.column, 'Unterminated metadata section: missing closing ---');
  }

  // -----------------------------------------------------------------------
  // Blocks
  // -----------------------------------------------------------------------

  /**
   * Parse blocks until end of input, or until the component end marker that
   * closes `opener`. The end marker is left for the caller.
   */
  private parseBlocks(depth: number, opener?: Token): Block[] {
    const blocks: Block[] = [];

    for (let token = this.current; token; token = this.current) {
      if (token.kind === 'newline' || token.kind === 'whitespace') {
        this.advance();
      } else if (token.kind === 'componentEnd') {
        if (opener) return blocks;
        throw new ParserError(token.line, token.column, 'Unexpected [[/component]] without an open component');
      } else {
        blocks.push(this.parseBlock(token, depth));
      }
    }

    if (opener) {
      throw new ParserError(opener.line, opener.column, 'Unterminated component: missing [[/component]]');
    }
    return blocks;
  }

  private parseBlock(token: Token, depth: number): Block {
    switch (token.kind) {
      case 'heading':
        return this.parseHeading(token);
      case 'unorderedListMarker':
      case 'orderedListMarker':
        return this.parseList(token, depth);
      case 'componentStart':
        return this.parseComponent(token, depth);
      case 'fence':
        return this.parseCodeBlock(token);
      case 'comment':
        this.advance();
        return { type: 'comment', value: token.text.slice(2).trim() };
      case 'blockMath':
        this.advance();
        return { type: 'math', value: token.text.slice(2, -2) };
      default:
        if (isInlineToken(token.kind)) {
          return this.parseParagraph();
        }
        throw new ParserError(token.line, token.column, `Unexpected ${TOKEN_NAMES[token.kind]}`);
    }
  }

  private enter(token: Token, depth: number): void {
    if (depth >= this.options.maxDepth) {
      throw new ParserError(
        token.line,
        token.column,
        `Maximum nesting depth of ${this.options.maxDepth} exceeded`,
      );
    }
  }

  private parseHeading(marker: Token): HeadingBlock {
    const hashes = marker.text.trimEnd().length;
    const level = HEADING_LEVELS.find((candidate) => candidate === hashes);
    if (level === undefined) {
      throw new ParserError(marker.line, marker.column, `Invalid heading level ${hashes}`);
    }
    this.advance();

    let content = '';
    const annotations: Annotation[] = [];
    for (let token = this.current; token; token = this.current) {
      if (token.kind === 'newline') {
        this.advance();
        break;
      }
      if (token.kind === 'annotation') {
        annotations.push(parseAnnotation(token));
      } else if (token.kind === 'text' || token.kind === 'whitespace' || isSpanToken(token.kind)) {
        content += token.text;
      } else {
        break;
      }
      this.advance();
    }

    return { type: 'heading', level, content: content.trim(), annotations };
  }

  private parseParagraph(): ParagraphBlock {
    const { content, annotations } = parseInlineRun(this);
    return { type: 'paragraph', content, annotations };
  }

  private parseComponent(opener: Token, depth: number): ComponentBlock {
    this.enter(opener, depth);
    const { name, attributes } = parseComponentHeader(opener);
    this.advance();

    const content = this.parseBlocks(depth + 1, opener);
    // parseBlocks only returns here when the current token is the end marker.
    this.advance();

    return { type: 'component', name, attributes, content };
  }

  /**
   * The body is read as raw source, not as tokens, so it may hold characters
   * that no lexical rule accepts. The opener is current and the cursor sits
   * at the start of the line after it.
   */
  private parseCodeBlock(opener: Token): CodeBlock | DiagramBlock {
    const tag = opener.text.slice(3).trim();
    const step = this.scanner.scanVerbatim(this.cursor);
    if (!step) {
      throw new ParserError(opener.line, opener.column, 'Unterminated code block: missing closing ```');
    }
    this.cursor = step.next;
    this.advance();

    // The line break before the closing fence is not content.
    const content = step.body.replace(/(?:\r\n|\r|\n)$/, '');
    const kind = DIAGRAM_KINDS.get(tag.toLowerCase());
    if (kind) {
      return { type: 'diagram', kind, content };
    }
    return tag.length > 0 ? { type: 'code', language: tag, content } : { type: 'code', content };
  }

  // -----------------------------------------------------------------------
  // Lists
  // -----------------------------------------------------------------------

  /** Nesting level of a list marker: two leading spaces per level. */
  private listLevel(marker: Token): number {
    const indent = /^[ \t]*/.exec(marker.text)?.[0] ?? '';
    if (indent.includes('\t')) {
      throw new ParserError(
        marker.line,
        marker.column,
        'Tab indentation before a list marker is not supported; indent with spaces',
      );
    }
    return Math.floor(indent.length / 2);
  }

  private parseList(first: Token, depth: number): ListBlock {
    this.enter(first, depth);
    const ordered = first.kind === 'orderedListMarker';
    const baseLevel = this.listLevel(first);
    const items: PendingItem[] = [];

    for (let token = this.current; token; token = this.current) {
      if (token.kind === 'newline' || token.kind === 'whitespace') {
        this.advance();
        continue;
      }
      if (!isListMarker(token.kind)) break;

      const level = this.listLevel(token);
      if (level < baseLevel) break;

      const last = items[items.length - 1];
      if (level > baseLevel && last) {
        last.content.push(this.parseList(token, depth + 1));
        continue;
      }
      if (token.kind !== first.kind) break;

      this.advance();
      items.push({ content: this.parseListItemContent(depth), level });
    }

    const finished: ListItem[] = items.map(({ content, level }) => ({ content, level }));
    return { type: 'list', items: finished, ordered };
  }

  /** Content on the marker's line: a paragraph and/or components opened there. */
  private parseListItemContent(depth: number): Block[] {
    const content: Block[] = [];

    for (let token = this.current; token; token = this.current) {
      if (token.kind === 'newline') {
        this.advance();
        break;
      }
      if (token.kind === 'whitespace') {
        this.advance();
      } else if (token.kind === 'componentStart') {
        content.push(this.parseComponent(token, depth + 1));
      } else if (isInlineToken(token.kind)) {
        // The inline run consumes the line break that ends the item.
        content.push(this.parseParagraph());
        break;
      } else {
        break;
      }
    }

    return content;
  }
}

/**
 * Parse MetaMark source into a document tree.
 *
 * This is the low-level entry point: it does not preprocess the input. Most
 * callers want {@link parseDocument} from the package root instead.
 */
export function parseMetaMark(input: string, options?: ParseOptions): Document {
  return new Parser(input, options).parse();
}
