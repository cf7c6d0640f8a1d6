/**
 * Core type definitions for the MetaMark document model.
 *
 * The parser produces a fresh, read-only tree on every call. Downstream
 * consumers (renderers, editors, stores) build new trees instead of
 * mutating the ones they receive.
 *
 * @module core/types
 */
import type { Logger } from './logger';

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/**
 * A value resolved from YAML or TOML frontmatter.
 *
 * Integers and floats from either format share the `number` branch.
 */
export type MetaValue =
  | string
  | number
  | boolean
  | readonly MetaValue[]
  | MetaObject;

/** A nested mapping inside frontmatter. */
export interface MetaObject {
  readonly [key: string]: MetaValue;
}

/** Resolved frontmatter of a document. Keys are unique. */
export type Metadata = MetaObject;

// ---------------------------------------------------------------------------
// Inline nodes
// ---------------------------------------------------------------------------

export interface TextInline {
  readonly type: 'text';
  readonly value: string;
}

/**
 * Bold span. Emphasis in MetaMark does not nest, so a bold node wraps
 * exactly one child rather than a list.
 */
export interface BoldInline {
  readonly type: 'bold';
  readonly child: Inline;
}

export interface ItalicInline {
  readonly type: 'italic';
  readonly child: Inline;
}

export interface CodeInline {
  readonly type: 'code';
  readonly value: string;
}

export interface LinkInline {
  readonly type: 'link';
  readonly text: string;
  readonly url: string;
}

export interface MathInline {
  readonly type: 'math';
  readonly value: string;
}

export type Inline =
  | TextInline
  | BoldInline
  | ItalicInline
  | CodeInline
  | LinkInline
  | MathInline;

// ---------------------------------------------------------------------------
// Annotations
// ---------------------------------------------------------------------------

/** A trailing `@[kind: content]` note attached to the block it follows. */
export interface Annotation {
  readonly kind: string;
  readonly content: string;
}

// ---------------------------------------------------------------------------
// Block nodes
// ---------------------------------------------------------------------------

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export interface HeadingBlock {
  readonly type: 'heading';
  readonly level: HeadingLevel;
  readonly content: string;
  readonly annotations: readonly Annotation[];
}

export interface ParagraphBlock {
  readonly type: 'paragraph';
  readonly content: readonly Inline[];
  readonly annotations: readonly Annotation[];
}

/** A named, attributed container of nested blocks. */
export interface ComponentBlock {
  readonly type: 'component';
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly content: readonly Block[];
}

export interface CodeBlock {
  readonly type: 'code';
  /** Fence tag, absent when the fence carried none. */
  readonly language?: string;
  readonly content: string;
}

export type DiagramKind = 'mermaid' | 'plantuml' | 'graphviz';

/** A fenced block whose tag names a diagram engine. */
export interface DiagramBlock {
  readonly type: 'diagram';
  readonly kind: DiagramKind;
  readonly content: string;
}

export interface EncryptionInfo {
  readonly algorithm: string;
  readonly keyId: string;
  readonly nonce: Uint8Array;
}

/**
 * Encrypted region. The content is opaque: nothing in this package
 * encrypts or decrypts it, and the parser never produces one.
 */
export interface SecureBlock {
  readonly type: 'secure';
  readonly content: Uint8Array;
  readonly encryptionInfo: EncryptionInfo;
}

export interface ListItem {
  readonly content: readonly Block[];
  /** Nesting depth derived from indentation (two spaces per level). */
  readonly level: number;
}

export interface ListBlock {
  readonly type: 'list';
  readonly items: readonly ListItem[];
  readonly ordered: boolean;
}

export interface CommentBlock {
  readonly type: 'comment';
  readonly value: string;
}

export interface MathBlock {
  readonly type: 'math';
  readonly value: string;
}

export type Block =
  | HeadingBlock
  | ParagraphBlock
  | ComponentBlock
  | CodeBlock
  | DiagramBlock
  | SecureBlock
  | ListBlock
  | CommentBlock
  | MathBlock;

export type BlockType = Block['type'];

/** Root of a parsed MetaMark document. */
export interface Document {
  readonly metadata?: Metadata;
  readonly blocks: readonly Block[];
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options that control how MetaMark source is parsed.
 */
export interface ParseOptions {
  /**
   * Maximum nesting depth of components and lists. Deeper input fails
   * with a `ParserError` at the marker that crosses the bound.
   * @default 64
   */
  maxDepth?: number;

  /**
   * Reject frontmatter that can only be converted lossily (non-string keys,
   * null values) instead of replacing those values with `""`.
   * @default false
   */
  strictMetadata?: boolean;

  /**
   * Normalise line endings and strip a byte-order mark before scanning.
   * @default true
   */
  preprocess?: boolean;

  /**
   * Destination for debug messages.
   * @default silentLogger
   */
  logger?: Logger;
}

/** Options after defaults have been applied. */
export type ResolvedParseOptions = Required<ParseOptions>;
