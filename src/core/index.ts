/**
 * Core module barrel exports.
 *
 * @module core
 */

// Scanner
export { Scanner, LEX_RULES, START_CURSOR, advanceCursor, scan, tokenize } from './scanner';
export type { Token, TokenKind, Cursor, ScanStep, LexRule, RuleAnchor } from './scanner';

// Parser
export { Parser, parseMetaMark, parseComponentHeader, resolveParseOptions, DEFAULT_MAX_DEPTH } from './parser';
export type { ComponentHeader } from './parser';

// Inline parser
export { parseAnnotation, parseInlineRun, spanToInline } from './inline-parser';
export type { InlineRun, TokenSource } from './inline-parser';

// Metadata
export { resolveMetadata, resolveMetadataWithFormat } from './metadata';
export type { MetadataFormat, MetadataOptions, ResolvedMetadata } from './metadata';

// Preprocessor
export { preprocessSource } from './preprocessor';

// Renderer
export { MetaMarkRenderer, renderDocument } from './renderer';

// Walker
export { walkBlocks } from './walker';
export type { BlockVisitor } from './walker';

// Errors
export { MetaMarkError, LexError, ParserError, MetadataError, RenderError } from './errors';
export type { MetaMarkErrorKind } from './errors';

// Logging
export { silentLogger, createConsoleLogger } from './logger';
export type { Logger } from './logger';

// Types
export type * from './types';
