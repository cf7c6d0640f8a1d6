import type { DocumentInfo } from './types';
import type { Block, DiagramKind, Document, Inline, ParseOptions } from './core/types';
import { Parser, resolveParseOptions } from './core/parser';
import { preprocessSource } from './core/preprocessor';
import { renderDocument } from './core/renderer';
import { walkBlocks } from './core/walker';

const CJK_CHARACTER = /[\u3000-\u9fff\uf900-\ufaff\u{20000}-\u{2fa1f}]/u;

/**
 * Approximate word count. Each CJK character is a word of its own; any other
 * run between whitespace and CJK characters counts once.
 *
 * @example
 * ```ts
 * countWords('你好 world'); // 3
 * ```
 */
export function countWords(text: string): number {
  let words = 0;
  for (const run of text.split(/\s+/)) {
    let inWord = false;
    for (const ch of run) {
      if (CJK_CHARACTER.test(ch)) {
        words++;
        inWord = false;
      } else if (!inWord) {
        words++;
        inWord = true;
      }
    }
  }
  return words;
}

function inlineText(node: Inline): string {
  switch (node.type) {
    case 'text':
    case 'code':
    case 'math':
      return node.value;
    case 'bold':
    case 'italic':
      return inlineText(node.child);
    case 'link':
      return node.text;
  }
}

function hasInlineMath(content: readonly Inline[]): boolean {
  return content.some((node) => node.type === 'math');
}

function extractTitle(blocks: readonly Block[]): string | undefined {
  let title: string | undefined;
  walkBlocks(blocks, (block) => {
    if (title === undefined && block.type === 'heading' && block.content.length > 0) {
      title = block.content;
    }
  });
  return title;
}

/**
 * Parse MetaMark source into a document tree.
 *
 * Runs the preprocessor (unless `options.preprocess` is `false`), then the
 * parser. Every call returns a fresh tree.
 *
 * @param source - Raw MetaMark text.
 * @param options - Parse options.
 * @returns The parsed {@link Document}.
 * @throws {LexError} On characters no lexical rule accepts.
 * @throws {ParserError} On input that breaks the block or inline grammar.
 * @throws {MetadataError} On frontmatter that is neither YAML nor TOML.
 *
 * @example
 * ```ts
 * const doc = parseDocument('---\ntitle: Notes\n---\n# Intro\n');
 * doc.metadata; // { title: 'Notes' }
 * doc.blocks;   // [{ type: 'heading', level: 1, content: 'Intro', annotations: [] }]
 * ```
 */
export function parseDocument(source: string, options?: ParseOptions): Document {
  const resolved = resolveParseOptions(options);
  const input = resolved.preprocess ? preprocessSource(source) : source;
  return new Parser(input, resolved).parse();
}

/**
 * Collect summary facts about a parsed document.
 */
export function describeDocument(doc: Document): DocumentInfo {
  const text: string[] = [];
  const languages = new Set<string>();
  const diagrams = new Set<DiagramKind>();
  const components = new Set<string>();
  let annotationCount = 0;
  let hasMath = false;
  let blockCount = 0;

  walkBlocks(doc.blocks, (block) => {
    blockCount++;
    switch (block.type) {
      case 'heading':
        text.push(block.content);
        annotationCount += block.annotations.length;
        break;
      case 'paragraph':
        text.push(block.content.map(inlineText).join(''));
        annotationCount += block.annotations.length;
        hasMath = hasMath || hasInlineMath(block.content);
        break;
      case 'code':
        if (block.language) {
          languages.add(block.language);
        }
        break;
      case 'diagram':
        diagrams.add(block.kind);
        break;
      case 'component':
        components.add(block.name);
        break;
      case 'math':
        hasMath = true;
        break;
      default:
        break;
    }
  });

  const metaTitle = doc.metadata?.title;
  const title =
    (typeof metaTitle === 'string' && metaTitle.length > 0 ? metaTitle : undefined) ??
    extractTitle(doc.blocks) ??
    'Untitled';

  return {
    title,
    wordCount: countWords(text.join('\n')),
    languages: [...languages],
    diagrams: [...diagrams],
    components: [...components],
    annotationCount,
    hasMath,
    blockCount,
  };
}

/**
 * Parse and re-render MetaMark source in canonical form.
 *
 * @throws Whatever {@link parseDocument} throws.
 */
export function formatDocument(source: string, options?: ParseOptions): string {
  return renderDocument(parseDocument(source, options));
}
