/**
 * MetaMark text renderer.
 *
 * Serialises a document tree back to MetaMark source. Output is canonical:
 * blocks are separated by one blank line, list items are indented two spaces
 * per level and attributes are always quoted. Parsing the output yields a
 * tree equal to the one rendered, for every tree the parser can produce.
 *
 * @module core/renderer
 */
import { stringify } from 'yaml';
import type {
  Annotation,
  Block,
  ComponentBlock,
  Document,
  Inline,
  ListBlock,
  ListItem,
  Metadata,
} from './types';
import { RenderError } from './errors';
import { isInlineToken } from './inline-parser';
import { Scanner, START_CURSOR } from './scanner';

// ---------------------------------------------------------------------------
// Inline helpers
// ---------------------------------------------------------------------------

function renderInline(node: Inline): string {
  switch (node.type) {
    case 'text':
      return node.value;
    case 'bold':
      return `**${renderInline(node.child)}**`;
    case 'italic':
      return `*${renderInline(node.child)}*`;
    case 'code':
      return `\`${node.value}\``;
    case 'link':
      return `[${node.text}](${node.url})`;
    case 'math':
      // Single-dollar math cannot span lines.
      return /[\r\n]/.test(node.value) ? `$$${node.value}$$` : `$${node.value}$`;
  }
}

function renderAnnotation({ kind, content }: Annotation): string {
  return `@[${kind}: ${content}]`;
}

/**
 * Whether `line`, placed at the start of a line, would open a construct
 * (heading, list item, comment, fence, frontmatter) instead of a paragraph.
 */
function opensConstruct(line: string): boolean {
  const step = new Scanner(line).scanAt(START_CURSOR);
  return step !== undefined && !isInlineToken(step.token.kind);
}

/** Join non-empty parts with single spaces. */
function joinLine(parts: readonly string[]): string {
  return parts.filter((part) => part.length > 0).join(' ');
}

// ---------------------------------------------------------------------------
// MetaMarkRenderer
// ---------------------------------------------------------------------------

/**
 * Renders document trees as MetaMark text.
 *
 * @example
 * ```ts
 * const renderer = new MetaMarkRenderer();
 * renderer.render({ blocks: [{ type: 'comment', value: 'draft' }] });
 * // '%% draft\n'
 * ```
 */
export class MetaMarkRenderer {
  /**
   * Render a whole document, frontmatter included. The result ends with a
   * single line break unless the document is empty.
   *
   * @throws {RenderError} When the tree contains a block with no MetaMark
   *   syntax (`secure`).
   */
  render(doc: Document): string {
    const sections: string[] = [];
    if (doc.metadata !== undefined) {
      sections.push(this.frontmatter(doc.metadata));
    }
    if (doc.blocks.length > 0) {
      sections.push(this.blocks(doc.blocks));
    }
    return sections.length > 0 ? `${sections.join('\n')}\n` : '';
  }

  /**
   * Render a sequence of blocks separated by blank lines.
   *
   * A paragraph that followed block math or a component on the same line
   * stays on that line when it would otherwise re-parse as another construct.
   */
  blocks(blocks: readonly Block[]): string {
    let output = '';
    blocks.forEach((block, index) => {
      const text = this.block(block);
      if (index === 0) {
        output = text;
      } else if (this.continuesLine(blocks[index - 1], block, text)) {
        output += ` ${text}`;
      } else {
        output += `\n\n${text}`;
      }
    });
    return output;
  }

  block(block: Block): string {
    switch (block.type) {
      case 'heading':
        return joinLine([
          `${'#'.repeat(block.level)} ${block.content}`,
          ...block.annotations.map(renderAnnotation),
        ]);
      case 'paragraph':
        return joinLine([
          block.content.map(renderInline).join(''),
          ...block.annotations.map(renderAnnotation),
        ]);
      case 'component':
        return this.component(block);
      case 'code':
        return this.fence(block.language ?? '', block.content);
      case 'diagram':
        return this.fence(block.kind, block.content);
      case 'list':
        return this.list(block);
      case 'comment':
        return block.value.length > 0 ? `%% ${block.value}` : '%%';
      case 'math':
        return `$$${block.value}$$`;
      case 'secure':
        throw new RenderError(
          `Secure block (${block.encryptionInfo.algorithm}) has no MetaMark text form`,
        );
    }
  }

  private frontmatter(metadata: Metadata): string {
    return `---\n${stringify(metadata)}---`;
  }

  private component({ name, attributes, content }: ComponentBlock): string {
    const header = [
      name,
      ...Object.entries(attributes).map(([key, value]) => `${key}="${value}"`),
    ].join(' ');
    let opener = `[[component: ${header}]]`;
    let children = content;

    // A leading paragraph that would open a construct at column 1 shares the marker's line.
    const [first, ...rest] = content;
    if (first?.type === 'paragraph') {
      const text = this.block(first);
      if (opensConstruct(text)) {
        opener += ` ${text}`;
        children = rest;
      }
    }

    const lines = [opener];
    if (children.length > 0) {
      lines.push(this.blocks(children));
    }
    lines.push('[[/component]]');
    return lines.join('\n');
  }

  private continuesLine(previous: Block, block: Block, text: string): boolean {
    return (
      (previous.type === 'math' || previous.type === 'component') &&
      block.type === 'paragraph' &&
      opensConstruct(text)
    );
  }

  private fence(tag: string, content: string): string {
    const lines = ['```' + tag];
    if (content.length > 0) {
      lines.push(content);
    }
    lines.push('```');
    return lines.join('\n');
  }

  private list({ items, ordered }: ListBlock): string {
    return items.map((item, index) => this.listItem(item, ordered ? `${index + 1}. ` : '- ')).join('\n');
  }

  /**
   * The marker line holds the item's paragraph and components; nested
   * lists follow on their own lines.
   */
  private listItem(item: ListItem, marker: string): string {
    const inline: string[] = [];
    const nested: string[] = [];
    for (const block of item.content) {
      if (block.type === 'list') {
        nested.push(this.list(block));
      } else {
        inline.push(this.block(block));
      }
    }
    const line = '  '.repeat(item.level) + marker + inline.join(' ');
    return [line, ...nested].join('\n');
  }
}

/**
 * Render a document tree as MetaMark text.
 *
 * @throws {RenderError} When the tree contains a `secure` block.
 */
export function renderDocument(doc: Document): string {
  return new MetaMarkRenderer().render(doc);
}
