import { MetaMarkRenderer, renderDocument } from '../../src/core/renderer';
import { parseMetaMark } from '../../src/core/parser';
import { RenderError } from '../../src/core/errors';
import type { Block } from '../../src/core/types';

function render(...blocks: Block[]): string {
  return renderDocument({ blocks });
}

describe('renderDocument', () => {
  // ---------------------------------------------------------------------------
  // Blocks
  // ---------------------------------------------------------------------------

  it('should render an empty document as an empty string', () => {
    expect(renderDocument({ blocks: [] })).toBe('');
  });

  it.each([1, 2, 3, 4, 5, 6] as const)('renders h%i with its annotations', (level) => {
    const output = render({
      type: 'heading',
      level,
      content: 'Intro',
      annotations: [{ kind: 'status', content: 'draft' }],
    });
    expect(output).toBe(`${'#'.repeat(level)} Intro @[status: draft]\n`);
  });

  it('should render inline nodes in a paragraph', () => {
    const output = render({
      type: 'paragraph',
      content: [
        { type: 'text', value: 'See ' },
        { type: 'bold', child: { type: 'text', value: 'this' } },
        { type: 'text', value: ', ' },
        { type: 'italic', child: { type: 'text', value: 'that' } },
        { type: 'text', value: ' and ' },
        { type: 'code', value: 'x' },
        { type: 'text', value: ' at ' },
        { type: 'link', text: 'docs', url: 'https://example.com' },
        { type: 'text', value: ' ' },
        { type: 'math', value: 'y' },
      ],
      annotations: [],
    });
    expect(output).toBe('See **this**, *that* and `x` at [docs](https://example.com) $y$\n');
  });

  it('should render a paragraph holding only annotations', () => {
    expect(render({ type: 'paragraph', content: [], annotations: [{ kind: 'todo', content: 'expand' }] })).toBe(
      '@[todo: expand]\n',
    );
  });

  it('should render components with quoted attributes', () => {
    const output = render({
      type: 'component',
      name: 'card',
      attributes: { title: 'Hi' },
      content: [{ type: 'paragraph', content: [{ type: 'text', value: 'Hello' }], annotations: [] }],
    });
    expect(output).toBe('[[component: card title="Hi"]]\nHello\n[[/component]]\n');
  });

  it('should render code and diagram fences', () => {
    expect(render({ type: 'code', language: 'ts', content: 'let x = 1;' })).toBe('```ts\nlet x = 1;\n```\n');
    expect(render({ type: 'code', content: '' })).toBe('```\n```\n');
    expect(render({ type: 'diagram', kind: 'graphviz', content: 'digraph {}' })).toBe(
      '```graphviz\ndigraph {}\n```\n',
    );
  });

  it('should render comments and block math', () => {
    expect(render({ type: 'comment', value: 'draft' }, { type: 'math', value: 'a + b' })).toBe(
      '%% draft\n\n$$a + b$$\n',
    );
  });

  it('should re-indent nested lists', () => {
    expect(renderDocument(parseMetaMark('- a\n   - b\n- c\n'))).toBe('- a\n  - b\n- c\n');
  });

  it('should number ordered items from one', () => {
    expect(renderDocument(parseMetaMark('3. x\n7. y'))).toBe('1. x\n2. y\n');
  });

  it('should render metadata as YAML frontmatter', () => {
    expect(renderDocument({ metadata: { title: 'Notes' }, blocks: [] })).toBe('---\ntitle: Notes\n---\n');
  });

  it('should raise RenderError for a secure block', () => {
    const secure: Block = {
      type: 'secure',
      content: new Uint8Array([1, 2, 3]),
      encryptionInfo: { algorithm: 'aes-256-gcm', keyId: 'test-key', nonce: new Uint8Array(12) },
    };
    expect(() => render(secure)).toThrow(RenderError);
    expect(() => render(secure)).toThrow('Render error: Secure block (aes-256-gcm) has no MetaMark text form');
  });

  // ---------------------------------------------------------------------------
  // Round trip
  // ---------------------------------------------------------------------------

  describe('round trip', () => {
    const source = [
      '---',
      'title: Guide',
      'tags:',
      '  - intro',
      '---',
      '# Getting started @[status: draft]',
      '',
      'Read **this** first, then *that* with `code` and [docs](https://example.com/docs).',
      '',
      '[[component: callout tone="info"]]',
      'Remember $x^2$ here.',
      '[[/component]]',
      '',
      '- one',
      '  1. nested',
      '- two',
      '',
      '```ts',
      'const x = 1;',
      '```',
      '',
      '```mermaid',
      'graph TD',
      '```',
      '',
      '%% reviewer note',
      '',
      '$$a + b$$',
      '',
    ].join('\n');

    it('should parse rendered output back to an equal tree', () => {
      const doc = parseMetaMark(source);
      expect(parseMetaMark(renderDocument(doc))).toEqual(doc);
    });

    it('should reproduce canonical input exactly', () => {
      expect(new MetaMarkRenderer().render(parseMetaMark(source))).toBe(source);
    });

    it.each([
      '$$x$$ ---\n',
      '$$x$$ - a\n',
      '$$x$$ %% note\n',
      '$$x$$ # x\n',
      '$$x$$ ```js\n',
      '[[component: c]] 1. x\n[[/component]]\n',
      '[[component: c]] # x\n[[/component]]\n',
      '[[component: c]]\n[[/component]] - a\n',
    ])('should keep a construct-like paragraph on its marker line in %j', (input) => {
      const doc = parseMetaMark(input);
      const output = renderDocument(doc);
      expect(output).toBe(input);
      expect(parseMetaMark(output)).toEqual(doc);
    });

    it('should move an ordinary paragraph after block math to its own block', () => {
      expect(renderDocument(parseMetaMark('$$x$$ hello\n'))).toBe('$$x$$\n\nhello\n');
    });
  });
});
