import { walkBlocks } from '../../src/core/walker';
import { parseMetaMark } from '../../src/core/parser';

describe('walkBlocks', () => {
  it('should visit blocks depth-first with their depth', () => {
    const doc = parseMetaMark('# A\n[[component: box]]\n- item\n[[/component]]\n%% done');
    const visited: string[] = [];

    walkBlocks(doc.blocks, (block, depth) => {
      visited.push(`${depth}:${block.type}`);
    });

    expect(visited).toEqual(['0:heading', '0:component', '1:list', '2:paragraph', '0:comment']);
  });

  it('should not call the visitor for an empty tree', () => {
    const visitor = jest.fn();
    walkBlocks([], visitor);
    expect(visitor).not.toHaveBeenCalled();
  });
});
