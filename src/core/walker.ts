/**
 * Depth-first traversal of document blocks.
 *
 * @module core/walker
 */
import type { Block } from './types';

/**
 * Called for every block. `depth` is 0 for top-level blocks and grows by one
 * inside each component and list item.
 */
export type BlockVisitor = (block: Block, depth: number) => void;

/**
 * Walk a block tree depth-first, visiting each block before its children.
 *
 * Children are component content and the content of every list item.
 */
export function walkBlocks(blocks: readonly Block[], visitor: BlockVisitor, depth = 0): void {
  for (const block of blocks) {
    visitor(block, depth);

    if (block.type === 'component') {
      walkBlocks(block.content, visitor, depth + 1);
    } else if (block.type === 'list') {
      for (const item of block.items) {
        walkBlocks(item.content, visitor, depth + 1);
      }
    }
  }
}
