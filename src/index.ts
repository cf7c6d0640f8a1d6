/**
 * metamark - parser for MetaMark, a Markdown dialect with frontmatter
 * metadata, components, annotations, diagrams and math
 */

// High-level document API
export { parseDocument, describeDocument, formatDocument, countWords } from './document';

// Types
export type { DocumentInfo } from './types';

// Core module re-exports
export * from './core/index';
