import type { DiagramKind } from './core/types';

/**
 * Summary facts about a parsed document.
 */
export interface DocumentInfo {
  /** Metadata `title`, else the first heading, else `"Untitled"` */
  title: string;
  /** Approximate word count of heading and paragraph text */
  wordCount: number;
  /** Distinct code fence languages, in order of first appearance */
  languages: string[];
  /** Distinct diagram kinds, in order of first appearance */
  diagrams: DiagramKind[];
  /** Distinct component names, in order of first appearance */
  components: string[];
  /** Number of annotations on headings and paragraphs */
  annotationCount: number;
  /** Whether the document contains inline or block math */
  hasMath: boolean;
  /** Number of blocks at every depth */
  blockCount: number;
}
