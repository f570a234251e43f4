/**
 * Core types for the vault link analyzer
 */

export interface Heading {
  level: number;
  text: string;
  line: number;
}

export interface CodeBlock {
  /** Empty string when the opening fence carries no language token */
  language: string;
  code: string;
}

export interface TopicTag {
  category: string;
  keyword: string;
}

/** Category name to the keywords that identify it, matched case-insensitively */
export type TopicTaxonomy = Readonly<Record<string, readonly string[]>>;

export interface Note {
  readonly name: string;
  readonly relPath: string;
  readonly absPath: string;
  readonly folder: string;
  readonly content: string;
  readonly frontmatter: Readonly<Record<string, unknown>>;
  readonly wordCount: number;
  readonly lineCount: number;
  readonly links: readonly string[];
  readonly tags: readonly string[];
  readonly headings: readonly Heading[];
  readonly codeBlocks: readonly CodeBlock[];
  readonly topics: readonly TopicTag[];
}

export type NoteCollection = ReadonlyMap<string, Note>;

/** Note name to the names of the notes linking to it */
export type BacklinkIndex = ReadonlyMap<string, ReadonlySet<string>>;

export interface LinkSuggestion {
  targetNote: string;
  contextSnippets: string[];
  confidence: number;
  mentionCount: number;
}

export type StructureSuggestionType =
  | 'add_headings'
  | 'heading_hierarchy'
  | 'code_organization'
  | 'code_language_tags'
  | 'topic_sections'
  | 'add_tags';

export interface StructureSuggestion {
  suggestionType: StructureSuggestionType;
  description: string;
  examples?: string[];
}

export interface NoteRecommendations {
  noteName: string;
  linkSuggestions: LinkSuggestion[];
  structureSuggestions: StructureSuggestion[];
  noteInfo: {
    wordCount: number;
    currentLinks: number;
    headings: number;
    codeBlocks: number;
    topics: TopicTag[];
  };
}

export interface TopicCount {
  topic: string;
  count: number;
}

export interface FolderStats {
  readonly name: string;
  readonly noteCount: number;
  readonly totalWords: number;
  readonly totalLinks: number;
  readonly notesWithCode: number;
  readonly topTopics: readonly TopicCount[];
  readonly orphanedNotes: readonly string[];
  readonly notes: readonly string[];
}

export interface HealthInputs {
  totalNotes: number;
  notesWithLinks: number;
  orphanedNotes: number;
  notesWithCrossFolderOpportunities: number;
  notesWithHeadings: number;
}

export interface VaultAnalysis {
  readonly vaultPath: string;
  readonly analysisDate: string;
  readonly totalFolders: number;
  readonly totalNotes: number;
  readonly totalWords: number;
  readonly totalLinks: number;
  readonly globalOrphanedNotes: number;
  readonly folderStats: readonly FolderStats[];
  readonly crossFolderSuggestions: Readonly<Record<string, readonly string[]>>;
  readonly vaultHealthScore: number;
}

export interface GraphNode {
  name: string;
  relPath: string;
  tags: readonly string[];
  outlinks: string[];
  inlinks: string[];
}

export interface GraphStats {
  totalNodes: number;
  totalEdges: number;
  orphanedNodes: number;
  averageConnections: number;
  density: number;
  components: number;
}
