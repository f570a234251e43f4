/**
 * Folder statistics, cross-folder mention detection and the vault health score
 */

import type {
  BacklinkIndex,
  FolderStats,
  HealthInputs,
  Note,
  NoteCollection,
  TopicCount,
  VaultAnalysis,
} from '../types.js';
import { LinkGraph, isOrphaned } from '../graph/builder.js';
import { NoteLoader, type LoaderOptions } from '../vault/loader.js';
import { log } from '../log.js';

const TOP_TOPICS = 10;

export const HEALTH_WEIGHTS = {
  linking: 0.3,
  nonOrphaned: 0.3,
  crossFolder: 0.2,
  structure: 0.2,
} as const;

/**
 * Aggregate the notes of one folder. Orphan status is judged against the
 * vault-wide backlink index.
 */
export function analyzeFolder(name: string, notes: readonly Note[], backlinks: BacklinkIndex): FolderStats {
  const topicCounts = new Map<string, number>();
  for (const note of notes) {
    for (const { category, keyword } of note.topics) {
      const key = `${category}:${keyword}`;
      topicCounts.set(key, (topicCounts.get(key) ?? 0) + 1);
    }
  }

  // Map iteration is first-seen order and sort is stable, so ties keep it
  const topTopics: TopicCount[] = Array.from(topicCounts, ([topic, count]) => ({ topic, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, TOP_TOPICS);

  return {
    name,
    noteCount: notes.length,
    totalWords: notes.reduce((sum, note) => sum + note.wordCount, 0),
    totalLinks: notes.reduce((sum, note) => sum + note.links.length, 0),
    notesWithCode: notes.filter(note => note.codeBlocks.length > 0).length,
    topTopics,
    orphanedNotes: notes.filter(note => isOrphaned(note, backlinks)).map(note => note.name),
    notes: notes.map(note => note.name),
  };
}

/**
 * For every note, the notes of other folders whose name appears in its
 * content (case-insensitive substring) without an existing link. Entries read
 * `"<target> (in <folder>)"`.
 */
export function findCrossFolderConnections(notes: NoteCollection): Record<string, string[]> {
  const connections: Record<string, string[]> = {};

  for (const [name, note] of notes) {
    const contentLower = note.content.toLowerCase();

    for (const [otherName, other] of notes) {
      if (otherName === name || other.folder === note.folder) continue;
      if (note.links.includes(otherName)) continue;

      if (contentLower.includes(otherName.toLowerCase())) {
        (connections[name] ??= []).push(`${otherName} (in ${other.folder})`);
      }
    }
  }

  return connections;
}

/**
 * Vault health on a 0-100 scale, rounded to one decimal:
 *
 *   100 * (0.3 * linking + 0.3 * nonOrphaned + 0.2 * crossFolder + 0.2 * structure)
 *
 * linking = notes with an outgoing link / N, nonOrphaned = 1 - orphans / N,
 * crossFolder = notes with a cross-folder opportunity / N,
 * structure = notes with a heading / N. Each ratio is clamped to [0, 1].
 */
export function calculateHealthScore(inputs: HealthInputs): number {
  const total = inputs.totalNotes;
  if (total <= 0) return 0;

  const linking = clamp(inputs.notesWithLinks / total);
  const nonOrphaned = clamp(1 - inputs.orphanedNotes / total);
  const crossFolder = clamp(inputs.notesWithCrossFolderOpportunities / total);
  const structure = clamp(inputs.notesWithHeadings / total);

  const score = (
    linking * HEALTH_WEIGHTS.linking +
    nonOrphaned * HEALTH_WEIGHTS.nonOrphaned +
    crossFolder * HEALTH_WEIGHTS.crossFolder +
    structure * HEALTH_WEIGHTS.structure
  ) * 100;

  return Math.round(score * 10) / 10;
}

/**
 * Group notes by the folder that directly contains them, folders sorted by name
 */
export function groupByFolder(notes: NoteCollection): Map<string, Note[]> {
  const groups = new Map<string, Note[]>();
  for (const note of notes.values()) {
    const group = groups.get(note.folder);
    if (group) {
      group.push(note);
    } else {
      groups.set(note.folder, [note]);
    }
  }
  return new Map(Array.from(groups).sort(([a], [b]) => a.localeCompare(b)));
}

/**
 * Assemble a VaultAnalysis from an already loaded collection. With `folders`,
 * only notes in those folders are reported, but links from the rest of the
 * vault still count as backlinks and as cross-folder targets.
 */
export function summarizeVault(vaultPath: string, notes: NoteCollection, folders?: readonly string[]): VaultAnalysis {
  const graph = new LinkGraph(notes);
  const inScope = (note: Note) => !folders || folders.length === 0 || folders.includes(note.folder);
  const reported = Array.from(notes.values()).filter(inScope);

  const folderStats = Array.from(groupByFolder(notes))
    .filter(([, folderNotes]) => folderNotes.some(inScope))
    .map(([folder, folderNotes]) => analyzeFolder(folder, folderNotes, graph.backlinks));
  const crossFolderSuggestions = Object.fromEntries(
    Object.entries(findCrossFolderConnections(notes)).filter(([name]) => {
      const note = notes.get(name);
      return note !== undefined && inScope(note);
    }));
  const orphaned = folderStats.reduce((sum, stats) => sum + stats.orphanedNotes.length, 0);

  return {
    vaultPath,
    analysisDate: new Date().toISOString(),
    totalFolders: folderStats.length,
    totalNotes: reported.length,
    totalWords: folderStats.reduce((sum, stats) => sum + stats.totalWords, 0),
    totalLinks: folderStats.reduce((sum, stats) => sum + stats.totalLinks, 0),
    globalOrphanedNotes: orphaned,
    folderStats,
    crossFolderSuggestions,
    vaultHealthScore: calculateHealthScore({
      totalNotes: reported.length,
      notesWithLinks: reported.filter(note => note.links.length > 0).length,
      orphanedNotes: orphaned,
      notesWithCrossFolderOpportunities: Object.keys(crossFolderSuggestions).length,
      notesWithHeadings: reported.filter(note => note.headings.length > 0).length,
    }),
  };
}

export class VaultAnalyzer {
  private vaultPath: string;
  private loader: NoteLoader;

  constructor(vaultPath: string, options: LoaderOptions = {}) {
    this.vaultPath = vaultPath;
    this.loader = new NoteLoader(options);
  }

  /**
   * Analyze the whole vault, or only the notes whose folder is listed.
   * Returns null when no notes are found.
   */
  async analyze(folders?: readonly string[]): Promise<VaultAnalysis | null> {
    const notes = await this.loader.load(this.vaultPath);
    const analysis = summarizeVault(this.vaultPath, notes, folders);

    if (analysis.totalNotes === 0) {
      log('analysis', `No analyzable notes found in ${this.vaultPath}`, 'warn');
      return null;
    }

    log('analysis', `Analyzed ${analysis.totalNotes} notes in ${analysis.totalFolders} folders (health ${analysis.vaultHealthScore})`);
    return analysis;
  }
}

function clamp(value: number): number {
  return Math.min(1, Math.max(0, value));
}
