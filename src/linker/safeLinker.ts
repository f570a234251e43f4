/**
 * Batch link insertion with a safety gate, backup and per-file fallback.
 *
 * ANALYZE -> SAFETY_CHECK -> BACKUP (skipped on dry runs) -> APPLY -> SUMMARY
 */

import { promises as fs } from 'node:fs';
import type { LinkSuggestion, Note, NoteCollection } from '../types.js';
import { NoteLoader, type LoaderOptions } from '../vault/loader.js';
import { findLinkSuggestions } from '../suggest/links.js';
import { applyEdits, describeEdit, planLinkInsertions, type TextEdit } from './textEdits.js';
import { assessSafety, type SafetyLevel, type SafetyReport } from './safety.js';
import { BackupStore } from './backup.js';
import { log, errorMessage } from '../log.js';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.8;

/** File access used when rewriting notes */
export interface NoteFileSystem {
  readFile(absPath: string): Promise<string>;
  writeFile(absPath: string, content: string): Promise<void>;
}

export const nodeFileSystem: NoteFileSystem = {
  readFile: absPath => fs.readFile(absPath, 'utf8'),
  writeFile: (absPath, content) => fs.writeFile(absPath, content, 'utf8'),
};

export interface SafeAutoLinkerConfig {
  vaultPath: string;
  backupDir: string;
  safetyLevel?: SafetyLevel;
  loader?: LoaderOptions;
  fileSystem?: NoteFileSystem;
}

export interface AutoLinkOptions {
  /** Vault-relative folder to process; the whole vault when omitted */
  folder?: string;
  confidenceThreshold?: number;
  dryRun?: boolean;
}

export type AutoLinkResult =
  | { status: 'no_notes'; message: string }
  | { status: 'no_suggestions'; message: string }
  | { status: 'rejected'; message: string; safety: SafetyReport }
  | {
      status: 'applied';
      dryRun: boolean;
      backupId: string | null;
      safety: SafetyReport;
      /** Note name to the changes made (or that would be made) in it */
      results: Record<string, string[]>;
      totalChanges: number;
      failed: string[];
    };

interface NotePlan {
  note: Note;
  edits: TextEdit[];
}

export class SafeAutoLinker {
  readonly backups: BackupStore;
  private vaultPath: string;
  private safetyLevel: SafetyLevel;
  private loader: NoteLoader;
  private fileSystem: NoteFileSystem;

  constructor(config: SafeAutoLinkerConfig) {
    this.vaultPath = config.vaultPath;
    this.safetyLevel = config.safetyLevel ?? 'conservative';
    this.loader = new NoteLoader(config.loader);
    this.fileSystem = config.fileSystem ?? nodeFileSystem;
    this.backups = new BackupStore(config.vaultPath, config.backupDir);
  }

  /**
   * Load a folder, compute link suggestions for every note and insert the
   * ones at or above the confidence threshold.
   */
  async autoLinkFolder(options: AutoLinkOptions = {}): Promise<AutoLinkResult> {
    const folder = options.folder ?? '';
    const notes = await this.loader.load(this.vaultPath, folder);
    if (notes.size === 0) {
      return { status: 'no_notes', message: `No notes found in '${folder || this.vaultPath}'` };
    }

    const suggestions = new Map<string, LinkSuggestion[]>();
    for (const name of notes.keys()) {
      suggestions.set(name, findLinkSuggestions(notes, name));
    }

    return this.applySuggestions(notes, suggestions, options);
  }

  /**
   * Insert links for suggestions produced elsewhere, under the same safety
   * policy. `suggestions` maps a source note name to its suggestions.
   */
  async applySuggestions(
    notes: NoteCollection,
    suggestions: ReadonlyMap<string, readonly LinkSuggestion[]>,
    options: AutoLinkOptions = {},
  ): Promise<AutoLinkResult> {
    const threshold = options.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    const dryRun = options.dryRun ?? true;

    // ANALYZE
    const plans: NotePlan[] = [];
    let accepted = 0;
    for (const [name, noteSuggestions] of suggestions) {
      const note = notes.get(name);
      if (!note) continue;
      const targets = [...noteSuggestions]
        .filter(s => s.confidence >= threshold)
        .sort((a, b) => b.confidence - a.confidence)
        .map(s => s.targetNote);
      if (targets.length === 0) continue;
      accepted += targets.length;

      const edits = planLinkInsertions(note.content, targets);
      if (edits.length > 0) {
        plans.push({ note, edits });
      }
    }

    if (accepted === 0) {
      log('linker', `No link suggestions at or above ${threshold}`);
      return { status: 'no_suggestions', message: `No link suggestions at or above confidence ${threshold}` };
    }

    // SAFETY_CHECK
    const changeCount = plans.reduce((sum, plan) => sum + plan.edits.length, 0);
    const safety = assessSafety(this.safetyLevel, plans.length, changeCount);
    if (!safety.isSafe) {
      log('linker', `Safety limit exceeded (${this.safetyLevel}): ${safety.blockers.join('; ')}`, 'warn');
      return { status: 'rejected', message: 'Safety limit exceeded', safety };
    }

    // BACKUP
    let backupId: string | null = null;
    if (!dryRun && plans.length > 0) {
      const manifest = await this.backups.create(plans.map(plan => plan.note.relPath), this.safetyLevel);
      backupId = manifest.backupId;
    }

    // APPLY
    const results: Record<string, string[]> = {};
    const failed: string[] = [];
    for (const plan of plans) {
      const changes = dryRun ? plan.edits.map(describeEdit) : await this.applyPlan(plan);
      if (changes === null) {
        failed.push(plan.note.name);
      } else if (changes.length > 0) {
        results[plan.note.name] = changes;
      }
    }

    // SUMMARY
    const totalChanges = Object.values(results).reduce((sum, changes) => sum + changes.length, 0);
    log('linker', `${dryRun ? 'Would apply' : 'Applied'} ${totalChanges} links in ${Object.keys(results).length} files` +
      (backupId ? ` (backup ${backupId})` : ''));

    return { status: 'applied', dryRun, backupId, safety, results, totalChanges, failed };
  }

  /**
   * Re-read the file and write the planned edits. A file that changed since
   * it was analyzed is left alone. Returns null when the file was skipped or
   * could not be read or written.
   */
  private async applyPlan(plan: NotePlan): Promise<string[] | null> {
    const { absPath, relPath } = plan.note;

    let raw: string;
    try {
      raw = await this.fileSystem.readFile(absPath);
    } catch (error) {
      log('linker', `Error reading ${relPath}: ${errorMessage(error)}`, 'warn');
      return null;
    }

    // The loader drops a byte order mark when decoding; keep it on write
    const bom = raw.startsWith('\uFEFF') ? '\uFEFF' : '';
    const current = raw.slice(bom.length);
    if (current !== plan.note.content) {
      log('linker', `${relPath} changed since it was analyzed; skipping`, 'warn');
      return null;
    }

    const { edits } = plan;
    try {
      await this.fileSystem.writeFile(absPath, bom + applyEdits(current, edits));
    } catch (error) {
      log('linker', `Error writing ${relPath}: ${errorMessage(error)}`, 'warn');
      await this.restore(absPath, raw);
      return null;
    }

    return edits.map(describeEdit);
  }

  private async restore(absPath: string, content: string): Promise<void> {
    try {
      await this.fileSystem.writeFile(absPath, content);
    } catch (error) {
      log('linker', `Could not restore ${absPath}; recover it from the backup: ${errorMessage(error)}`, 'error');
    }
  }
}
