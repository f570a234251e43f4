/**
 * Filesystem note loader: walks a vault directory and parses every Markdown
 * note into a Note record keyed by name.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { Note, TopicTaxonomy } from '../types.js';
import { NoteParser, NOTE_EXTENSION } from '../parser/markdown.js';
import { DEFAULT_TAXONOMY } from '../parser/taxonomy.js';
import { log, errorMessage } from '../log.js';

export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  '.obsidian',
  '.git',
  '.vscode',
  '.trash',
  '__pycache__',
  'node_modules',
];

export interface LoaderOptions {
  taxonomy?: TopicTaxonomy;
  /** Directory names containing any of these substrings are skipped */
  excludePatterns?: readonly string[];
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

export class NoteLoader {
  private parser: NoteParser;
  private excludePatterns: readonly string[];

  constructor(options: LoaderOptions = {}) {
    this.parser = new NoteParser(options.taxonomy ?? DEFAULT_TAXONOMY);
    this.excludePatterns = options.excludePatterns ?? DEFAULT_EXCLUDE_PATTERNS;
  }

  /**
   * List note files under `root` (optionally restricted to the `scope`
   * subdirectory), as POSIX paths relative to `root`, sorted.
   */
  async listNoteFiles(root: string, scope = ''): Promise<string[]> {
    const results: string[] = [];
    await this.walk(root, path.join(root, scope), results);
    return results.sort();
  }

  /**
   * Load every note under `root`, or under `root/scope` when given. A missing
   * directory yields an empty collection. Unreadable files are skipped.
   */
  async load(root: string, scope = ''): Promise<Map<string, Note>> {
    const notes = new Map<string, Note>();
    const start = path.join(root, scope);

    if (!(await isDirectory(start))) {
      log('loader', `Folder not found: ${start}`, 'warn');
      return notes;
    }

    for (const relPath of await this.listNoteFiles(root, scope)) {
      const note = await this.tryReadNote(root, relPath);
      if (!note) continue;

      const previous = notes.get(note.name);
      if (previous) {
        log('loader', `Note name '${note.name}' is used by both ${previous.relPath} and ${note.relPath}; keeping ${note.relPath}`, 'warn');
      }
      notes.set(note.name, note);
    }

    log('loader', `Loaded ${notes.size} notes from ${start}`);
    return notes;
  }

  /**
   * Read and parse a single note. Throws when the file cannot be read or is
   * not valid UTF-8.
   */
  async readNote(root: string, relPath: string): Promise<Note> {
    const absPath = path.join(root, relPath);
    const bytes = await fs.readFile(absPath);
    const content = utf8.decode(bytes);
    return this.parser.parse(content, relPath, absPath);
  }

  private async tryReadNote(root: string, relPath: string): Promise<Note | null> {
    try {
      return await this.readNote(root, relPath);
    } catch (error) {
      log('loader', `Error reading ${relPath}: ${errorMessage(error)}`, 'warn');
      return null;
    }
  }

  private isExcluded(dirName: string): boolean {
    return dirName.startsWith('.') || this.excludePatterns.some(pattern => dirName.includes(pattern));
  }

  private async walk(root: string, dir: string, results: string[]): Promise<void> {
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      log('loader', `Cannot list ${dir}: ${errorMessage(error)}`, 'warn');
      return;
    }

    for (const entry of entries) {
      const absPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!this.isExcluded(entry.name)) {
          await this.walk(root, absPath, results);
        }
      } else if (entry.isFile() && entry.name.endsWith(NOTE_EXTENSION)) {
        results.push(path.relative(root, absPath).split(path.sep).join('/'));
      }
    }
  }
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}
