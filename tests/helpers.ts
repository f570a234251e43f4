import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { NoteParser } from '../src/parser/markdown.js';
import type { Note } from '../src/types.js';

const parser = new NoteParser();

/**
 * Parse an in-memory vault, keyed by vault-relative path, into a collection
 */
export function buildNotes(files: Record<string, string>): Map<string, Note> {
  const notes = new Map<string, Note>();
  for (const [relPath, content] of Object.entries(files)) {
    const note = parser.parse(content, relPath, path.join('/vault', relPath));
    notes.set(note.name, note);
  }
  return notes;
}

export async function makeTempDir(prefix = 'vault-linker-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function writeVault(root: string, files: Record<string, string>): Promise<void> {
  for (const [relPath, content] of Object.entries(files)) {
    const absPath = path.join(root, relPath);
    await fs.mkdir(path.dirname(absPath), { recursive: true });
    await fs.writeFile(absPath, content, 'utf8');
  }
}
