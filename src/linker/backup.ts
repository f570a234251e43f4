/**
 * Backup snapshots taken before notes are rewritten, and rollback from them.
 * A backup directory is written once and afterwards only read.
 */

import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod/v4';
import { SAFETY_LEVELS, type SafetyLevel } from './safety.js';
import { log, errorMessage } from '../log.js';

export const MANIFEST_FILE = 'metadata.json';
export const BACKUP_PREFIX = 'safe_backup_';

const BACKUP_ID = /^[\w.-]+$/;

export const backupManifestSchema = z.object({
  backupId: z.string().regex(BACKUP_ID),
  timestamp: z.string(),
  safetyLevel: z.enum(SAFETY_LEVELS),
  files: z.array(z.object({
    path: z.string().min(1),
    hash: z.string().regex(/^[0-9a-f]{64}$/),
    size: z.number().int().nonnegative(),
  })),
});

export type BackupManifest = z.infer<typeof backupManifestSchema>;

export type RollbackResult =
  | { status: 'unconfirmed' }
  | { status: 'not_found'; backupId: string }
  | { status: 'restored'; backupId: string; restored: number; missing: string[] };

export interface VerifyResult {
  backupId: string;
  ok: boolean;
  mismatched: string[];
}

export class BackupStore {
  private vaultPath: string;
  private backupDir: string;

  constructor(vaultPath: string, backupDir: string) {
    this.vaultPath = path.resolve(vaultPath);
    this.backupDir = path.resolve(backupDir);
  }

  /**
   * Copy the given vault-relative files into a new backup directory and
   * write its manifest. Files that no longer exist are left out. Any other
   * failure throws, so the caller must not go on to modify the notes.
   */
  async create(relPaths: readonly string[], safetyLevel: SafetyLevel, now: Date = new Date()): Promise<BackupManifest> {
    await fs.mkdir(this.backupDir, { recursive: true });
    const { backupId, dir } = await this.reserveDirectory(formatTimestamp(now));

    const manifest: BackupManifest = {
      backupId,
      timestamp: now.toISOString(),
      safetyLevel,
      files: [],
    };

    for (const relPath of relPaths) {
      const source = this.resolveInside(this.vaultPath, relPath);
      let bytes: Buffer;
      try {
        bytes = await fs.readFile(source);
      } catch (error) {
        if (isMissing(error)) {
          log('backup', `Skipping missing file ${relPath}`, 'warn');
          continue;
        }
        throw error;
      }

      const destination = this.resolveInside(dir, relPath);
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.writeFile(destination, bytes, { flag: 'wx' });

      manifest.files.push({ path: relPath, hash: sha256(bytes), size: bytes.length });
    }

    await fs.writeFile(path.join(dir, MANIFEST_FILE), JSON.stringify(manifest, null, 2), { flag: 'wx' });
    log('backup', `Backup ${backupId} created: ${manifest.files.length} files`);
    return manifest;
  }

  /**
   * All readable backups, newest first. Unreadable manifests are skipped.
   */
  async list(): Promise<BackupManifest[]> {
    let entries;
    try {
      entries = await fs.readdir(this.backupDir, { withFileTypes: true });
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }

    const manifests: BackupManifest[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || !entry.name.startsWith(BACKUP_PREFIX)) continue;
      const manifest = await this.tryRead(entry.name);
      if (manifest) manifests.push(manifest);
    }

    return manifests.sort((a, b) =>
      b.timestamp.localeCompare(a.timestamp) || b.backupId.localeCompare(a.backupId));
  }

  /**
   * Read and validate a manifest. Throws when missing or malformed.
   */
  async read(backupId: string): Promise<BackupManifest> {
    const raw = await fs.readFile(path.join(this.backupPath(backupId), MANIFEST_FILE), 'utf8');
    return backupManifestSchema.parse(JSON.parse(raw));
  }

  /**
   * Re-hash every backed-up copy against its manifest entry
   */
  async verify(backupId: string): Promise<VerifyResult> {
    const manifest = await this.read(backupId);
    const dir = this.backupPath(backupId);
    const mismatched: string[] = [];

    for (const file of manifest.files) {
      try {
        const bytes = await fs.readFile(this.resolveInside(dir, file.path));
        if (bytes.length !== file.size || sha256(bytes) !== file.hash) {
          mismatched.push(file.path);
        }
      } catch (error) {
        log('backup', `Cannot verify ${file.path}: ${errorMessage(error)}`, 'warn');
        mismatched.push(file.path);
      }
    }

    return { backupId, ok: mismatched.length === 0, mismatched };
  }

  /**
   * Copy every recorded file back to its place in the vault. Requires
   * `confirm`. The backup itself is kept.
   */
  async rollback(backupId: string, confirm: boolean): Promise<RollbackResult> {
    if (!confirm) {
      log('backup', 'Rollback requires explicit confirmation', 'warn');
      return { status: 'unconfirmed' };
    }

    let manifest: BackupManifest;
    try {
      manifest = await this.read(backupId);
    } catch (error) {
      if (isMissing(error)) {
        log('backup', `Backup not found: ${backupId}`, 'warn');
        return { status: 'not_found', backupId };
      }
      throw new Error(`Backup ${backupId} is unreadable: ${errorMessage(error)}`);
    }

    // Every path is checked before the first copy; an escaping entry refuses the whole rollback.
    const dir = this.backupPath(backupId);
    const copies = manifest.files.map(file => ({
      file,
      source: this.resolveInside(dir, file.path),
      destination: this.resolveInside(this.vaultPath, file.path),
    }));

    const missing: string[] = [];
    let restored = 0;

    for (const { file, source, destination } of copies) {
      try {
        await fs.mkdir(path.dirname(destination), { recursive: true });
        await fs.copyFile(source, destination);
        restored++;
      } catch (error) {
        log('backup', `Cannot restore ${file.path}: ${errorMessage(error)}`, 'warn');
        missing.push(file.path);
      }
    }

    log('backup', `Rollback of ${backupId} complete: ${restored} files restored`);
    return { status: 'restored', backupId, restored, missing };
  }

  private async tryRead(backupId: string): Promise<BackupManifest | null> {
    try {
      return await this.read(backupId);
    } catch (error) {
      log('backup', `Unreadable backup ${backupId}: ${errorMessage(error)}`, 'warn');
      return null;
    }
  }

  private backupPath(backupId: string): string {
    if (!BACKUP_ID.test(backupId)) {
      throw new Error(`Invalid backup id: ${backupId}`);
    }
    return path.join(this.backupDir, backupId);
  }

  /**
   * Create the backup directory, suffixing the id when one already exists
   * for the same second.
   */
  private async reserveDirectory(stamp: string): Promise<{ backupId: string; dir: string }> {
    for (let attempt = 0; ; attempt++) {
      const backupId = attempt === 0 ? `${BACKUP_PREFIX}${stamp}` : `${BACKUP_PREFIX}${stamp}_${attempt}`;
      const dir = path.join(this.backupDir, backupId);
      try {
        await fs.mkdir(dir);
        return { backupId, dir };
      } catch (error) {
        if (!isAlreadyExists(error)) throw error;
      }
    }
  }

  private resolveInside(root: string, relPath: string): string {
    const resolved = path.resolve(root, relPath);
    const relative = path.relative(root, resolved);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`Path escapes ${root}: ${relPath}`);
    }
    return resolved;
  }
}

export function sha256(bytes: Buffer | string): string {
  return createHash('sha256').update(bytes).digest('hex');
}

/** YYYYMMDD_HHMMSS in local time */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isMissing(error: unknown): boolean {
  return errorCode(error) === 'ENOENT';
}

function isAlreadyExists(error: unknown): boolean {
  return errorCode(error) === 'EEXIST';
}
