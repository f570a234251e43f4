import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { SafeAutoLinker, nodeFileSystem, type NoteFileSystem } from '../src/linker/safeLinker.js';
import { NoteLoader } from '../src/vault/loader.js';
import { makeTempDir, writeVault } from './helpers.js';

describe('SafeAutoLinker', () => {
  let root: string;
  let vault: string;
  let backupDir: string;

  const read = (relPath: string) => fs.readFile(path.join(vault, relPath), 'utf8');

  beforeEach(async () => {
    root = await makeTempDir();
    vault = path.join(root, 'vault');
    backupDir = path.join(root, 'backups');
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('autoLinkFolder', () => {
    beforeEach(async () => {
      await writeVault(vault, {
        'Notes.md': 'I use Widget every day.',
        'Widget.md': 'A reusable part.',
      });
    });

    it('should report planned changes without writing on a dry run', async () => {
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir });

      const result = await linker.autoLinkFolder();

      expect(result).toEqual({
        status: 'applied',
        dryRun: true,
        backupId: null,
        safety: {
          isSafe: true,
          safetyLevel: 'conservative',
          limits: { maxFiles: 25, maxChanges: 100 },
          fileCount: 1,
          changeCount: 1,
          blockers: [],
        },
        results: { Notes: ["Linked 'Widget' at position 6"] },
        totalChanges: 1,
        failed: [],
      });
      expect(await read('Notes.md')).toBe('I use Widget every day.');
      expect(await linker.backups.list()).toEqual([]);
    });

    it('should back up and rewrite notes on a real run', async () => {
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir });

      const result = await linker.autoLinkFolder({ dryRun: false });

      expect(result.status).toBe('applied');
      if (result.status !== 'applied') return;
      expect(result.backupId).toMatch(/^safe_backup_\d{8}_\d{6}/);
      expect(await read('Notes.md')).toBe('I use [[Widget]] every day.');

      const [manifest] = await linker.backups.list();
      expect(manifest.files.map(file => file.path)).toEqual(['Notes.md']);
    });

    it('should change nothing when run a second time', async () => {
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir });
      await linker.autoLinkFolder({ dryRun: false });

      const second = await linker.autoLinkFolder({ dryRun: false });

      expect(second.status).toBe('no_suggestions');
      expect(await read('Notes.md')).toBe('I use [[Widget]] every day.');
      expect(await linker.backups.list()).toHaveLength(1);
    });

    it('should restore the original text through rollback', async () => {
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir });
      const result = await linker.autoLinkFolder({ dryRun: false });
      if (result.status !== 'applied' || !result.backupId) throw new Error('expected a backup');

      await linker.backups.rollback(result.backupId, true);

      expect(await read('Notes.md')).toBe('I use Widget every day.');
    });

    it('should ignore suggestions below the threshold', async () => {
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir });
      const result = await linker.autoLinkFolder({ confidenceThreshold: 0.95 });
      expect(result.status).toBe('no_suggestions');
    });

    it('should report a folder without notes', async () => {
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir });
      const result = await linker.autoLinkFolder({ folder: 'Missing' });
      expect(result.status).toBe('no_notes');
    });
  });

  describe('safety limits', () => {
    it('should reject a batch above the paranoid file limit and write nothing', async () => {
      const files: Record<string, string> = { 'Widget.md': 'A reusable part.' };
      for (let i = 1; i <= 6; i++) {
        files[`N${i}.md`] = 'Widget here';
      }
      await writeVault(vault, files);
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir, safetyLevel: 'paranoid' });

      const result = await linker.autoLinkFolder({ dryRun: false });

      expect(result.status).toBe('rejected');
      if (result.status !== 'rejected') return;
      expect(result.safety.blockers).toEqual(['Too many files: 6 > 5']);
      expect(await read('N1.md')).toBe('Widget here');
      expect(await linker.backups.list()).toEqual([]);
    });
  });

  describe('write failures', () => {
    it('should exclude a note whose write fails and keep going', async () => {
      await writeVault(vault, {
        'N1.md': 'Widget here',
        'N2.md': 'Widget here',
        'Widget.md': 'A reusable part.',
      });
      const fileSystem: NoteFileSystem = {
        readFile: nodeFileSystem.readFile,
        writeFile: async (absPath, content) => {
          if (absPath.endsWith('N1.md')) throw new Error('disk full');
          await nodeFileSystem.writeFile(absPath, content);
        },
      };
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir, fileSystem });

      const result = await linker.autoLinkFolder({ dryRun: false });

      expect(result.status).toBe('applied');
      if (result.status !== 'applied') return;
      expect(result.failed).toEqual(['N1']);
      expect(result.results).toEqual({ N2: ["Linked 'Widget' at position 0"] });
      expect(result.totalChanges).toBe(1);
      expect(await read('N1.md')).toBe('Widget here');
      expect(await read('N2.md')).toBe('[[Widget]] here');
    });

    it('should skip a note that changed after it was analyzed', async () => {
      await writeVault(vault, {
        'N1.md': 'Widget here',
        'N2.md': 'Widget here',
        'Widget.md': 'A reusable part.',
      });
      const written: string[] = [];
      const fileSystem: NoteFileSystem = {
        readFile: async absPath => {
          const content = await nodeFileSystem.readFile(absPath);
          return absPath.endsWith('N1.md') ? `${content}\nWidget Widget Widget` : content;
        },
        writeFile: async (absPath, content) => {
          written.push(path.basename(absPath));
          await nodeFileSystem.writeFile(absPath, content);
        },
      };
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir, fileSystem });

      const result = await linker.autoLinkFolder({ dryRun: false });

      expect(result.status).toBe('applied');
      if (result.status !== 'applied') return;
      expect(result.failed).toEqual(['N1']);
      expect(result.results).toEqual({ N2: ["Linked 'Widget' at position 0"] });
      expect(written).toEqual(['N2.md']);
      expect(await read('N1.md')).toBe('Widget here');
    });

    it('should keep a byte order mark when rewriting a note', async () => {
      await writeVault(vault, {
        'N1.md': '\uFEFFWidget here',
        'Widget.md': 'A reusable part.',
      });
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir });

      const result = await linker.autoLinkFolder({ dryRun: false });

      expect(result.status).toBe('applied');
      expect(await read('N1.md')).toBe('\uFEFF[[Widget]] here');
    });
  });

  describe('applySuggestions', () => {
    it('should apply suggestions produced elsewhere', async () => {
      await writeVault(vault, {
        'Notes.md': 'Some widget talk.',
        'Widget.md': 'A reusable part.',
      });
      const notes = await new NoteLoader().load(vault);
      const linker = new SafeAutoLinker({ vaultPath: vault, backupDir });

      const result = await linker.applySuggestions(notes, new Map([
        ['Notes', [{ targetNote: 'Widget', contextSnippets: [], confidence: 0.6, mentionCount: 1 }]],
        ['Unknown', [{ targetNote: 'Widget', contextSnippets: [], confidence: 0.9, mentionCount: 1 }]],
      ]), { confidenceThreshold: 0.5, dryRun: false });

      expect(result.status).toBe('applied');
      expect(await read('Notes.md')).toBe('Some [[Widget|widget]] talk.');
    });
  });
});
