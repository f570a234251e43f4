import { describe, it, expect } from 'vitest';
import { healthBand, renderVaultReport } from '../src/analysis/report.js';
import type { FolderStats, VaultAnalysis } from '../src/types.js';

function folder(name: string, notes: string[], overrides: Partial<FolderStats> = {}): FolderStats {
  return {
    name,
    noteCount: notes.length,
    totalWords: 100,
    totalLinks: 1,
    notesWithCode: 0,
    topTopics: [],
    orphanedNotes: [],
    notes,
    ...overrides,
  };
}

describe('healthBand', () => {
  it('should map scores to bands', () => {
    expect(healthBand(80)).toBe('excellent');
    expect(healthBand(79.9)).toBe('good');
    expect(healthBand(60)).toBe('good');
    expect(healthBand(40)).toBe('moderate');
    expect(healthBand(39.9)).toBe('low');
  });
});

describe('renderVaultReport', () => {
  const bigNotes = Array.from({ length: 12 }, (_, i) => `N${i + 1}`);
  const analysis: VaultAnalysis = {
    vaultPath: '/vault',
    analysisDate: '2026-01-01T00:00:00.000Z',
    totalFolders: 2,
    totalNotes: 10,
    totalWords: 1234,
    totalLinks: 3,
    globalOrphanedNotes: 3,
    folderStats: [
      folder('Small', ['One'], { topTopics: [{ topic: 'languages:python', count: 2 }] }),
      folder('Big', bigNotes),
    ],
    crossFolderSuggestions: {
      One: ['A (in Big)', 'B (in Big)', 'C (in Big)', 'D (in Big)'],
    },
    vaultHealthScore: 53,
  };
  const lines = renderVaultReport(analysis).split('\n');

  it('should render the overview', () => {
    expect(lines[0]).toBe('# Vault Analysis Report');
    expect(lines).toContain('**Health Score:** 53/100');
    expect(lines).toContain('| Total Words | 1,234 |');
    expect(lines).toContain('| Orphaned Notes | 3 |');
  });

  it('should list folders by note count', () => {
    expect(lines.indexOf('### Big')).toBeLessThan(lines.indexOf('### Small'));
    expect(lines).toContain('- **Sample Notes:** N1, N2, N3, N4, N5 (and 7 more)');
    expect(lines).toContain('- **Note List:** One');
    expect(lines).toContain('- **Top Topics:** languages:python (2)');
  });

  it('should show at most three cross-folder targets per note', () => {
    const start = lines.indexOf('**One** could link to:');
    expect(lines.slice(start + 1, start + 5)).toEqual(['- A (in Big)', '- B (in Big)', '- C (in Big)', '']);
  });

  it('should recommend fixes for the weak areas', () => {
    expect(lines).toContain('**Moderate health.** The vault needs some attention.');
    expect(lines).toContain('- **Connect orphaned notes:** 3 notes have no connections (30.0% of vault)');
    expect(lines).toContain('- **Cross-folder linking:** 1 notes mention notes in other folders');
    expect(lines).toContain('- **Increase linking:** 0.3 links per note on average (aim for 2-3)');
  });
});
