/**
 * Markdown rendering of a VaultAnalysis
 */

import type { VaultAnalysis } from '../types.js';

const MAX_CROSS_FOLDER_NOTES = 10;
const MAX_CROSS_FOLDER_TARGETS = 3;
const MAX_LISTED_NOTES = 10;

export function healthBand(score: number): 'excellent' | 'good' | 'moderate' | 'low' {
  if (score >= 80) return 'excellent';
  if (score >= 60) return 'good';
  if (score >= 40) return 'moderate';
  return 'low';
}

export function renderVaultReport(analysis: VaultAnalysis): string {
  const lines: string[] = [];
  const number = (value: number) => value.toLocaleString('en-US');

  lines.push('# Vault Analysis Report', '');
  lines.push(`**Generated:** ${analysis.analysisDate}`);
  lines.push(`**Vault Path:** \`${analysis.vaultPath}\``);
  lines.push(`**Health Score:** ${analysis.vaultHealthScore}/100`, '');

  lines.push('## Overview', '');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Total Folders | ${analysis.totalFolders} |`);
  lines.push(`| Total Notes | ${analysis.totalNotes} |`);
  lines.push(`| Total Words | ${number(analysis.totalWords)} |`);
  lines.push(`| Total Links | ${analysis.totalLinks} |`);
  lines.push(`| Orphaned Notes | ${analysis.globalOrphanedNotes} |`, '');

  lines.push('## Folder Analysis', '');
  const folders = [...analysis.folderStats].sort((a, b) => b.noteCount - a.noteCount);
  for (const folder of folders) {
    lines.push(`### ${folder.name}`, '');
    lines.push(`- **Notes:** ${folder.noteCount}`);
    lines.push(`- **Words:** ${number(folder.totalWords)}`);
    lines.push(`- **Links:** ${folder.totalLinks}`);
    lines.push(`- **Orphaned:** ${folder.orphanedNotes.length}`);
    lines.push(`- **With Code:** ${folder.notesWithCode}`);
    if (folder.topTopics.length > 0) {
      lines.push(`- **Top Topics:** ${folder.topTopics.map(t => `${t.topic} (${t.count})`).join(', ')}`);
    }
    if (folder.notes.length <= MAX_LISTED_NOTES) {
      lines.push(`- **Note List:** ${folder.notes.join(', ')}`);
    } else {
      lines.push(`- **Sample Notes:** ${folder.notes.slice(0, 5).join(', ')} (and ${folder.notes.length - 5} more)`);
    }
    lines.push('');
  }

  const crossFolder = Object.entries(analysis.crossFolderSuggestions);
  if (crossFolder.length > 0) {
    lines.push('## Cross-Folder Connection Opportunities', '');
    for (const [note, targets] of crossFolder.slice(0, MAX_CROSS_FOLDER_NOTES)) {
      lines.push(`**${note}** could link to:`);
      for (const target of targets.slice(0, MAX_CROSS_FOLDER_TARGETS)) {
        lines.push(`- ${target}`);
      }
      lines.push('');
    }
  }

  lines.push('## Recommendations', '');
  const band = healthBand(analysis.vaultHealthScore);
  lines.push({
    excellent: '**Excellent health.** The vault is well connected and organized.',
    good: '**Good health.** Solid structure with room for improvement.',
    moderate: '**Moderate health.** The vault needs some attention.',
    low: '**Low health.** The vault needs significant improvement.',
  }[band], '');

  if (analysis.totalNotes > 0) {
    if (analysis.globalOrphanedNotes > analysis.totalNotes * 0.2) {
      const share = (analysis.globalOrphanedNotes / analysis.totalNotes * 100).toFixed(1);
      lines.push(`- **Connect orphaned notes:** ${analysis.globalOrphanedNotes} notes have no connections (${share}% of vault)`);
    }
    if (crossFolder.length > 0) {
      lines.push(`- **Cross-folder linking:** ${crossFolder.length} notes mention notes in other folders`);
    }
    if (analysis.totalLinks < analysis.totalNotes * 0.5) {
      const average = (analysis.totalLinks / analysis.totalNotes).toFixed(1);
      lines.push(`- **Increase linking:** ${average} links per note on average (aim for 2-3)`);
    }
  }

  return lines.join('\n');
}
