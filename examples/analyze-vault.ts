#!/usr/bin/env node

/**
 * Walk a local vault and print what the MCP tools would report, without
 * modifying any file.
 *
 * Usage: npx tsx examples/analyze-vault.ts <vault-path> [folder]
 */

import { NoteLoader } from '../src/vault/loader.js';
import { LinkGraph } from '../src/graph/builder.js';
import { VaultAnalyzer } from '../src/analysis/vault.js';
import { findLinkSuggestions } from '../src/suggest/links.js';
import { analyzeNoteStructure } from '../src/suggest/structure.js';
import { SafeAutoLinker } from '../src/linker/safeLinker.js';

const vaultPath = process.env.VAULT_PATH || process.argv[2];
const folder = process.argv[3] ?? '';

if (!vaultPath) {
  console.error('Usage: npx tsx examples/analyze-vault.ts <vault-path> [folder]');
  console.error('Or set VAULT_PATH environment variable');
  process.exit(1);
}

console.log(`Analyzing ${vaultPath}...\n`);

try {
  // Step 1: Load notes
  console.log('Step 1: Load notes');
  const notes = await new NoteLoader().load(vaultPath, folder);
  console.log(`Found ${notes.size} notes`);
  [...notes.keys()].slice(0, 10).forEach(name => console.log(`  - ${name}`));
  if (notes.size > 10) console.log(`  ... and ${notes.size - 10} more`);
  console.log();

  // Step 2: Link graph
  console.log('Step 2: Link graph');
  const graph = new LinkGraph(notes);
  const stats = graph.getStats();
  console.log(`Nodes: ${stats.totalNodes}, edges: ${stats.totalEdges}, orphans: ${stats.orphanedNodes}`);
  console.log(`Average connections: ${stats.averageConnections.toFixed(2)}, components: ${stats.components}`);
  console.log();

  // Step 3: Suggestions for the first few notes
  console.log('Step 3: Suggestions');
  for (const note of [...notes.values()].slice(0, 5)) {
    const links = findLinkSuggestions(notes, note.name);
    const structure = analyzeNoteStructure(note);
    console.log(`  ${note.name}: ${links.length} link suggestions, ${structure.length} structure suggestions`);
    for (const suggestion of links.slice(0, 3)) {
      console.log(`    -> ${suggestion.targetNote} (${Math.round(suggestion.confidence * 100)}%)`);
    }
  }
  console.log();

  // Step 4: Vault health
  console.log('Step 4: Vault health');
  const analysis = await new VaultAnalyzer(vaultPath).analyze();
  console.log(analysis ? `Health score: ${analysis.vaultHealthScore}/100` : 'No notes to analyze');
  console.log();

  // Step 5: Dry-run auto-linking
  console.log('Step 5: Auto-link dry run');
  const linker = new SafeAutoLinker({ vaultPath, backupDir: 'vault_linker_backups' });
  const result = await linker.autoLinkFolder({ folder, dryRun: true });
  if (result.status === 'applied') {
    console.log(`Would insert ${result.totalChanges} links in ${Object.keys(result.results).length} notes`);
  } else {
    console.log(`${result.status}: ${result.message}`);
  }
} catch (error) {
  console.error('Analysis failed:', error);
  process.exit(1);
}
