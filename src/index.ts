#!/usr/bin/env node

/**
 * Main entry point for the vault-linker MCP server
 */

import OpenAI from 'openai';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, type Config } from './config.js';
import { NoteLoader } from './vault/loader.js';
import { LinkGraph } from './graph/builder.js';
import { getNoteRecommendations } from './suggest/structure.js';
import { VaultAnalyzer } from './analysis/vault.js';
import { renderVaultReport } from './analysis/report.js';
import { SafeAutoLinker } from './linker/safeLinker.js';
import { BackupStore } from './linker/backup.js';
import { OpenAiLinkClassifier } from './semantic/classifier.js';
import { SemanticLinker, renderSemanticReport, toLinkSuggestions } from './semantic/linker.js';
import { log, errorMessage } from './log.js';
import * as schemas from './schemas.js';

let config: Config;
try {
  config = loadConfig();
} catch (error) {
  log('config', errorMessage(error), 'error');
  console.error('Usage: vault-linker <vault-path>');
  console.error('Or set VAULT_PATH environment variable');
  process.exit(1);
}

const loader = new NoteLoader();
const analyzer = new VaultAnalyzer(config.vaultPath);
const backups = new BackupStore(config.vaultPath, config.backupDir);

// Every call reads the vault afresh; nothing is cached between calls.
async function loadGraph(): Promise<LinkGraph> {
  return new LinkGraph(await loader.load(config.vaultPath));
}

function json(value: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }] };
}

function text(value: string) {
  return { content: [{ type: 'text' as const, text: value }] };
}

const initial = await loader.listNoteFiles(config.vaultPath);
log('server', `Vault ${config.vaultPath}: ${initial.length} notes`);

const server = new McpServer(
  { name: 'vault-linker', version: '1.0.0' },
  { capabilities: { tools: {}, resources: {} } },
);

// ── Analysis tools ──────────────────────────────────────────────────────

server.registerTool('analyze_vault', {
  description: 'Analyze the vault: per-folder statistics, orphaned notes, cross-folder link opportunities and a health score (0-100)',
  inputSchema: schemas.analyzeVaultInput,
}, async ({ folders }) => {
  const analysis = await analyzer.analyze(folders);
  return json(analysis ?? { error: `No notes found in ${config.vaultPath}` });
});

server.registerTool('analyze_folder', {
  description: 'Statistics for a single folder: notes, words, links, code, top topics and orphans',
  inputSchema: schemas.analyzeFolderInput,
}, async ({ folder }) => {
  const analysis = await analyzer.analyze([folder]);
  const stats = analysis?.folderStats.find(f => f.name === folder);
  return json(stats ?? { error: `No notes found in folder '${folder}'` });
});

server.registerTool('get_note_recommendations', {
  description: 'Link suggestions (title mentions, topic overlap) and structure suggestions for one note',
  inputSchema: schemas.getNoteRecommendationsInput,
}, async ({ note }) => {
  const notes = await loader.load(config.vaultPath);
  const recommendations = getNoteRecommendations(notes, note);
  if (!recommendations) throw new Error(`Note not found: ${note}`);
  return json(recommendations);
});

server.registerTool('vault_report', {
  description: 'Markdown report of the vault analysis with recommendations',
  inputSchema: schemas.vaultReportInput,
}, async ({ folders }) => {
  const analysis = await analyzer.analyze(folders);
  return text(analysis ? renderVaultReport(analysis) : `No notes found in ${config.vaultPath}`);
});

// ── Graph tools ─────────────────────────────────────────────────────────

server.registerTool('get_backlinks', {
  description: 'Get all notes that link to a specific note',
  inputSchema: schemas.getBacklinksInput,
}, async ({ note }) => {
  const graph = await loadGraph();
  return json(graph.getBacklinks(note));
});

server.registerTool('find_orphans', {
  description: 'List notes with no incoming and no outgoing links',
}, async () => {
  const graph = await loadGraph();
  return json(graph.findOrphanedNotes());
});

server.registerTool('get_graph_stats', {
  description: 'Get link graph statistics (nodes, edges, orphans, density, component count)',
}, async () => {
  const graph = await loadGraph();
  return json(graph.getStats());
});

server.registerTool('find_shortest_path', {
  description: 'Find the shortest path between two notes in the link graph',
  inputSchema: schemas.findShortestPathInput,
}, async ({ source, target }) => {
  const graph = await loadGraph();
  const path = graph.findShortestPath(source, target);
  return json(path ? { found: true, path, length: path.length } : { found: false, path: null });
});

server.registerTool('get_hub_notes', {
  description: 'Get the most-connected notes in the vault (by degree)',
  inputSchema: schemas.getHubNotesInput,
}, async ({ limit }) => {
  const graph = await loadGraph();
  return json(graph.getHubNotes(limit));
});

server.registerTool('get_clusters', {
  description: 'Detect connected clusters of notes in the link graph',
  inputSchema: schemas.getClustersInput,
}, async ({ minSize }) => {
  const graph = await loadGraph();
  return json(graph.getClusters(minSize).map((notes, i) => ({ cluster: i + 1, size: notes.length, notes })));
});

// ── Link insertion tools ────────────────────────────────────────────────

server.registerTool('auto_link', {
  description: 'Insert [[wikilinks]] for high-confidence suggestions. Dry run by default; real runs take a backup first and are refused above the safety level limits.',
  inputSchema: schemas.autoLinkInput,
}, async ({ folder, confidenceThreshold, dryRun, safetyLevel }) => {
  const linker = new SafeAutoLinker({
    vaultPath: config.vaultPath,
    backupDir: config.backupDir,
    safetyLevel: safetyLevel ?? config.safetyLevel,
  });
  return json(await linker.autoLinkFolder({
    folder,
    confidenceThreshold: confidenceThreshold ?? config.confidenceThreshold,
    dryRun,
  }));
});

server.registerTool('list_backups', {
  description: 'List link insertion backups, newest first',
}, async () => json(await backups.list()));

server.registerTool('verify_backup', {
  description: 'Re-hash the files of a backup against its manifest',
  inputSchema: schemas.backupIdInput,
}, async ({ backupId }) => json(await backups.verify(backupId)));

server.registerTool('rollback_backup', {
  description: 'Restore every file recorded in a backup. Requires confirm: true.',
  inputSchema: schemas.rollbackBackupInput,
}, async ({ backupId, confirm }) => json(await backups.rollback(backupId, confirm)));

if (config.openAiApiKey) {
  const classifier = new OpenAiLinkClassifier(new OpenAI({ apiKey: config.openAiApiKey }), config.openAiModel);

  server.registerTool('semantic_links', {
    description: 'Ask the language model which note pairs should be linked (one request per pair). Optionally insert the links under the safety policy.',
    inputSchema: schemas.semanticLinksInput,
  }, async ({ folder, apply, dryRun }) => {
    const notes = await loader.load(config.vaultPath, folder ?? '');
    const connections = await new SemanticLinker(classifier).analyze(notes);
    if (!apply) {
      return text(renderSemanticReport(connections));
    }
    const linker = new SafeAutoLinker({
      vaultPath: config.vaultPath,
      backupDir: config.backupDir,
      safetyLevel: config.safetyLevel,
    });
    const result = await linker.applySuggestions(notes, toLinkSuggestions(connections), {
      confidenceThreshold: config.confidenceThreshold,
      dryRun,
    });
    return json({ connections, result });
  });
} else {
  log('config', 'OPENAI_API_KEY not set; semantic_links disabled');
}

// ── Resource registrations ──────────────────────────────────────────────

server.registerResource('All Notes', 'vault://notes', {
  description: 'Every note with its folder, links and tags',
  mimeType: 'application/json',
}, async (uri) => {
  const graph = await loadGraph();
  return {
    contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(graph.getAllNodes(), null, 2) }],
  };
});

server.registerResource('Link Graph', 'vault://graph', {
  description: 'Complete link graph structure',
  mimeType: 'application/json',
}, async (uri) => {
  const graph = await loadGraph();
  return {
    contents: [{ uri: uri.href, mimeType: 'application/json', text: JSON.stringify(graph.exportGraph(), null, 2) }],
  };
});

// ── Start server ────────────────────────────────────────────────────────

const transport = new StdioServerTransport();
await server.connect(transport);

log('server', 'vault-linker server running on stdio');
