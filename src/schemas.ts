/**
 * Zod validation schemas for all MCP tool inputs.
 * Exported as raw shapes for McpServer.registerTool() inputSchema.
 */

import { z } from 'zod/v4';
import { SAFETY_LEVELS } from './linker/safety.js';

const noteName = z.string().min(1).describe('Note name (file name without .md)');

// --- Analysis tools ---

export const analyzeVaultInput = {
  folders: z.array(z.string().min(1)).optional()
    .describe('Optional: only analyze notes whose folder (vault-relative, "Root" for the top level) is listed'),
};

export const analyzeFolderInput = {
  folder: z.string().min(1).describe('Folder to analyze (vault-relative path, "Root" for the top level)'),
};

export const getNoteRecommendationsInput = {
  note: noteName,
};

export const vaultReportInput = analyzeVaultInput;

// --- Graph tools ---

export const getBacklinksInput = {
  note: noteName,
};

export const findShortestPathInput = {
  source: z.string().min(1).describe('Name of the source note'),
  target: z.string().min(1).describe('Name of the target note'),
};

export const getHubNotesInput = {
  limit: z.number().int().positive().default(10).describe('Number of top hub notes to return'),
};

export const getClustersInput = {
  minSize: z.number().int().positive().default(2).describe('Minimum cluster size to include'),
};

// find_orphans and get_graph_stats have no inputs

// --- Link insertion tools ---

export const autoLinkInput = {
  folder: z.string().optional().describe('Optional: vault-relative folder to process (whole vault when omitted)'),
  confidenceThreshold: z.number().min(0).max(1).optional()
    .describe('Minimum suggestion confidence (defaults to the server setting)'),
  dryRun: z.boolean().default(true).describe('Report the changes without writing them'),
  safetyLevel: z.enum(SAFETY_LEVELS).optional().describe('Override the server safety level for this run'),
};

export const backupIdInput = {
  backupId: z.string().regex(/^[\w.-]+$/).describe('Backup identifier as returned by list_backups'),
};

export const rollbackBackupInput = {
  ...backupIdInput,
  confirm: z.boolean().default(false).describe('Must be true to restore files'),
};

export const semanticLinksInput = {
  folder: z.string().optional().describe('Optional: vault-relative folder to analyze'),
  apply: z.boolean().default(false).describe('Insert the discovered links under the safety policy'),
  dryRun: z.boolean().default(true).describe('With apply: report the changes without writing them'),
};
