/**
 * Link insertion as an edit list: every accepted span is collected against
 * the unmodified text, checked for overlap, then applied in one pass.
 */

import { FENCE_CLOSE, FENCE_OPEN, extractLinks, splitFrontmatter } from '../parser/markdown.js';

export interface Span {
  start: number;
  end: number;
}

export interface TextEdit extends Span {
  target: string;
  replacement: string;
}

/** Characters inspected on each side of a match for surrounding `[[` / `]]` */
export const LINK_LOOKAROUND = 10;

/**
 * Regions link insertion must not touch: frontmatter, fenced and inline code,
 * existing wikilinks, Markdown links and bare URLs.
 */
export function findProtectedZones(text: string): Span[] {
  const zones: Span[] = [];

  const { bodyOffset } = splitFrontmatter(text);
  if (bodyOffset > 0) {
    zones.push({ start: 0, end: bodyOffset });
  }

  zones.push(...findFencedCode(text, bodyOffset));

  const inlinePatterns = [
    /`[^`\n]+`/g,
    /\[\[[^\]\n]*\]\]/g,
    /\[[^\]\n]*\]\([^)\n]*\)/g,
    /https?:\/\/\S+/g,
  ];
  for (const pattern of inlinePatterns) {
    let match;
    while ((match = pattern.exec(text)) !== null) {
      if (match.index < bodyOffset) continue;
      zones.push({ start: match.index, end: match.index + match[0].length });
    }
  }

  return zones;
}

/**
 * Plan `[[Target]]` insertions for each target in priority order. Matches are
 * case-insensitive and whole-word; a match differing in case from the target
 * keeps its text as the link alias.
 */
export function planLinkInsertions(text: string, targets: readonly string[]): TextEdit[] {
  const zones = findProtectedZones(text);
  const existing = new Set(extractLinks(text));
  const edits: TextEdit[] = [];

  for (const target of new Set(targets)) {
    if (!target || existing.has(target)) continue;

    const pattern = new RegExp(`(?<!\\w)${escapeRegExp(target)}(?!\\w)`, 'gi');
    let match;
    while ((match = pattern.exec(text)) !== null) {
      const span = { start: match.index, end: match.index + match[0].length };
      if (zones.some(zone => overlaps(zone, span))) continue;
      if (isInsideLinkMarkers(text, span)) continue;
      if (edits.some(edit => overlaps(edit, span))) continue;

      const matched = match[0];
      edits.push({
        ...span,
        target,
        replacement: matched === target ? `[[${target}]]` : `[[${target}|${matched}]]`,
      });
    }
  }

  return edits.sort((a, b) => a.start - b.start);
}

/**
 * Build the edited text in one pass. Throws when edits overlap or fall
 * outside the text.
 */
export function applyEdits(text: string, edits: readonly TextEdit[]): string {
  const sorted = [...edits].sort((a, b) => a.start - b.start);
  const parts: string[] = [];
  let cursor = 0;

  for (const edit of sorted) {
    if (edit.start < cursor || edit.end > text.length || edit.end < edit.start) {
      throw new Error(`Invalid edit for '${edit.target}' at ${edit.start}-${edit.end}`);
    }
    parts.push(text.slice(cursor, edit.start), edit.replacement);
    cursor = edit.end;
  }
  parts.push(text.slice(cursor));

  return parts.join('');
}

export function describeEdit(edit: TextEdit): string {
  return `Linked '${edit.target}' at position ${edit.start}`;
}

function isInsideLinkMarkers(text: string, span: Span): boolean {
  const before = text.slice(Math.max(0, span.start - LINK_LOOKAROUND), span.start);
  const after = text.slice(span.end, span.end + LINK_LOOKAROUND);
  return before.includes('[[') && after.includes(']]');
}

function findFencedCode(text: string, from: number): Span[] {
  const zones: Span[] = [];
  let offset = 0;
  let open: { marker: string; start: number } | null = null;

  for (const line of text.split('\n')) {
    const lineStart = offset;
    const lineEnd = offset + line.length;
    offset = lineEnd + 1;
    if (lineStart < from) continue;

    const clean = line.replace(/\r$/, '');
    if (open) {
      const close = clean.match(FENCE_CLOSE);
      if (close && close[1][0] === open.marker[0] && close[1].length >= open.marker.length) {
        zones.push({ start: open.start, end: lineEnd });
        open = null;
      }
      continue;
    }

    const fence = clean.match(FENCE_OPEN);
    if (fence) {
      open = { marker: fence[1], start: lineStart };
    }
  }

  return zones;
}

function overlaps(a: Span, b: Span): boolean {
  return a.start < b.end && b.start < a.end;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
