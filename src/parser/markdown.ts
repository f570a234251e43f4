/**
 * Markdown parser that extracts the structural signals of a note
 */

import path from 'node:path';
import matter from 'gray-matter';
import type { CodeBlock, Heading, Note, TopicTag, TopicTaxonomy } from '../types.js';
import { DEFAULT_TAXONOMY } from './taxonomy.js';
import { log, errorMessage } from '../log.js';

export const NOTE_EXTENSION = '.md';
export const ROOT_FOLDER = 'Root';

export interface FrontmatterSplit {
  frontmatter: Record<string, unknown>;
  body: string;
  /** Offset of `body` inside the raw content */
  bodyOffset: number;
}

/**
 * Separate YAML frontmatter from the note body. Invalid YAML is treated as
 * plain text so the note still loads.
 */
export function splitFrontmatter(content: string): FrontmatterSplit {
  let parsed: { data: Record<string, unknown>; content: string };
  try {
    const file = matter(content);
    parsed = { data: { ...file.data }, content: file.content };
  } catch (error) {
    log('loader', `Ignoring malformed frontmatter: ${errorMessage(error)}`, 'warn');
    return { frontmatter: {}, body: content, bodyOffset: 0 };
  }

  const bodyOffset = content.endsWith(parsed.content) ? content.length - parsed.content.length : 0;
  return { frontmatter: parsed.data, body: content.slice(bodyOffset), bodyOffset };
}

interface FenceScan {
  codeBlocks: CodeBlock[];
  headings: Heading[];
  /** Lines outside fenced code, used for tag extraction */
  proseLines: string[];
}

export const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})[ \t]*([\w+#.-]*)/;
export const FENCE_CLOSE = /^ {0,3}(`{3,}|~{3,})[ \t]*$/;
const HEADING = /^(#{1,6})\s+(.+)$/;

export class NoteParser {
  private taxonomy: TopicTaxonomy;

  constructor(taxonomy: TopicTaxonomy = DEFAULT_TAXONOMY) {
    this.taxonomy = taxonomy;
  }

  /**
   * Parse raw note text into a Note. `relPath` is relative to the vault root.
   */
  parse(content: string, relPath: string, absPath: string = relPath): Note {
    const posixRel = relPath.split(path.sep).join('/');
    const { frontmatter, body, bodyOffset } = splitFrontmatter(content);
    const lineOffset = countNewlines(content.slice(0, bodyOffset));

    const scan = this.scanFences(body, lineOffset);
    const dir = path.posix.dirname(posixRel);

    return {
      name: path.posix.basename(posixRel, NOTE_EXTENSION),
      relPath: posixRel,
      absPath,
      folder: dir === '.' ? ROOT_FOLDER : dir,
      content,
      frontmatter,
      wordCount: content.split(/\s+/).filter(word => word.length > 0).length,
      lineCount: countNewlines(content) + 1,
      links: extractLinks(body),
      tags: this.extractTags(scan.proseLines, frontmatter),
      headings: scan.headings,
      codeBlocks: scan.codeBlocks,
      topics: this.identifyTopics(content),
    };
  }

  /**
   * Match the content against the taxonomy. Each (category, keyword) pair is
   * reported once, in taxonomy order.
   */
  identifyTopics(content: string): TopicTag[] {
    const lower = content.toLowerCase();
    const topics: TopicTag[] = [];
    for (const [category, keywords] of Object.entries(this.taxonomy)) {
      for (const keyword of keywords) {
        if (lower.includes(keyword.toLowerCase())) {
          topics.push({ category, keyword });
        }
      }
    }
    return topics;
  }

  /**
   * Walk the body line by line, collecting fenced code blocks and the headings
   * and prose that sit outside them. Unclosed fences produce no block.
   */
  private scanFences(body: string, lineOffset: number): FenceScan {
    const lines = body.split('\n').map(line => line.replace(/\r$/, ''));
    const codeBlocks: CodeBlock[] = [];
    const headings: Heading[] = [];
    const proseLines: string[] = [];

    let fence: { marker: string; language: string; start: number; lines: string[] } | null = null;

    for (let index = 0; index < lines.length; index++) {
      const line = lines[index];

      if (fence) {
        const close = line.match(FENCE_CLOSE);
        if (close && close[1][0] === fence.marker[0] && close[1].length >= fence.marker.length) {
          codeBlocks.push({ language: fence.language, code: fence.lines.join('\n') });
          fence = null;
        } else {
          fence.lines.push(line);
        }
        continue;
      }

      const open = line.match(FENCE_OPEN);
      if (open) {
        fence = { marker: open[1], language: open[2], start: index, lines: [] };
        continue;
      }

      proseLines.push(line);
      const heading = line.match(HEADING);
      if (heading) {
        headings.push({
          level: heading[1].length,
          text: heading[2].trim(),
          line: lineOffset + index + 1,
        });
      }
    }

    // An unclosed fence is not a code block; its lines stay ordinary text
    if (fence) {
      proseLines.push(lines[fence.start], ...fence.lines);
    }

    return { codeBlocks, headings, proseLines };
  }

  /**
   * Inline `#tags` outside code, plus frontmatter `tags`. Case is preserved.
   */
  private extractTags(proseLines: string[], frontmatter: Record<string, unknown>): string[] {
    const tags = new Set<string>();

    for (const tag of frontmatterTags(frontmatter)) {
      tags.add(tag);
    }

    const prose = proseLines.join('\n').replace(/`[^`\n]+`/g, '');
    const tagRegex = /(?:^|(?<=\s))#([A-Za-z_]\w*(?:\/\w+)*)/gm;
    let match;
    while ((match = tagRegex.exec(prose)) !== null) {
      tags.add(match[1]);
    }

    return Array.from(tags);
  }
}

/**
 * Extract wikilink targets: `[[Target]]`, `[[Target|Display]]` and
 * `[[Target#Heading]]` all yield `Target`. Deduplicated, first-seen order.
 */
export function extractLinks(text: string): string[] {
  const links = new Set<string>();
  const wikilinkRegex = /\[\[([^\]|#]+)(?:#[^\]|]*)?(?:\|[^\]]*)?\]\]/g;
  let match;
  while ((match = wikilinkRegex.exec(text)) !== null) {
    const target = match[1].trim();
    if (target) links.add(target);
  }
  return Array.from(links);
}

function frontmatterTags(frontmatter: Record<string, unknown>): string[] {
  const raw = frontmatter.tags;
  const values: unknown[] = Array.isArray(raw) ? raw : typeof raw === 'string' ? raw.split(/[,\s]+/) : [];
  return values
    .filter((value): value is string | number => typeof value === 'string' || typeof value === 'number')
    .map(value => String(value).trim().replace(/^#/, ''))
    .filter(value => value.length > 0);
}

function countNewlines(text: string): number {
  let count = 0;
  for (const char of text) {
    if (char === '\n') count++;
  }
  return count;
}
