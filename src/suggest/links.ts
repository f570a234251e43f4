/**
 * Link suggestions: literal title mentions first, topic overlap second
 */

import type { LinkSuggestion, Note, NoteCollection, TopicTag } from '../types.js';

export const TITLE_MENTION_CONFIDENCE = 0.9;
export const TOPIC_OVERLAP_THRESHOLD = 0.3;
export const MAX_LINK_SUGGESTIONS = 10;

const MENTION_CONTEXT_LENGTH = 200;
const TOPIC_CONTEXT_LENGTH = 150;
const MAX_TOPIC_SNIPPETS = 3;

/**
 * Suggest links from `noteName` to other notes it does not link to yet.
 * A target mentioned by name is never also scored by topic overlap, so each
 * target appears at most once. Returns the top suggestions by confidence.
 */
export function findLinkSuggestions(notes: NoteCollection, noteName: string): LinkSuggestion[] {
  const note = notes.get(noteName);
  if (!note) return [];

  const suggestions: LinkSuggestion[] = [];

  for (const [otherName, other] of notes) {
    if (otherName === noteName) continue;
    if (note.links.includes(otherName)) continue;

    const mentions = findTitleMentions(note.content, otherName);
    if (mentions.length > 0) {
      suggestions.push({
        targetNote: otherName,
        contextSnippets: mentions,
        confidence: TITLE_MENTION_CONFIDENCE,
        mentionCount: mentions.length,
      });
      continue;
    }

    const overlap = topicOverlap(note, other);
    if (overlap > TOPIC_OVERLAP_THRESHOLD) {
      const context = findTopicContext(note.content, other.topics);
      if (context.length > 0) {
        suggestions.push({
          targetNote: otherName,
          contextSnippets: context,
          confidence: overlap,
          mentionCount: context.length,
        });
      }
    }
  }

  suggestions.sort((a, b) => b.confidence - a.confidence);
  return suggestions.slice(0, MAX_LINK_SUGGESTIONS);
}

/**
 * One context snippet per line mentioning `title` (case-insensitive)
 */
export function findTitleMentions(content: string, title: string): string[] {
  const lines = content.split('\n');
  const titleLower = title.toLowerCase();
  const mentions: string[] = [];

  lines.forEach((line, index) => {
    if (line.toLowerCase().includes(titleLower)) {
      mentions.push(truncate(surroundingContext(lines, index), MENTION_CONTEXT_LENGTH));
    }
  });

  return mentions;
}

/**
 * Jaccard similarity of the two notes' topic keywords, ignoring category.
 * Zero when either note has no topics.
 */
export function topicOverlap(a: Pick<Note, 'topics'>, b: Pick<Note, 'topics'>): number {
  const topicsA = new Set(a.topics.map(t => t.keyword));
  const topicsB = new Set(b.topics.map(t => t.keyword));
  if (topicsA.size === 0 || topicsB.size === 0) return 0;

  let intersection = 0;
  for (const keyword of topicsA) {
    if (topicsB.has(keyword)) intersection++;
  }
  const union = topicsA.size + topicsB.size - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Up to three distinct snippets around lines that mention any of `topics`
 */
export function findTopicContext(content: string, topics: readonly TopicTag[]): string[] {
  const lines = content.split('\n');
  const keywords = Array.from(new Set(topics.map(t => t.keyword.toLowerCase())));
  const snippets: string[] = [];

  lines.forEach((line, index) => {
    const lower = line.toLowerCase();
    if (!keywords.some(keyword => lower.includes(keyword))) return;
    const snippet = truncate(surroundingContext(lines, index), TOPIC_CONTEXT_LENGTH);
    if (!snippets.includes(snippet)) {
      snippets.push(snippet);
    }
  });

  return snippets.slice(0, MAX_TOPIC_SNIPPETS);
}

function surroundingContext(lines: string[], index: number): string {
  const start = Math.max(0, index - 1);
  const end = Math.min(lines.length, index + 2);
  return lines.slice(start, end).join(' ').trim();
}

export function truncate(text: string, length: number): string {
  return text.length > length ? `${text.slice(0, length)}...` : text;
}
