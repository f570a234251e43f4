/**
 * Structural advice for a single note. Advisory only: nothing here edits files.
 */

import type { Note, NoteCollection, NoteRecommendations, StructureSuggestion } from '../types.js';
import { findLinkSuggestions } from './links.js';

const LONG_NOTE_WORDS = 300;
const MANY_CODE_BLOCKS = 3;
const MANY_TOPICS = 5;
const MANY_TOPIC_CATEGORIES = 2;
const MAX_TAG_EXAMPLES = 5;

/**
 * Run every structure check against the note. Checks are independent and
 * always reported in the same order.
 */
export function analyzeNoteStructure(note: Note): StructureSuggestion[] {
  const suggestions: StructureSuggestion[] = [];

  if (note.wordCount > LONG_NOTE_WORDS && note.headings.length === 0) {
    suggestions.push({
      suggestionType: 'add_headings',
      description: 'This note is long but has no headings. Consider adding structure.',
      examples: ['## Overview', '## Implementation', '## Examples', '## Related Topics'],
    });
  }

  if (note.headings.length > 1) {
    const levels = note.headings.map(h => h.level);
    if (levels.some(level => level > 2) && !levels.includes(1)) {
      suggestions.push({
        suggestionType: 'heading_hierarchy',
        description: 'Consider adding a main H1 heading to establish document hierarchy.',
      });
    }
  }

  if (note.codeBlocks.length > MANY_CODE_BLOCKS) {
    suggestions.push({
      suggestionType: 'code_organization',
      description: 'Multiple code blocks found. Consider organizing them under headings.',
      examples: ['## Setup', '## Implementation', '## Testing', '## Usage Examples'],
    });
  }

  const unlabeled = note.codeBlocks.filter(block => !block.language).length;
  if (unlabeled > 0) {
    suggestions.push({
      suggestionType: 'code_language_tags',
      description: `Found ${unlabeled} code blocks without language tags. Add language for better syntax highlighting.`,
      examples: ['```python', '```javascript', '```bash'],
    });
  }

  if (note.topics.length > MANY_TOPICS) {
    const categories = Array.from(new Set(note.topics.map(t => t.category)));
    if (categories.length > MANY_TOPIC_CATEGORIES) {
      suggestions.push({
        suggestionType: 'topic_sections',
        description: 'This note covers multiple topic areas. Consider organizing into sections.',
        examples: categories.map(category => `## ${titleCase(category)}`),
      });
    }
  }

  // Tags compare as written: #Python does not cover the python topic
  const existingTags = new Set(note.tags);
  const missingTags = Array.from(new Set(note.topics.map(t => topicAsTag(t.keyword))))
    .filter(tag => !existingTags.has(tag));
  if (missingTags.length > 0) {
    suggestions.push({
      suggestionType: 'add_tags',
      description: 'Consider adding tags for better discoverability.',
      examples: missingTags.slice(0, MAX_TAG_EXAMPLES).map(tag => `#${tag}`),
    });
  }

  return suggestions;
}

/**
 * Link and structure suggestions for one note, with a summary of the note
 */
export function getNoteRecommendations(notes: NoteCollection, noteName: string): NoteRecommendations | null {
  const note = notes.get(noteName);
  if (!note) return null;

  return {
    noteName,
    linkSuggestions: findLinkSuggestions(notes, noteName),
    structureSuggestions: analyzeNoteStructure(note),
    noteInfo: {
      wordCount: note.wordCount,
      currentLinks: note.links.length,
      headings: note.headings.length,
      codeBlocks: note.codeBlocks.length,
      topics: [...note.topics],
    },
  };
}

// Tags cannot contain spaces
function topicAsTag(keyword: string): string {
  return keyword.replace(/\s+/g, '_');
}

function titleCase(text: string): string {
  return text.replace(/\b\w/g, char => char.toUpperCase());
}
