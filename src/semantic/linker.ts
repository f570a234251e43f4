import type { LinkSuggestion, NoteCollection } from '../types.js';
import type { LinkClassifier } from './classifier.js';
import { log, errorMessage } from '../log.js';

export const MIN_SEMANTIC_CONFIDENCE = 0.5;
export const REVERSE_CONFIDENCE_FACTOR = 0.8;

export interface SemanticConnection {
  sourceNote: string;
  targetNote: string;
  relationshipType: string;
  explanation: string;
  confidence: number;
  suggestedContext: string;
}

export class SemanticLinker {
  constructor(private classifier: LinkClassifier) {}

  /**
   * Ask the classifier about every unordered pair of notes, in load order.
   * Failed or unreadable judgments are logged and skipped.
   */
  async analyze(notes: NoteCollection): Promise<SemanticConnection[]> {
    const list = [...notes.values()];
    const connections: SemanticConnection[] = [];
    log('semantic', `Analyzing ${list.length * (list.length - 1) / 2} note pairs`);

    for (let i = 0; i < list.length; i++) {
      for (let j = i + 1; j < list.length; j++) {
        const source = list[i];
        const target = list[j];

        let judgment;
        try {
          judgment = await this.classifier.judge({
            source: { name: source.name, content: source.content },
            target: { name: target.name, content: target.content },
          });
        } catch (error) {
          log('semantic', `Classifier error for ${source.name} <-> ${target.name}: ${errorMessage(error)}`, 'warn');
          continue;
        }

        if (!judgment) {
          log('semantic', `Unreadable judgment for ${source.name} <-> ${target.name}`, 'warn');
          continue;
        }

        if (judgment.shouldLink && judgment.confidence > MIN_SEMANTIC_CONFIDENCE) {
          connections.push({
            sourceNote: source.name,
            targetNote: target.name,
            relationshipType: judgment.relationshipType,
            explanation: judgment.explanation,
            confidence: judgment.confidence,
            suggestedContext: judgment.suggestedContext,
          });
        }
      }
    }

    return connections.sort((a, b) => b.confidence - a.confidence);
  }
}

/**
 * Each connection yields a suggestion in both directions; the reverse one
 * carries a reduced confidence.
 */
export function toLinkSuggestions(connections: readonly SemanticConnection[]): Map<string, LinkSuggestion[]> {
  const suggestions = new Map<string, LinkSuggestion[]>();
  const add = (note: string, suggestion: LinkSuggestion) => {
    const list = suggestions.get(note) ?? [];
    list.push(suggestion);
    suggestions.set(note, list);
  };

  for (const connection of connections) {
    add(connection.sourceNote, {
      targetNote: connection.targetNote,
      contextSnippets: [connection.suggestedContext],
      confidence: connection.confidence,
      mentionCount: 1,
    });
    add(connection.targetNote, {
      targetNote: connection.sourceNote,
      contextSnippets: [`Reverse connection: ${connection.explanation}`],
      confidence: connection.confidence * REVERSE_CONFIDENCE_FACTOR,
      mentionCount: 1,
    });
  }

  return suggestions;
}

export function renderSemanticReport(connections: readonly SemanticConnection[]): string {
  const lines = ['# Semantic Link Report', '', `Found ${connections.length} semantic connections`, ''];
  for (const connection of connections) {
    lines.push(`## ${connection.sourceNote} -> ${connection.targetNote}`);
    lines.push(`**Relationship:** ${connection.relationshipType}`);
    lines.push(`**Confidence:** ${Math.round(connection.confidence * 100)}%`);
    lines.push(`**Explanation:** ${connection.explanation}`);
    lines.push(`**Suggested Context:** ${connection.suggestedContext}`);
    lines.push('');
  }
  return lines.join('\n');
}
