import type { TopicTaxonomy } from '../types.js';

/**
 * Default coding taxonomy. Keywords are matched as lowercase substrings, so
 * short entries such as "go" also hit words that merely contain them.
 */
export const DEFAULT_TAXONOMY: TopicTaxonomy = Object.freeze({
  languages: Object.freeze(['python', 'javascript', 'java', 'cpp', 'rust', 'go', 'ruby', 'php', 'swift', 'kotlin']),
  frameworks: Object.freeze(['react', 'django', 'flask', 'spring', 'express', 'vue', 'angular', 'laravel']),
  concepts: Object.freeze(['algorithm', 'data structure', 'design pattern', 'api', 'database', 'testing', 'debugging']),
  tools: Object.freeze(['git', 'docker', 'kubernetes', 'jenkins', 'aws', 'azure', 'terraform', 'ansible']),
});

/**
 * Build a taxonomy from plain data, lowercasing and de-duplicating keywords.
 */
export function createTaxonomy(categories: Record<string, readonly string[]>): TopicTaxonomy {
  const result: Record<string, readonly string[]> = {};
  for (const [category, keywords] of Object.entries(categories)) {
    const normalized = Array.from(new Set(keywords.map(k => k.trim().toLowerCase()).filter(k => k.length > 0)));
    result[category] = Object.freeze(normalized);
  }
  return Object.freeze(result);
}
