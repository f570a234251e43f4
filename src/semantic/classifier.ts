/**
 * Pairwise link judgments from an external model
 */

import type OpenAI from 'openai';
import { z } from 'zod/v4';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
export const PREVIEW_LENGTH = 800;

export interface ClassifierNote {
  name: string;
  content: string;
}

export interface ClassifierRequest {
  source: ClassifierNote;
  target: ClassifierNote;
}

export interface ClassifierJudgment {
  shouldLink: boolean;
  relationshipType: string;
  explanation: string;
  confidence: number;
  suggestedContext: string;
}

/**
 * Decides whether two notes should be linked. Resolves null when the answer
 * could not be interpreted; transport failures reject.
 */
export interface LinkClassifier {
  judge(request: ClassifierRequest): Promise<ClassifierJudgment | null>;
}

const judgmentSchema = z.object({
  should_link: z.boolean(),
  relationship_type: z.string().default('related'),
  explanation: z.string().default(''),
  confidence: z.number().min(0).max(1),
  suggested_context: z.string().default(''),
});

/**
 * Parse a model reply into a judgment. Tolerates a surrounding ```json fence.
 */
export function parseJudgment(raw: string): ClassifierJudgment | null {
  const text = raw.trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return null;
  }

  const result = judgmentSchema.safeParse(json);
  if (!result.success) return null;

  return {
    shouldLink: result.data.should_link,
    relationshipType: result.data.relationship_type,
    explanation: result.data.explanation,
    confidence: result.data.confidence,
    suggestedContext: result.data.suggested_context,
  };
}

export function buildJudgmentPrompt({ source, target }: ClassifierRequest): string {
  return `Analyze these two Obsidian notes and determine if they should be linked based on semantic relationships.

Note 1: "${source.name}"
Content preview: ${source.content.slice(0, PREVIEW_LENGTH)}...

Note 2: "${target.name}"
Content preview: ${target.content.slice(0, PREVIEW_LENGTH)}...

Determine:
1. Should these notes be linked?
2. What type of relationship exists? (prerequisite, related_concept, example_of, continuation, methodology, tool_for, etc.)
3. Explanation of the relationship (1-2 sentences)
4. Confidence score (0.0-1.0)
5. Suggested context for where to add the link

Respond with ONLY a JSON object (no markdown formatting):
{
  "should_link": boolean,
  "relationship_type": "string",
  "explanation": "string",
  "confidence": number,
  "suggested_context": "string"
}`;
}

export class OpenAiLinkClassifier implements LinkClassifier {
  constructor(
    private client: OpenAI,
    private model: string = DEFAULT_OPENAI_MODEL,
  ) {}

  async judge(request: ClassifierRequest): Promise<ClassifierJudgment | null> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      messages: [{ role: 'user', content: buildJudgmentPrompt(request) }],
      temperature: 0.3,
      max_tokens: 300,
    });

    const content = response.choices[0]?.message.content;
    return content ? parseJudgment(content) : null;
  }
}
