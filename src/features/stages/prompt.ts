import type { z } from 'zod/v4';

/** Prompting strategies a stage can ask for. Tags are audit metadata only. */
export const REASONING_PATTERNS = {
  cot: 'Think through the question step by step before answering.',
  react: 'Alternate Thought and Observation over the evidence below until you can conclude.',
  tot: 'Lay out several alternative strategies, evaluate each branch, then commit to the best.',
} as const;

export type ReasoningPattern = keyof typeof REASONING_PATTERNS;

export interface PromptSpec {
  task: string;
  pattern: ReasoningPattern;
  question: string;
  /** Evidence sections, rendered in order under their headings */
  sections?: Array<{ heading: string; body: string }>;
  /** Describes the JSON object the model must return */
  reply: string;
}

/**
 * Render a stage prompt. The `task:` and `question:` header lines are
 * single-line so simple backends can key on them.
 */
export function buildPrompt(spec: PromptSpec): string {
  const lines = [
    `task: ${spec.task}`,
    `reasoning: ${spec.pattern}`,
    `question: ${spec.question.replace(/\s+/g, ' ').trim()}`,
    '',
    REASONING_PATTERNS[spec.pattern],
  ];
  for (const section of spec.sections ?? []) {
    lines.push('', `## ${section.heading}`, section.body);
  }
  lines.push('', `Respond with a single JSON object: ${spec.reply}`);
  return lines.join('\n');
}

/**
 * Extract and validate a JSON object from a model reply.
 *
 * Tries, in order:
 * 1. Last ```json ... ``` fenced block
 * 2. Last bare top-level {...} object anchored to the end of the reply
 * 3. The whole reply
 *
 * Returns undefined when nothing parses or validation fails.
 */
export function parseJsonReply<T>(text: string, schema: z.ZodType<T>): T | undefined {
  const fenced = [...text.matchAll(/```(?:json)?\s*([\s\S]*?)\s*```/g)].at(-1)?.[1];
  const bare = text.match(/(\{[\s\S]*\})\s*$/)?.[1];

  for (const candidate of [fenced, bare, text.trim()]) {
    if (!candidate) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(candidate);
    } catch {
      continue;
    }
    const result = schema.safeParse(parsed);
    if (result.success) return result.data;
  }
  return undefined;
}

/** Stages read untyped context values; these narrow the common shapes. */
export function stringValue(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}
