import type { IBackend, GenerateResult } from '@domain/ports/backend.js';
import type { Intent } from '@domain/types/gap-analysis.js';
import { STUB_BACKEND } from '@domain/types/backend.js';

const INTENT_KEYWORDS: ReadonlyArray<[Intent, RegExp]> = [
  ['upskilling_plan', /\b(upskill\w*|train\w*|learn\w*|mentor\w*)\b/i],
  ['team_optimization', /\b(team|staff\w*|allocat\w*|reorg\w*)\b/i],
  ['project_readiness', /\b(ready|readiness|deliver|deadline)\b/i],
];

export function guessIntent(question: string): Intent {
  for (const [intent, pattern] of INTENT_KEYWORDS) {
    if (pattern.test(question)) return intent;
  }
  return 'skill_gap_analysis';
}

function field(prompt: string, name: string): string | undefined {
  const match = new RegExp(`^${name}:\\s*(.*)$`, 'm').exec(prompt);
  return match?.[1]?.trim();
}

function reply(task: string | undefined, question: string): Record<string, unknown> {
  switch (task) {
    case 'perception':
      return {
        intent: guessIntent(question),
        entities: [],
        normalized_question: question.replace(/\s+/g, ' ').trim(),
      };
    case 'analysis':
      return {
        risk_factors: ['Assessment produced without a live model; treat figures as indicative'],
        timeline_assessment: 'Timelines follow the standard upskilling table',
      };
    case 'decision':
      return {
        strategy_order: ['upskill', 'transfer', 'hire'],
      };
    default:
      return {};
  }
}

/**
 * Deterministic offline backend.
 *
 * Reads the `task:` and `question:` header lines of a prompt and answers
 * with a canned JSON document for that task. Never fails.
 */
export class StubBackend implements IBackend {
  readonly name = STUB_BACKEND;

  async generate(prompt: string): Promise<GenerateResult> {
    const task = field(prompt, 'task');
    const question = field(prompt, 'question') ?? '';
    return { ok: true, text: JSON.stringify(reply(task, question)), durationMs: 0 };
  }
}
