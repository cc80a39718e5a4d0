import { z } from 'zod/v4';
import type { StageContract, StageOutcome } from '@domain/ports/stage.js';
import type { IBackend } from '@domain/ports/backend.js';
import type { SessionContext } from '@domain/types/session.js';
import type { SkillVocabulary } from '@domain/types/skills.js';
import { IntentSchema } from '@domain/types/gap-analysis.js';
import { findSkillsInText, mergeSkills } from '@domain/rules/skill-matching.js';
import { ValidationError } from '@shared/lib/errors.js';
import { buildPrompt, parseJsonReply, stringValue } from './prompt.js';

export const PerceptionOutputSchema = z.object({
  intent: IntentSchema,
  entities: z.array(z.string()),
  normalized_question: z.string().min(1),
});

const PerceptionReplySchema = z.object({
  intent: z.string().optional(),
  entities: z.array(z.string()).optional(),
  normalized_question: z.string().optional(),
});

export interface PerceptionStage extends StageContract {
  readonly kind: 'perception';
}

export interface PerceptionDeps {
  vocabulary: SkillVocabulary;
}

/**
 * Perception — turn the raw question into an intent, the skills it
 * mentions, and a cleaned-up question for the later stages.
 *
 * Entities are the union of what the backend reports and a vocabulary scan
 * of the raw input, so a terse or unparseable reply still yields the skills
 * named in the question.
 */
export function createPerceptionStage(deps: PerceptionDeps): PerceptionStage {
  return {
    kind: 'perception',
    name: 'perception',
    outputSchema: PerceptionOutputSchema,
    declaredInputs: () => ['raw_input'],
    optionalInputs: () => [],
    declaredOutputs: () => ['intent', 'entities', 'normalized_question'],

    async execute(context: Readonly<SessionContext>, backend: IBackend): Promise<StageOutcome> {
      const rawInput = stringValue(context['raw_input'])?.trim();
      if (!rawInput) {
        return {
          ok: false,
          error: new ValidationError('raw_input must be a non-empty string', [], 'perception'),
        };
      }

      const prompt = buildPrompt({
        task: 'perception',
        pattern: 'cot',
        question: rawInput,
        sections: [
          { heading: 'Intents', body: IntentSchema.options.join(', ') },
          {
            heading: 'Known skills',
            body: deps.vocabulary.skills.map((s) => s.name).join(', '),
          },
        ],
        reply: '{"intent": one of the intents, "entities": skill names mentioned, "normalized_question": string}',
      });

      const result = await backend.generate(prompt);
      if (!result.ok) return { ok: false, error: result.error };

      const reply = parseJsonReply(result.text, PerceptionReplySchema);
      const intent = IntentSchema.safeParse(reply?.intent);
      const normalized = reply?.normalized_question?.trim();

      return {
        ok: true,
        output: {
          intent: intent.success ? intent.data : 'skill_gap_analysis',
          entities: mergeSkills(deps.vocabulary, findSkillsInText(rawInput, deps.vocabulary), reply?.entities ?? []),
          normalized_question: normalized || rawInput.replace(/\s+/g, ' '),
        },
        reasoningPatternTag: 'cot',
        confidence: reply ? 0.8 : 0.5,
      };
    },
  };
}
