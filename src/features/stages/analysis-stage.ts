import { z } from 'zod/v4';
import type { StageContract, StageOutcome } from '@domain/ports/stage.js';
import type { IBackend } from '@domain/ports/backend.js';
import type { IDataProvider } from '@domain/ports/data-provider.js';
import type { LongTermMemory } from '@domain/ports/memory-store.js';
import type { SessionContext } from '@domain/types/session.js';
import { QUALIFIED_LEVELS, type Employee, type SkillVocabulary } from '@domain/types/skills.js';
import { GapAnalysisSchema, type GapAnalysis, type SkillGap } from '@domain/types/gap-analysis.js';
import { findSkillsInText, mergeSkills } from '@domain/rules/skill-matching.js';
import { ValidationError } from '@shared/lib/errors.js';
import { buildPrompt, parseJsonReply, stringList, stringValue } from './prompt.js';

/** Long-term category holding the latest outcome per skill gap */
export const SKILL_GAPS_CATEGORY = 'skill-gaps';

export const AnalysisOutputSchema = z.object({
  gap_analysis: GapAnalysisSchema,
});

const AnalysisReplySchema = z.object({
  risk_factors: z.array(z.string()).optional(),
  success_probability: z.number().min(0).max(1).optional(),
  timeline_assessment: z.string().optional(),
});

export interface AnalysisStage extends StageContract {
  readonly kind: 'analysis';
}

export interface AnalysisDeps {
  vocabulary: SkillVocabulary;
  dataProvider: IDataProvider;
  /** Qualified employees needed before a skill stops counting as a gap */
  requiredHeadcount: number;
}

export function isQualified(employee: Employee, skill: string): boolean {
  return employee.skills.some((s) => s.name === skill && QUALIFIED_LEVELS.includes(s.level));
}

/**
 * Employees whose headcount counts toward a gap: the project's department
 * when the project names one, otherwise everyone.
 */
export function staffingPool(employees: Employee[], department?: string): Employee[] {
  return department ? employees.filter((e) => e.department === department) : employees;
}

/**
 * Heuristic chance of delivering with the current team: each high-severity
 * gap costs 0.25, each medium one 0.1, from a 0.9 ceiling.
 */
export function estimateSuccess(gaps: readonly SkillGap[]): number {
  const high = gaps.filter((g) => g.severity === 'high').length;
  const medium = gaps.length - high;
  const raw = 0.9 - 0.25 * high - 0.1 * medium;
  return Math.round(Math.min(0.95, Math.max(0.05, raw)) * 100) / 100;
}

function summarise(required: readonly string[], gaps: readonly SkillGap[]): string {
  if (required.length === 0) return 'No known skills were identified in the question';
  if (gaps.length === 0) return `All ${required.length} required skills are covered`;
  const detail = gaps.map((g) => `${g.skill} (${g.qualified}/${g.required} qualified)`).join(', ');
  return `${gaps.length} of ${required.length} required skills are gaps: ${detail}`;
}

/**
 * Analysis — work out which skills the question needs and where the team
 * falls short.
 *
 * Required skills come from the question, the perceived entities and, when
 * `project_id` is in context, the project's own skill list. A skill is a gap
 * when fewer than `requiredHeadcount` people in the staffing pool hold it at
 * a qualified level. Gaps recorded by earlier sessions are flagged
 * `recurring`. The backend adds risk factors and a timeline view.
 */
export function createAnalysisStage(deps: AnalysisDeps): AnalysisStage {
  return {
    kind: 'analysis',
    name: 'analysis',
    outputSchema: AnalysisOutputSchema,
    declaredInputs: () => ['normalized_question'],
    optionalInputs: () => ['entities', 'project_id'],
    declaredOutputs: () => ['gap_analysis'],

    async execute(
      context: Readonly<SessionContext>,
      backend: IBackend,
      memory: LongTermMemory,
    ): Promise<StageOutcome> {
      const question = stringValue(context['normalized_question']);
      if (question === undefined) {
        return {
          ok: false,
          error: new ValidationError('normalized_question must be a string', [], 'analysis'),
        };
      }

      const projectId = stringValue(context['project_id']);
      const project = projectId !== undefined ? deps.dataProvider.getProject(projectId) : undefined;
      if (projectId !== undefined && !project) {
        return {
          ok: false,
          error: new ValidationError(`Unknown project "${projectId}"`, [], 'analysis'),
        };
      }

      const required = mergeSkills(
        deps.vocabulary,
        findSkillsInText(question, deps.vocabulary),
        stringList(context['entities']),
        project?.requiredSkills ?? [],
      );
      const pool = staffingPool(deps.dataProvider.listEmployees(), project?.department);

      const gaps: SkillGap[] = [];
      for (const skill of required) {
        const qualified = pool.filter((e) => isQualified(e, skill)).length;
        if (qualified >= deps.requiredHeadcount) continue;
        const seenBefore = await memory.getLongTerm(SKILL_GAPS_CATEGORY, skill);
        gaps.push({
          skill,
          qualified,
          required: deps.requiredHeadcount,
          severity: qualified === 0 ? 'high' : 'medium',
          recurring: seenBefore !== undefined,
        });
      }

      const riskFactors: string[] = [];
      for (const gap of gaps) {
        if (gap.severity === 'high') riskFactors.push(`No qualified ${gap.skill} practitioners available`);
        if (gap.recurring) riskFactors.push(`${gap.skill} was already a gap in an earlier analysis`);
        const market = deps.dataProvider.getSkillMarket(gap.skill);
        if (market?.demand === 'high') {
          riskFactors.push(`${gap.skill} hiring is competitive (about ${market.hireWeeks} weeks)`);
        }
      }

      const prompt = buildPrompt({
        task: 'analysis',
        pattern: 'react',
        question,
        sections: [
          { heading: 'Required skills', body: required.join(', ') || '(none recognised)' },
          {
            heading: 'Observed gaps',
            body: gaps.length > 0
              ? gaps.map((g) => `${g.skill}: ${g.qualified} of ${g.required} qualified`).join('\n')
              : '(none)',
          },
          ...(project
            ? [{ heading: 'Project', body: `${project.name}${project.deadlineWeeks ? `, due in ${project.deadlineWeeks} weeks` : ''}` }]
            : []),
        ],
        reply: '{"risk_factors": string[], "success_probability": number 0..1, "timeline_assessment": string}',
      });

      const result = await backend.generate(prompt);
      if (!result.ok) return { ok: false, error: result.error };
      const reply = parseJsonReply(result.text, AnalysisReplySchema);

      const analysis: GapAnalysis = {
        requiredSkills: required,
        gaps,
        riskFactors: [...riskFactors, ...(reply?.risk_factors ?? [])],
        successProbability: reply?.success_probability ?? estimateSuccess(gaps),
        summary: summarise(required, gaps),
        ...(reply?.timeline_assessment ? { timelineAssessment: reply.timeline_assessment } : {}),
      };

      return {
        ok: true,
        output: { gap_analysis: analysis },
        reasoningPatternTag: 'react',
        confidence: required.length > 0 ? 0.8 : 0.4,
      };
    },
  };
}
