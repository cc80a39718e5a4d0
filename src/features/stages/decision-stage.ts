import { z } from 'zod/v4';
import type { LongTermWrite, StageContract, StageOutcome } from '@domain/ports/stage.js';
import type { IBackend } from '@domain/ports/backend.js';
import type { IDataProvider } from '@domain/ports/data-provider.js';
import type { SessionContext } from '@domain/types/session.js';
import type { Employee, Proficiency, SkillVocabulary } from '@domain/types/skills.js';
import {
  GapAnalysisSchema,
  RecommendationSchema,
  StrategySchema,
  type Recommendation,
  type SkillGap,
  type Strategy,
} from '@domain/types/gap-analysis.js';
import { ValidationError } from '@shared/lib/errors.js';
import { buildPrompt, parseJsonReply, stringValue } from './prompt.js';
import { SKILL_GAPS_CATEGORY, isQualified, staffingPool } from './analysis-stage.js';

export const DecisionOutputSchema = z.object({
  recommendations: z.array(RecommendationSchema).min(1),
});

type StaffingStrategy = Exclude<Strategy, 'none'>;

export const DEFAULT_STRATEGY_ORDER: readonly StaffingStrategy[] = ['upskill', 'transfer', 'hire'];

/** Weeks to hire when the market table has no entry for a skill */
export const DEFAULT_HIRE_WEEKS = 12;

const TRANSFER_WEEKS = 1;

const DecisionReplySchema = z.object({
  strategy_order: z.array(z.string()).optional(),
  rationale: z.string().optional(),
});

export interface DecisionStage extends StageContract {
  readonly kind: 'decision';
}

export interface DecisionDeps {
  vocabulary: SkillVocabulary;
  dataProvider: IDataProvider;
}

const LEVEL_RANK: Record<Proficiency, number> = {
  beginner: 0,
  intermediate: 1,
  advanced: 2,
  expert: 3,
};

/**
 * Normalise a model-proposed ordering: unknown and duplicate entries are
 * dropped, and strategies it left out keep their default position after
 * the ones it named.
 */
export function strategyOrder(proposed: readonly string[] | undefined): StaffingStrategy[] {
  const order: StaffingStrategy[] = [];
  for (const entry of proposed ?? []) {
    const parsed = StrategySchema.safeParse(entry.trim().toLowerCase());
    if (!parsed.success || parsed.data === 'none') continue;
    if (!order.includes(parsed.data)) order.push(parsed.data);
  }
  for (const strategy of DEFAULT_STRATEGY_ORDER) {
    if (!order.includes(strategy)) order.push(strategy);
  }
  return order;
}

interface UpskillCandidate {
  employee: Employee;
  level: Proficiency;
}

function upskillCandidates(pool: readonly Employee[], skill: string): UpskillCandidate[] {
  const candidates: UpskillCandidate[] = [];
  for (const employee of pool) {
    const held = employee.skills.find((s) => s.name === skill);
    if (held && !isQualified(employee, skill)) candidates.push({ employee, level: held.level });
  }
  return candidates.sort(
    (a, b) =>
      LEVEL_RANK[b.level] - LEVEL_RANK[a.level] ||
      b.employee.availability - a.employee.availability ||
      a.employee.id.localeCompare(b.employee.id),
  );
}

function transferCandidates(employees: readonly Employee[], pool: readonly Employee[], skill: string): Employee[] {
  return employees
    .filter((e) => !pool.includes(e) && isQualified(e, skill))
    .sort((a, b) => b.availability - a.availability || a.id.localeCompare(b.id));
}

/**
 * Decision — turn each gap into staffing recommendations.
 *
 * A gap needs `required - qualified` more people. Slots are filled by
 * strategy in priority order (upskill, transfer, hire unless the backend
 * proposes another order). Transfers only apply when the question is scoped
 * to a project's department. Each gap's first recommendation is handed back
 * as a long-term memory write so later analyses can flag it as recurring.
 */
export function createDecisionStage(deps: DecisionDeps): DecisionStage {
  const { vocabulary, dataProvider } = deps;

  function upskillWeeks(level: Proficiency): number {
    if (level === 'beginner') return vocabulary.upskillingWeeks.beginner;
    if (level === 'intermediate') return vocabulary.upskillingWeeks.intermediate;
    return 0;
  }

  function planGap(
    gap: SkillGap,
    order: readonly StaffingStrategy[],
    employees: readonly Employee[],
    pool: readonly Employee[],
    projectScoped: boolean,
  ): Recommendation[] {
    let slots = Math.max(1, gap.required - gap.qualified);
    const plan: Recommendation[] = [];

    for (const strategy of order) {
      if (slots === 0) break;

      if (strategy === 'upskill') {
        for (const { employee, level } of upskillCandidates(pool, gap.skill).slice(0, slots)) {
          plan.push({
            skill: gap.skill,
            strategy,
            candidate: employee.id,
            timelineWeeks: upskillWeeks(level),
            rationale: `${employee.name} already works with ${gap.skill} at ${level} level`,
          });
          slots--;
        }
      } else if (strategy === 'transfer') {
        if (!projectScoped) continue;
        for (const employee of transferCandidates(employees, pool, gap.skill).slice(0, slots)) {
          plan.push({
            skill: gap.skill,
            strategy,
            candidate: employee.id,
            timelineWeeks: TRANSFER_WEEKS,
            rationale: `${employee.name} (${employee.department}) is qualified in ${gap.skill}`,
          });
          slots--;
        }
      } else {
        const market = dataProvider.getSkillMarket(gap.skill);
        plan.push({
          skill: gap.skill,
          strategy,
          timelineWeeks: market?.hireWeeks ?? DEFAULT_HIRE_WEEKS,
          rationale: market
            ? `Hire ${slots} in a ${market.demand}-demand market`
            : `Hire ${slots}; no market data for ${gap.skill}`,
        });
        slots = 0;
      }
    }
    return plan;
  }

  return {
    kind: 'decision',
    name: 'decision',
    outputSchema: DecisionOutputSchema,
    declaredInputs: () => ['normalized_question', 'gap_analysis'],
    optionalInputs: () => ['project_id'],
    declaredOutputs: () => ['recommendations'],

    async execute(context: Readonly<SessionContext>, backend: IBackend): Promise<StageOutcome> {
      const question = stringValue(context['normalized_question']) ?? '';
      const analysis = GapAnalysisSchema.safeParse(context['gap_analysis']);
      if (!analysis.success) {
        return {
          ok: false,
          error: new ValidationError(
            'gap_analysis is malformed',
            analysis.error.issues.map((i) => ({ path: i.path.map(String).join('.'), message: i.message })),
            'decision',
          ),
        };
      }
      const { gaps } = analysis.data;

      if (gaps.length === 0) {
        return {
          ok: true,
          output: {
            recommendations: [
              {
                skill: null,
                strategy: 'none',
                timelineWeeks: 0,
                rationale: 'Current staffing covers every required skill',
              },
            ],
          },
          reasoningPatternTag: 'tot',
          confidence: 0.75,
        };
      }

      const prompt = buildPrompt({
        task: 'decision',
        pattern: 'tot',
        question,
        sections: [
          { heading: 'Gaps', body: gaps.map((g) => `${g.skill}: ${g.qualified} of ${g.required} qualified (${g.severity})`).join('\n') },
          { heading: 'Strategies', body: DEFAULT_STRATEGY_ORDER.join(', ') },
        ],
        reply: '{"strategy_order": strategies from most to least preferred, "rationale": string}',
      });

      const result = await backend.generate(prompt);
      if (!result.ok) return { ok: false, error: result.error };
      const reply = parseJsonReply(result.text, DecisionReplySchema);
      const order = strategyOrder(reply?.strategy_order);

      const projectId = stringValue(context['project_id']);
      const project = projectId !== undefined ? dataProvider.getProject(projectId) : undefined;
      const employees = dataProvider.listEmployees();
      const pool = staffingPool(employees, project?.department);
      const projectScoped = project?.department !== undefined;

      const recommendations: Recommendation[] = [];
      const memoryWrites: LongTermWrite[] = [];
      for (const gap of gaps) {
        const plan = planGap(gap, order, employees, pool, projectScoped);
        recommendations.push(...plan);

        memoryWrites.push({
          category: SKILL_GAPS_CATEGORY,
          key: gap.skill,
          value: {
            qualified: gap.qualified,
            required: gap.required,
            severity: gap.severity,
            strategy: plan[0]?.strategy ?? 'hire',
          },
        });
      }

      if (reply?.rationale) {
        for (const rec of recommendations) rec.rationale = `${rec.rationale}. ${reply.rationale}`;
      }

      return {
        ok: true,
        output: { recommendations },
        reasoningPatternTag: 'tot',
        confidence: 0.75,
        memoryWrites,
      };
    },
  };
}
