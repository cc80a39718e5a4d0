import { z } from 'zod/v4';
import type { SessionResult, SessionState, StageRecord, StructuredError } from '@domain/types/session.js';
import { GapAnalysisSchema, RecommendationSchema, type Recommendation } from '@domain/types/gap-analysis.js';

interface SessionView {
  id: string;
  status: string;
  context: Record<string, unknown>;
  stageHistory: StageRecord[];
  error?: StructuredError;
}

const RecommendationListSchema = z.array(RecommendationSchema);
const SkillListSchema = z.array(z.string());

/**
 * Format the result of `gapflow run`.
 */
export function formatSessionResult(result: SessionResult): string {
  const lines = formatSessionBody({ ...result, id: result.sessionId });
  if (!result.durable) {
    lines.push('', 'Warning: the latest session state could not be saved.');
  }
  return lines.join('\n');
}

/**
 * Format one stored session in full.
 */
export function formatSessionDetail(state: SessionState): string {
  const lines = formatSessionBody(state);
  lines.splice(1, 0, `Created: ${state.createdAt}`, `Updated: ${state.updatedAt}`);
  return lines.join('\n');
}

/**
 * Format stored sessions as an aligned text table.
 */
export function formatSessionTable(sessions: SessionState[]): string {
  if (sessions.length === 0) {
    return 'No sessions found.';
  }

  const header = padColumns(['ID', 'Status', 'Stages', 'Updated', 'Question']);
  const separator = '-'.repeat(header.length);
  const rows = sessions.map((s) => {
    const raw = s.context['raw_input'];
    const question = typeof raw === 'string' ? raw : '';
    return padColumns([
      s.id,
      s.status,
      String(s.stageHistory.length),
      s.updatedAt.slice(0, 19).replace('T', ' '),
      truncate(question, 50),
    ]);
  });

  return [header, separator, ...rows].join('\n');
}

export function formatSessionResultJson(result: SessionResult): string {
  return JSON.stringify(result, null, 2);
}

export function formatSessionJson(sessions: SessionState | SessionState[]): string {
  return JSON.stringify(sessions, null, 2);
}

// ---- Helpers ----

function formatSessionBody(view: SessionView): string[] {
  const lines: string[] = [`Session ${view.id}: ${view.status}`];
  const { context } = view;

  const question = context['raw_input'];
  const intent = context['intent'];
  const entities = SkillListSchema.safeParse(context['entities']);
  if (typeof question === 'string') lines.push(`Question: ${question}`);
  if (typeof intent === 'string') lines.push(`Intent: ${intent}`);
  if (entities.success) lines.push(`Skills: ${entities.data.join(', ') || '(none)'}`);

  if (view.stageHistory.length > 0) {
    lines.push('', 'Stages:');
    view.stageHistory.forEach((record, i) => lines.push(`  ${i + 1}. ${formatStageRecord(record)}`));
  }

  const analysis = GapAnalysisSchema.safeParse(context['gap_analysis']);
  if (analysis.success) {
    lines.push('', `Analysis: ${analysis.data.summary}`);
    lines.push(`  Success probability: ${Math.round(analysis.data.successProbability * 100)}%`);
    for (const gap of analysis.data.gaps) {
      const flags = gap.recurring ? ', recurring' : '';
      lines.push(`  - ${gap.skill}: ${gap.qualified}/${gap.required} qualified (${gap.severity}${flags})`);
    }
    for (const risk of analysis.data.riskFactors) {
      lines.push(`  ! ${risk}`);
    }
  }

  const recommendations = RecommendationListSchema.safeParse(context['recommendations']);
  if (recommendations.success) {
    lines.push('', 'Recommendations:');
    for (const rec of recommendations.data) {
      lines.push(`  - ${formatRecommendation(rec)}`);
    }
  }

  if (view.error) {
    const where = view.error.stage ? ` (stage ${view.error.stage})` : '';
    lines.push('', `Error${where}: ${view.error.name}: ${view.error.message}`);
  }

  return lines;
}

export function formatStageRecord(record: StageRecord): string {
  const backend = record.fallback ? `${record.backend} (fallback)` : record.backend;
  const confidence = record.confidence !== undefined ? `, confidence ${record.confidence.toFixed(2)}` : '';
  return `${record.stageName} [${record.reasoningPatternTag}] via ${backend}${confidence}`;
}

export function formatRecommendation(rec: Recommendation): string {
  if (rec.strategy === 'none') return rec.rationale;
  const who = rec.candidate ? ` ${rec.candidate}` : '';
  const weeks = rec.timelineWeeks === 1 ? '1 week' : `${rec.timelineWeeks} weeks`;
  return `${rec.skill ?? 'general'}: ${rec.strategy}${who} (${weeks}) — ${rec.rationale}`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 3) + '...' : text;
}

function padColumns(values: string[]): string {
  const widths = [38, 10, 7, 20, 50];
  return values.map((v, i) => v.padEnd(widths[i] ?? 20)).join('  ').trimEnd();
}
