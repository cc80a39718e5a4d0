import { JsonStore } from '@infra/persistence/json-store.js';
import {
  SessionStateSchema,
  type SessionState,
  type SessionStatus,
} from '@domain/types/session.js';

export type WatchStageStatus = 'completed' | 'running' | 'failed' | 'pending';

export interface WatchStage {
  name: string;
  status: WatchStageStatus;
  backend: string | undefined;
  fallback: boolean;
  confidence: number | undefined;
  tag: string | undefined;
}

export interface WatchSession {
  id: string;
  status: SessionStatus;
  question: string;
  updatedAt: string;
  /** Name of the stage running now, or the stage that failed */
  currentStage: string | null;
  /** Completed stages over all stages, 0..1 */
  progress: number;
  stages: WatchStage[];
  error: string | undefined;
}

/**
 * Build the watch view of one session. Recorded stages come first, in
 * history order, followed by the configured stages not yet recorded.
 */
export function toWatchSession(state: SessionState, stageNames: readonly string[]): WatchSession {
  const recorded: WatchStage[] = state.stageHistory.map((record) => ({
    name: record.stageName,
    status: 'completed',
    backend: record.backend,
    fallback: record.fallback,
    confidence: record.confidence,
    tag: record.reasoningPatternTag,
  }));
  const done = new Set(recorded.map((s) => s.name));
  const remaining = stageNames.filter((name) => !done.has(name));

  const stages = [
    ...recorded,
    ...remaining.map((name, i): WatchStage => ({
      name,
      status: i === 0 ? nextStageStatus(state.status) : 'pending',
      backend: undefined,
      fallback: false,
      confidence: undefined,
      tag: undefined,
    })),
  ];

  const current = stages.find((s) => s.status === 'running' || s.status === 'failed');
  const raw = state.context['raw_input'];

  return {
    id: state.id,
    status: state.status,
    question: typeof raw === 'string' ? raw : '',
    updatedAt: state.updatedAt,
    currentStage: current?.name ?? null,
    progress: stages.length === 0 ? 0 : recorded.length / stages.length,
    stages,
    error: state.error ? `${state.error.name}: ${state.error.message}` : undefined,
  };
}

function nextStageStatus(status: SessionStatus): WatchStageStatus {
  if (status === 'running') return 'running';
  if (status === 'failed') return 'failed';
  return 'pending';
}

/**
 * Read every stored session, most recently updated first.
 * A missing directory reads as no sessions.
 */
export function listWatchSessions(
  sessionsDir: string,
  stageNames: readonly string[],
  status?: SessionStatus,
): WatchSession[] {
  return JsonStore.list(sessionsDir, SessionStateSchema)
    .filter((s) => !status || s.status === status)
    .sort((a, b) => b.updatedAt.localeCompare(a.updatedAt))
    .map((s) => toWatchSession(s, stageNames));
}
