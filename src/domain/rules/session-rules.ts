import type { SessionContext, SessionStatus, StageRecord } from '@domain/types/session.js';
import { GapflowError } from '@shared/lib/errors.js';

const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

const SESSION_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Status only moves forward: pending → running → completed | failed.
 */
export function assertTransition(from: SessionStatus, to: SessionStatus): void {
  if (!canTransition(from, to)) {
    throw new GapflowError(`Invalid session transition: ${from} → ${to}`);
  }
}

export function isTerminal(status: SessionStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/** Session ids double as file names, so they are restricted to a safe alphabet. */
export function isValidSessionId(id: string): boolean {
  return SESSION_ID_PATTERN.test(id);
}

/**
 * Index of the first stage with no record in the history, or
 * `stages.length` when every stage has run.
 */
export function nextStageIndex(stages: readonly string[], history: readonly StageRecord[]): number {
  const done = new Set(history.map((r) => r.stageName));
  const index = stages.findIndex((name) => !done.has(name));
  return index === -1 ? stages.length : index;
}

export function missingInputs(context: SessionContext, keys: readonly string[]): string[] {
  return keys.filter((key) => !(key in context) || context[key] === undefined);
}

/** Output keys that already hold a value in the context. */
export function collidingKeys(context: SessionContext, outputKeys: readonly string[]): string[] {
  return outputKeys.filter((key) => key in context);
}

export interface OutputConflict {
  stage: string;
  keys: string[];
}

/**
 * Check a stage list for outputs that would overwrite earlier context:
 * a key produced twice, or a key that is part of the initial context.
 */
export function findOutputConflicts(
  stages: ReadonlyArray<{ name: string; outputs: readonly string[] }>,
  initialKeys: readonly string[],
): OutputConflict[] {
  const claimed = new Set(initialKeys);
  const conflicts: OutputConflict[] = [];

  for (const stage of stages) {
    const keys = stage.outputs.filter((key) => claimed.has(key));
    if (keys.length > 0) {
      conflicts.push({ stage: stage.name, keys });
    }
    for (const key of stage.outputs) claimed.add(key);
  }

  return conflicts;
}

/** Copy of the named keys that are present in the context. */
export function snapshot(context: SessionContext, keys: readonly string[]): SessionContext {
  const copy: SessionContext = {};
  for (const key of keys) {
    if (key in context) {
      copy[key] = structuredClone(context[key]);
    }
  }
  return copy;
}
