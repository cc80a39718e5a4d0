import type { TraceEntry } from '@domain/types/trace.js';

/**
 * Format trace entries as an aligned text table, oldest first.
 */
export function formatTraceTable(entries: TraceEntry[]): string {
  if (entries.length === 0) {
    return 'No trace entries found.';
  }

  const header = padColumns(['Recorded', 'Session', 'Actor', 'Outcome', 'Duration', 'Detail']);
  const separator = '-'.repeat(header.length);
  const rows = entries.map((e) =>
    padColumns([
      e.recordedAt.slice(0, 19).replace('T', ' '),
      e.sessionId ?? '-',
      e.actor,
      e.outcome,
      `${e.durationMs}ms`,
      e.detail ?? '',
    ]),
  );

  return [header, separator, ...rows].join('\n');
}

export function formatTraceJson(entries: TraceEntry[]): string {
  return JSON.stringify(entries, null, 2);
}

// ---- Helpers ----

function padColumns(values: string[]): string {
  const widths = [20, 38, 20, 9, 9, 40];
  return values.map((v, i) => v.padEnd(widths[i] ?? 20)).join('  ').trimEnd();
}
