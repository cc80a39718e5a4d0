export const GAPFLOW_DIRS = {
  root: '.gapflow',
  sessions: 'sessions',
  longTerm: 'long-term',
  traces: 'traces',
  traceLog: 'trace.jsonl',
  config: 'config.json',
} as const;

export type GapflowDirKey = keyof typeof GAPFLOW_DIRS;
