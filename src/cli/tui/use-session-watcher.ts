import { useState, useEffect, useCallback } from 'react';
import { watch as fsWatch } from 'node:fs';
import type { SessionStatus } from '@domain/types/session.js';
import { listWatchSessions, type WatchSession } from './session-reader.js';
import { logger } from '@shared/lib/logger.js';

export const DEBOUNCE_MS = 500;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Creates a file watcher on dir that debounces calls to onUpdate.
 * Returns a cleanup function that stops watching and clears any pending timer.
 * A directory that does not exist yet gets a no-op watcher.
 */
export function createSessionWatcher(dir: string, onUpdate: () => void): () => void {
  let debounceTimer: ReturnType<typeof setTimeout> | undefined;
  let watcher: ReturnType<typeof fsWatch> | undefined;

  try {
    watcher = fsWatch(dir, () => {
      clearTimeout(debounceTimer);
      debounceTimer = setTimeout(onUpdate, DEBOUNCE_MS);
    });
  } catch (err: unknown) {
    const code = errorCode(err);
    if (code !== 'ENOENT') {
      logger.warn('gapflow watch: fs.watch failed, live refresh disabled', { dir, code: code ?? 'unknown' });
    }
  }

  return () => {
    clearTimeout(debounceTimer);
    watcher?.close();
  };
}

/**
 * React hook that reads sessions from sessionsDir and re-reads on file changes.
 */
export function useSessionWatcher(
  sessionsDir: string,
  stageNames: readonly string[],
  status?: SessionStatus,
): { sessions: WatchSession[]; refresh: () => void } {
  const [sessions, setSessions] = useState<WatchSession[]>(() =>
    listWatchSessions(sessionsDir, stageNames, status),
  );

  const refresh = useCallback(() => {
    setSessions(listWatchSessions(sessionsDir, stageNames, status));
  }, [sessionsDir, stageNames, status]);

  useEffect(() => {
    return createSessionWatcher(sessionsDir, refresh);
  }, [sessionsDir, refresh]);

  return { sessions, refresh };
}
