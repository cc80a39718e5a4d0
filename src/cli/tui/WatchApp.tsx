import { useState } from 'react';
import { Box, useApp } from 'ink';
import type { SessionStatus } from '@domain/types/session.js';
import { useSessionWatcher } from './use-session-watcher.js';
import SessionListView from './SessionListView.js';
import SessionDetailView from './SessionDetailView.js';

export interface WatchAppProps {
  sessionsDir: string;
  stageNames: readonly string[];
  status?: SessionStatus;
}

type ViewState = { mode: 'list'; selectedIndex: number } | { mode: 'detail'; sessionId: string };

export default function WatchApp({ sessionsDir, stageNames, status }: WatchAppProps) {
  const { sessions } = useSessionWatcher(sessionsDir, stageNames, status);
  const { exit } = useApp();
  const [view, setView] = useState<ViewState>({ mode: 'list', selectedIndex: 0 });

  if (view.mode === 'detail') {
    const session = sessions.find((s) => s.id === view.sessionId);
    const backIndex = Math.max(0, sessions.findIndex((s) => s.id === view.sessionId));
    return (
      <Box flexDirection="column">
        <SessionDetailView
          session={session}
          onBack={() => setView({ mode: 'list', selectedIndex: backIndex })}
          onQuit={() => exit()}
        />
      </Box>
    );
  }

  const clampedIndex = Math.min(view.selectedIndex, Math.max(0, sessions.length - 1));

  return (
    <Box flexDirection="column">
      <SessionListView
        sessions={sessions}
        selectedIndex={clampedIndex}
        onSelectChange={(index) => setView({ mode: 'list', selectedIndex: index })}
        onDrillIn={(session) => setView({ mode: 'detail', sessionId: session.id })}
        onQuit={() => exit()}
      />
    </Box>
  );
}
