import { Box, Text, useInput } from 'ink';
import type { SessionStatus } from '@domain/types/session.js';
import type { WatchSession } from './session-reader.js';

export interface SessionListViewProps {
  sessions: WatchSession[];
  selectedIndex: number;
  onSelectChange: (index: number) => void;
  onDrillIn: (session: WatchSession) => void;
  onQuit: () => void;
}

export function progressBar(progress: number, width = 8): string {
  const filled = Math.floor(Math.min(1, Math.max(0, progress)) * width);
  return '▓'.repeat(filled) + '░'.repeat(width - filled);
}

export function statusColor(status: SessionStatus): string {
  switch (status) {
    case 'completed':
      return 'green';
    case 'running':
      return 'cyan';
    case 'failed':
      return 'red';
    default:
      return 'gray';
  }
}

export default function SessionListView({
  sessions,
  selectedIndex,
  onSelectChange,
  onDrillIn,
  onQuit,
}: SessionListViewProps) {
  const running = sessions.filter((s) => s.status === 'running').length;

  useInput((input, key) => {
    if (input === 'q') {
      onQuit();
      return;
    }
    const selected = sessions[selectedIndex];
    if (key.return && selected) {
      onDrillIn(selected);
      return;
    }
    if (key.upArrow) {
      onSelectChange(Math.max(0, selectedIndex - 1));
      return;
    }
    if (key.downArrow && sessions.length > 0) {
      onSelectChange(Math.min(sessions.length - 1, selectedIndex + 1));
      return;
    }
  });

  return (
    <Box flexDirection="column">
      <Box>
        <Text bold color="cyan">
          GAPFLOW WATCH
        </Text>
        <Text>{'  '}</Text>
        <Text>
          {sessions.length} session{sessions.length !== 1 ? 's' : ''}, {running} running
        </Text>
      </Box>

      <Box flexDirection="column" marginTop={1}>
        {sessions.length === 0 ? (
          <Text dimColor>No sessions yet.</Text>
        ) : (
          sessions.map((session, i) => (
            <SessionRow key={session.id} session={session} isSelected={i === selectedIndex} />
          ))
        )}
      </Box>

      <Box marginTop={1}>
        <Text dimColor>[↑↓] select  [Enter] drill in  [q] quit</Text>
      </Box>
    </Box>
  );
}

interface SessionRowProps {
  session: WatchSession;
  isSelected: boolean;
}

function SessionRow({ session, isSelected }: SessionRowProps) {
  const bar = progressBar(session.progress);
  const stage = (session.currentStage ?? '').toUpperCase();

  return (
    <Box>
      <Text color="cyan">{isSelected ? '>' : ' '} </Text>
      <Text>{session.question.slice(0, 36).padEnd(36)}</Text>
      <Text>{'  '}{bar}{'  '}</Text>
      <Text color={statusColor(session.status)}>{session.status.padEnd(10)}</Text>
      <Text bold>{stage}</Text>
    </Box>
  );
}
