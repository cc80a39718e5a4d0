import { Box, Text, useInput } from 'ink';
import type { WatchSession, WatchStage, WatchStageStatus } from './session-reader.js';
import { statusColor } from './SessionListView.js';

export interface SessionDetailViewProps {
  session: WatchSession | undefined;
  onBack: () => void;
  onQuit: () => void;
}

function stageStatusIcon(status: WatchStageStatus): string {
  switch (status) {
    case 'completed':
      return '✓';
    case 'running':
      return '●';
    case 'failed':
      return '✗';
    default:
      return '○';
  }
}

export default function SessionDetailView({ session, onBack, onQuit }: SessionDetailViewProps) {
  useInput((input, key) => {
    if (input === 'q') {
      onQuit();
      return;
    }
    if (key.leftArrow || key.escape) {
      onBack();
      return;
    }
  });

  if (!session) {
    return (
      <Box>
        <Text color="yellow">Session not found.</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column">
      <Box>
        <Text bold>{session.question || '(no question)'}</Text>
        <Text dimColor>{'  '}({session.id})</Text>
      </Box>
      <Text color={statusColor(session.status)}>{session.status}</Text>

      <Box marginTop={1} flexDirection="column">
        {session.stages.map((stage) => (
          <StageRow key={stage.name} stage={stage} />
        ))}
      </Box>

      {session.error && (
        <Box marginTop={1}>
          <Text color="red">{session.error}</Text>
        </Box>
      )}

      <Box marginTop={1}>
        <Text dimColor>[←] back{'  '}[q] quit</Text>
      </Box>
    </Box>
  );
}

function StageRow({ stage }: { stage: WatchStage }) {
  const detail = [
    stage.tag ? `[${stage.tag}]` : '',
    stage.backend ? `via ${stage.backend}${stage.fallback ? ' (fallback)' : ''}` : '',
    stage.confidence !== undefined ? `(${stage.confidence.toFixed(2)})` : '',
  ].filter(Boolean).join(' ');

  return (
    <Box>
      <Text color={statusColor(stage.status)}>
        {stageStatusIcon(stage.status)}{' '}
      </Text>
      <Text bold>{stage.name.toUpperCase().padEnd(12)}</Text>
      <Text dimColor>{detail}</Text>
    </Box>
  );
}
