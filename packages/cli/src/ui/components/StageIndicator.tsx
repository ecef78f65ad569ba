import React from 'react';
import { Text, Box } from 'ink';
import { Spinner } from './Spinner.js';

interface StageIndicatorProps {
  currentStage: number;
  summary: string;
  done: boolean;
}

const STAGES = [
  { num: 1, label: 'Answering' },
  { num: 2, label: 'Ranking' },
  { num: 3, label: 'Synthesizing' },
];

export function StageIndicator({ currentStage, summary, done }: StageIndicatorProps) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box>
        {STAGES.map((stage) => {
          const isActive = !done && stage.num === currentStage;
          const isDone = stage.num < currentStage || (done && stage.num === currentStage);
          const icon = isDone ? '✓' : isActive ? '▶' : '○';
          const color = isDone ? 'green' : isActive ? 'cyan' : 'gray';

          return (
            <Box key={stage.num} marginRight={2}>
              <Text color={color} bold={isActive}>
                {icon} {stage.label}
              </Text>
            </Box>
          );
        })}
      </Box>
      {currentStage > 0 && !done && (
        <Box marginTop={1}>
          <Spinner key={currentStage} text={summary} />
        </Box>
      )}
    </Box>
  );
}
