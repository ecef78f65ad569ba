import React from 'react';
import { Box, Text } from 'ink';
import { allTurnErrors, summarizeErrors } from '@synod/core';
import type { DeliberationState } from './deliberation-state.js';
import { StageIndicator } from './components/StageIndicator.js';
import { MemberProgress } from './components/MemberProgress.js';
import { Leaderboard } from './components/Leaderboard.js';
import { SynthesisView } from './components/SynthesisView.js';

interface RunViewProps {
  state: DeliberationState;
}

export function RunView({ state }: RunViewProps) {
  const { result } = state;
  const finalAnswer = result?.stage3.response ?? null;

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <StageIndicator currentStage={state.stage} summary={state.stageSummary} done={state.done} />

      {state.members.length > 0 && (
        <Box flexDirection="column" marginBottom={1}>
          {state.members.map((member) => (
            <MemberProgress key={`${state.stage}-${member.slot}`} member={member} />
          ))}
        </Box>
      )}

      <Leaderboard rankings={state.aggregateRankings} tournament={state.tournamentRankings} />

      {finalAnswer && <SynthesisView text={finalAnswer} />}

      {result && !finalAnswer && (
        <Box marginTop={1}>
          <Text color="red">No final answer. {summarizeErrors(allTurnErrors(result))}</Text>
        </Box>
      )}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red" bold>Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
