import React from 'react';
import { Box, Text } from 'ink';
import type { DeliberationState } from './deliberation-state.js';
import { RunView } from './RunView.js';

interface AppProps {
  state: DeliberationState;
}

export function App({ state }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">Synod</Text>
        <Text color="gray">{state.title ? ` · ${state.title}` : ' · LLM council'}</Text>
      </Box>
      <RunView state={state} />
    </Box>
  );
}
