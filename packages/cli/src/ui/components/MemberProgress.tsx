import React from 'react';
import { Text, Box } from 'ink';
import type { MemberState } from '../deliberation-state.js';
import { fitModel, formatTokens } from '../format.js';

export function MemberProgress({ member }: { member: MemberState }) {
  const { status, usage, error } = member;
  const icon = status === 'complete' ? '✓' : status === 'failed' ? '✗' : '○';
  const color = status === 'complete' ? 'green' : status === 'failed' ? 'red' : 'cyan';

  return (
    <Box>
      <Text color={color}>{icon} </Text>
      <Text>{fitModel(member.model, 40)}</Text>
      <Text color={color}>{status === 'pending' ? 'working' : status}</Text>
      {usage && <Text color="gray"> {formatTokens(usage.totalTokens)}</Text>}
      {error && <Text color="gray"> {error}</Text>}
    </Box>
  );
}
