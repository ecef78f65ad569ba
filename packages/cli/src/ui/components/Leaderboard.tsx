import React from 'react';
import { Text, Box } from 'ink';
import type { AggregateRankingEntry, TournamentRankingEntry } from '@synod/core';

interface LeaderboardProps {
  rankings: AggregateRankingEntry[];
  tournament: TournamentRankingEntry[];
}

export function Leaderboard({ rankings, tournament }: LeaderboardProps) {
  if (rankings.length === 0) return null;

  return (
    <Box flexDirection="column" marginY={1}>
      <Text bold color="yellow">Rankings:</Text>
      {rankings.map((r, i) => {
        const medal = i === 0 ? '🥇' : i === 1 ? '🥈' : i === 2 ? '🥉' : `${i + 1}.`;
        return (
          <Box key={r.label}>
            <Text>  {medal} </Text>
            <Text bold>{r.model}</Text>
            <Text color="gray"> ({r.averageRank.toFixed(2)})</Text>
          </Box>
        );
      })}
      {tournament.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text bold color="yellow">Head to head:</Text>
          {tournament.map((t) => (
            <Box key={t.label}>
              <Text>  {t.model}</Text>
              <Text color="gray"> {t.wins}W {t.losses}L {t.ties}T</Text>
            </Box>
          ))}
        </Box>
      )}
    </Box>
  );
}
