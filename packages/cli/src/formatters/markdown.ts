import { allTurnErrors, summarizeErrors, type TurnOutcome } from '@synod/core';
import type { OutputFormatter } from './formatter.js';

export class MarkdownFormatter implements OutputFormatter {
  renderComplete(question: string, outcome: TurnOutcome): void {
    const { result } = outcome;
    console.log(`# ${outcome.title ?? 'Synod Deliberation'}\n`);
    console.log(`**Question:** ${question}\n`);
    console.log(`**Mode:** ${result.mode}\n`);

    if (result.mode === 'council' && result.aggregateRankings.length > 0) {
      console.log(`## Rankings\n`);
      for (const r of result.aggregateRankings) {
        console.log(`- **${r.model}**: ${r.averageRank.toFixed(2)} avg rank (${r.rankingsCount} votes)`);
      }
      console.log();

      console.log(`## Tournament\n`);
      for (const t of result.tournamentRankings) {
        console.log(`- **${t.model}**: ${t.wins}W ${t.losses}L ${t.ties}T (score ${t.score})`);
      }
      console.log();
    }

    console.log(`## Final Answer\n`);
    console.log(result.stage3.response ?? 'No final answer available.');
    console.log();

    const errors = allTurnErrors(result);
    if (errors.length > 0) {
      console.log(`## Failures\n`);
      for (const e of errors) {
        console.log(`- \`${e.model}\` (${e.kind}): ${e.message}`);
      }
      console.log();
      console.log(summarizeErrors(errors));
    }
  }

  renderError(error: string): void {
    console.error(`## Error\n\n${error}`);
  }
}
