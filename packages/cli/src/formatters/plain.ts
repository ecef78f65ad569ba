import { allTurnErrors, summarizeErrors, type TurnOutcome } from '@synod/core';
import type { OutputFormatter } from './formatter.js';

export class PlainFormatter implements OutputFormatter {
  renderComplete(_question: string, outcome: TurnOutcome): void {
    const { result } = outcome;
    if (result.stage3.response) {
      console.log(result.stage3.response);
    } else {
      console.log(`No final answer. ${summarizeErrors(allTurnErrors(result))}`);
    }
  }

  renderError(error: string): void {
    console.error(`Error: ${error}`);
  }
}
