import type { TurnOutcome } from '@synod/core';

export interface OutputFormatter {
  renderComplete(question: string, outcome: TurnOutcome): void;
  renderError(error: string): void;
}
