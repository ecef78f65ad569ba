import type { TurnOutcome } from '@synod/core';
import type { OutputFormatter } from './formatter.js';

export class JsonFormatter implements OutputFormatter {
  renderComplete(question: string, outcome: TurnOutcome): void {
    const { conversationId, title, result } = outcome;
    console.log(JSON.stringify({ conversationId, title, question, ...result }, null, 2));
  }

  renderError(error: string): void {
    console.error(JSON.stringify({ error }));
  }
}
