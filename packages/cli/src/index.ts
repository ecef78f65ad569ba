import type { DeliberationMode, TurnOutcome } from '@synod/core';
import { createCallbackEventBridge, type EventHandler } from './adapters/callback-event-bridge.js';
import { createRuntime } from './runtime.js';

export interface SynodOptions {
  question: string;
  /** Continue this conversation; a new one is created when omitted. */
  conversationId?: string;
  mode?: DeliberationMode;
  councilModels?: string[];
  chairmanModel?: string;
  webSearch?: boolean;
  apiKey?: string;
  onProgress?: EventHandler;
  signal?: AbortSignal;
}

/**
 * High-level convenience function for running one deliberation turn.
 * Suitable for use as a programmatic API or agent skill.
 */
export async function deliberate(options: SynodOptions): Promise<TurnOutcome> {
  const { service } = await createRuntime({
    apiKey: options.apiKey,
    events: options.onProgress ? createCallbackEventBridge(options.onProgress) : undefined,
  });

  const conversationId = options.conversationId ?? (await service.createConversation()).id;

  return service.runTurn({
    conversationId,
    content: options.question,
    mode: options.mode ?? 'council',
    overrides: {
      councilModels: options.councilModels,
      chairmanModel: options.chairmanModel,
      webSearchEnabled: options.webSearch,
    },
    signal: options.signal,
  });
}

export { createRuntime } from './runtime.js';
export type { Runtime, RuntimeOptions } from './runtime.js';
export { createCallbackEventBridge } from './adapters/callback-event-bridge.js';
export type { EventHandler } from './adapters/callback-event-bridge.js';

// Re-export everything from core for advanced usage
export * from '@synod/core';
