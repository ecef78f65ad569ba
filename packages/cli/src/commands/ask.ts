import { readFileSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';
import React from 'react';
import { render as inkRender } from 'ink';
import type { Command } from 'commander';
import {
  parseModelList,
  setLogLevel,
  type ConversationSettings,
  type DeliberationMode,
  type TurnOutcome,
} from '@synod/core';
import { createCallbackEventBridge, type EventHandler } from '../adapters/callback-event-bridge.js';
import { createFormatter, isOutputFormat, type OutputFormat } from '../formatters/index.js';
import { createRuntime } from '../runtime.js';
import { App } from '../ui/App.js';
import {
  deliberationReducer,
  handlersFor,
  initialState,
  type Action,
  type DeliberationState,
} from '../ui/deliberation-state.js';

interface AskOptions {
  file?: string;
  conversation?: string;
  chairmanOnly?: boolean;
  webSearch?: boolean;
  council?: string;
  chairman?: string;
  json?: boolean;
  format?: string;
  output?: string;
  verbose?: boolean;
  quiet?: boolean;
}

function readQuestion(parts: string[], file?: string): string | null {
  if (file) {
    const source = file === '-' ? '/dev/stdin' : resolve(file);
    return readFileSync(source, 'utf-8').trim() || null;
  }
  const question = parts.join(' ').trim();
  return question || null;
}

export function turnOverrides(opts: Pick<AskOptions, 'council' | 'chairman' | 'webSearch'>): ConversationSettings {
  const overrides: ConversationSettings = {};
  if (opts.council) {
    const models = parseModelList(opts.council);
    if (models.length > 0) overrides.councilModels = models;
  }
  if (opts.chairman?.trim()) overrides.chairmanModel = opts.chairman.trim();
  if (opts.webSearch) overrides.webSearchEnabled = true;
  return overrides;
}

function progressHandlers(): EventHandler {
  const write = (line: string) => process.stderr.write(`${line}\n`);
  return {
    onStageStart: (stage, models) => write(`\n  Stage ${stage}: ${models.join(', ')}`),
    onMemberComplete: (_stage, model, error) =>
      write(error ? `  ✗ ${model}: ${error.message}` : `  ✓ ${model}`),
    onTitle: (title) => write(`  Title: ${title}`),
  };
}

export function registerAskCommand(program: Command): void {
  program
    .command('ask')
    .description('Put a question to the council')
    .argument('[question...]', 'The question to deliberate on')
    .option('-f, --file <path>', 'Read the question from a file (- for stdin)')
    .option('-c, --conversation <id>', 'Continue an existing conversation')
    .option('--chairman-only', 'Ask the chairman directly, skipping the council')
    .option('--web-search', 'Let models search the web for this turn')
    .option('--council <list>', 'Council models (comma-separated OpenRouter model IDs)')
    .option('--chairman <model>', 'Chairman model (OpenRouter model ID)')
    .option('--json', 'Output as JSON to stdout')
    .option('--format <type>', 'Output format: interactive (default), md, plain')
    .option('--output <file>', 'Save the final answer to a file')
    .option('--verbose', 'Debug logging')
    .option('--quiet', 'Minimal output')
    .action(async (questionParts: string[], opts: AskOptions) => {
      if (opts.verbose) setLogLevel('debug');
      if (opts.quiet) setLogLevel('error');

      const question = readQuestion(questionParts, opts.file);
      if (!question) {
        console.error('Error: No question provided. Use `synod ask <question>` or `synod ask -f <file>`');
        process.exit(1);
      }

      let format: OutputFormat | null = null;
      if (opts.json) format = 'json';
      else if (opts.format && opts.format !== 'interactive') {
        if (!isOutputFormat(opts.format)) {
          console.error(`Error: Unknown format "${opts.format}". Use interactive, md, plain or json.`);
          process.exit(1);
        }
        format = opts.format;
      } else if (!process.stdout.isTTY) format = 'plain';

      const isQuiet = opts.quiet ?? false;
      const isInteractive = format === null && !isQuiet;
      const mode: DeliberationMode = opts.chairmanOnly ? 'chairman' : 'council';

      const { config, service } = await createRuntime();
      if (!config.openRouterApiKey) {
        console.error('Error: OPENROUTER_API_KEY is not set. Export it or run `synod config set api-key`.');
        process.exit(1);
      }

      const conversationId = opts.conversation ?? (await service.createConversation()).id;
      const cancel = () => service.cancel(conversationId);
      process.once('SIGINT', cancel);

      const saveAnswer = (outcome: TurnOutcome) => {
        const answer = outcome.result.stage3.response;
        if (opts.output && answer) {
          writeFileSync(resolve(opts.output), answer, 'utf-8');
          if (format !== 'json') console.error(`  Final answer saved to: ${opts.output}`);
        }
      };

      // --- Interactive mode: Ink UI ---
      if (isInteractive) {
        // Info and debug logs would corrupt Ink's rendering.
        if (!opts.verbose) setLogLevel('error');

        let state: DeliberationState = { ...initialState };
        const ink = inkRender(React.createElement(App, { state }));
        const dispatch = (action: Action) => {
          state = deliberationReducer(state, action);
          ink.rerender(React.createElement(App, { state }));
        };

        try {
          const outcome = await service.runTurn({
            conversationId,
            content: question,
            mode,
            overrides: turnOverrides(opts),
            events: createCallbackEventBridge(handlersFor(dispatch)),
          });
          ink.unmount();
          saveAnswer(outcome);
          console.error(`  Conversation: ${conversationId}`);
        } catch (err) {
          ink.unmount();
          console.error(`\nDeliberation failed: ${err instanceof Error ? err.message : String(err)}`);
          process.exit(1);
        } finally {
          process.off('SIGINT', cancel);
        }
        return;
      }

      // --- Non-interactive mode: formatted output, progress on stderr ---
      const formatter = createFormatter(format ?? 'plain');
      const showProgress = format !== 'json' && !isQuiet;

      try {
        const outcome = await service.runTurn({
          conversationId,
          content: question,
          mode,
          overrides: turnOverrides(opts),
          events: showProgress ? createCallbackEventBridge(progressHandlers()) : undefined,
        });
        formatter.renderComplete(question, outcome);
        saveAnswer(outcome);
        if (showProgress) console.error(`\n  Conversation: ${conversationId}`);
      } catch (err) {
        formatter.renderError(err instanceof Error ? err.message : String(err));
        process.exit(1);
      } finally {
        process.off('SIGINT', cancel);
      }
    });
}
