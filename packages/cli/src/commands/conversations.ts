import type { Command } from 'commander';
import { finalAnswerOf, JsonConversationStore, type Conversation } from '@synod/core';
import { getDataDir } from '../adapters/xdg-paths.js';

interface ConversationsOptions {
  json?: boolean;
  last?: boolean;
  answer?: boolean;
  delete?: boolean;
  deleteAll?: boolean;
  yes?: boolean;
}

/** Human-readable transcript of a conversation. */
export function renderTranscript(conversation: Conversation): string {
  const lines = [
    `Conversation: ${conversation.id}`,
    `Title: ${conversation.title}`,
    `Date: ${conversation.createdAt}`,
    '',
  ];
  for (const message of conversation.messages) {
    if (message.role === 'user') {
      lines.push(`User: ${message.content}`, '');
    } else {
      lines.push(`Assistant (${message.mode}): ${finalAnswerOf(message) ?? '(no final answer)'}`, '');
    }
  }
  return lines.join('\n').trimEnd();
}

/** The final answer of the last assistant turn, if any. */
export function lastAnswer(conversation: Conversation): string | null {
  for (let i = conversation.messages.length - 1; i >= 0; i--) {
    const message = conversation.messages[i];
    if (message.role === 'assistant') return finalAnswerOf(message);
  }
  return null;
}

export function registerConversationsCommand(program: Command): void {
  program
    .command('conversations')
    .alias('history')
    .description('List, view or delete stored conversations')
    .argument('[conversation-id]', 'View a specific conversation by ID')
    .option('--json', 'Output as JSON')
    .option('--last', 'Show the most recent conversation')
    .option('--answer', 'Show only the latest final answer')
    .option('--delete', 'Delete the given conversation')
    .option('--delete-all', 'Delete every stored conversation')
    .option('--yes', 'Confirm --delete-all')
    .action(async (conversationId: string | undefined, opts: ConversationsOptions) => {
      const store = new JsonConversationStore(getDataDir());

      if (opts.deleteAll) {
        if (!opts.yes) {
          console.error('Refusing to delete every conversation without --yes.');
          process.exit(1);
        }
        await store.deleteAll();
        console.log('All conversations deleted.');
        return;
      }

      if (opts.delete) {
        if (!conversationId) {
          console.error('Usage: synod conversations <conversation-id> --delete');
          process.exit(1);
        }
        const deleted = await store.delete(conversationId);
        if (!deleted) {
          console.error(`Conversation not found: ${conversationId}`);
          process.exit(1);
        }
        console.log(`Deleted conversation ${conversationId}.`);
        return;
      }

      if (opts.last) {
        const conversations = await store.list();
        if (conversations.length === 0) {
          console.log('No conversations found.');
          return;
        }
        conversationId = conversations[0].id;
      }

      if (conversationId) {
        const conversation = await store.get(conversationId);
        if (!conversation) {
          console.error(`Conversation not found: ${conversationId}`);
          process.exit(1);
        }
        if (opts.json) {
          console.log(JSON.stringify(conversation, null, 2));
        } else if (opts.answer) {
          console.log(lastAnswer(conversation) ?? 'No final answer available.');
        } else {
          console.log(renderTranscript(conversation));
        }
        return;
      }

      const conversations = await store.list();
      if (opts.json) {
        console.log(JSON.stringify(conversations, null, 2));
        return;
      }
      if (conversations.length === 0) {
        console.log('No conversations found.');
        return;
      }

      console.log(`\n  ${'ID'.padEnd(38)} ${'Date'.padEnd(22)} ${'Msgs'.padEnd(5)} Title`);
      console.log(`  ${'-'.repeat(38)} ${'-'.repeat(22)} ${'-'.repeat(5)} ${'-'.repeat(40)}`);
      for (const c of conversations) {
        const date = new Date(c.createdAt).toLocaleString();
        console.log(`  ${c.id.padEnd(38)} ${date.padEnd(22)} ${String(c.messageCount).padEnd(5)} ${c.title}`);
      }
      console.log();
    });
}
