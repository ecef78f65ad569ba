import { mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { ConversationStore } from '../ports/conversation-store.js';
import {
  DEFAULT_CONVERSATION_TITLE,
  summarizeConversation,
  type ChairmanTurnRecord,
  type Conversation,
  type ConversationSettings,
  type ConversationSummary,
  type CouncilTurnRecord,
} from '../domain/conversation/conversation.js';
import { ConversationNotFoundError, StorageError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('conversation-store');

const ID_PATTERN = /^[A-Za-z0-9_-]{1,128}$/;

const UsageSchema = z.object({
  promptTokens: z.number(),
  completionTokens: z.number(),
  totalTokens: z.number(),
});

const ModelErrorSchema = z.object({
  model: z.string(),
  kind: z.enum(['timeout', 'rate_limit', 'auth', 'payment', 'not_found', 'server', 'unknown']),
  message: z.string(),
  statusCode: z.number().optional(),
});

const Stage3Schema = z.object({
  model: z.string(),
  response: z.string().nullable(),
  usage: UsageSchema.nullable().optional(),
});

const UserMessageSchema = z.object({
  role: z.literal('user'),
  content: z.string(),
  createdAt: z.string(),
});

const CouncilMessageSchema = z.object({
  role: z.literal('assistant'),
  mode: z.literal('council'),
  createdAt: z.string(),
  stage1: z.array(z.object({ model: z.string(), content: z.string(), usage: UsageSchema.nullable().optional() })),
  stage2: z.array(
    z.object({
      model: z.string(),
      rankingText: z.string(),
      parsedRanking: z.array(z.string()),
      usage: UsageSchema.nullable().optional(),
    }),
  ),
  stage3: Stage3Schema,
  labelToModel: z.record(z.string()),
  aggregateRankings: z.array(
    z.object({ model: z.string(), label: z.string(), averageRank: z.number(), rankingsCount: z.number() }),
  ),
  tournamentRankings: z.array(
    z.object({
      model: z.string(),
      label: z.string(),
      wins: z.number(),
      losses: z.number(),
      ties: z.number(),
      score: z.number(),
      rankingsCount: z.number(),
    }),
  ),
  errors: z.object({
    stage1: z.array(ModelErrorSchema),
    stage2: z.array(ModelErrorSchema),
    stage3: z.array(ModelErrorSchema),
  }),
});

const ChairmanMessageSchema = z.object({
  role: z.literal('assistant'),
  mode: z.literal('chairman'),
  createdAt: z.string(),
  stage3: Stage3Schema,
  errors: z.object({ stage3: z.array(ModelErrorSchema) }),
});

const SettingsSchema = z.object({
  councilModels: z.array(z.string()).optional(),
  chairmanModel: z.string().optional(),
  webSearchEnabled: z.boolean().optional(),
});

const ConversationSchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  title: z.string(),
  settings: SettingsSchema.optional(),
  messages: z.array(z.union([UserMessageSchema, CouncilMessageSchema, ChairmanMessageSchema])),
});

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/** One JSON file per conversation under `<dataDir>/conversations`. */
export class JsonConversationStore implements ConversationStore {
  constructor(private readonly dataDir: string) {}

  get conversationsDir(): string {
    return join(this.dataDir, 'conversations');
  }

  private pathFor(id: string): string {
    if (!ID_PATTERN.test(id)) {
      throw new StorageError(`Invalid conversation id: ${JSON.stringify(id)}`);
    }
    return join(this.conversationsDir, `${id}.json`);
  }

  private parse(data: string, source: string): Conversation {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (err) {
      throw new StorageError(`${source} is not valid JSON`, { cause: err });
    }
    const parsed = ConversationSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`${source} is not a valid conversation: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    return parsed.data;
  }

  private async save(conversation: Conversation): Promise<void> {
    const filePath = this.pathFor(conversation.id);
    await mkdir(this.conversationsDir, { recursive: true });
    await writeFile(filePath, JSON.stringify(conversation, null, 2), 'utf-8');
  }

  private async update(id: string, apply: (conversation: Conversation) => void): Promise<void> {
    const conversation = await this.get(id);
    if (!conversation) throw new ConversationNotFoundError(id);
    apply(conversation);
    await this.save(conversation);
  }

  async create(id: string, settings?: ConversationSettings): Promise<Conversation> {
    const conversation: Conversation = {
      id,
      createdAt: new Date().toISOString(),
      title: DEFAULT_CONVERSATION_TITLE,
      messages: [],
      ...(settings ? { settings } : {}),
    };
    await this.save(conversation);
    log.debug(`created conversation ${id}`);
    return conversation;
  }

  async get(id: string): Promise<Conversation | null> {
    const filePath = this.pathFor(id);
    let data: string;
    try {
      data = await readFile(filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw new StorageError(`Could not read ${filePath}`, { cause: err });
    }
    return this.parse(data, filePath);
  }

  async list(): Promise<ConversationSummary[]> {
    let files: string[];
    try {
      files = (await readdir(this.conversationsDir)).filter((f) => f.endsWith('.json'));
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new StorageError(`Could not list ${this.conversationsDir}`, { cause: err });
    }

    const summaries: ConversationSummary[] = [];
    for (const file of files) {
      const filePath = join(this.conversationsDir, file);
      try {
        summaries.push(summarizeConversation(this.parse(await readFile(filePath, 'utf-8'), filePath)));
      } catch (err) {
        log.warn(`skipping ${file}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    summaries.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return summaries;
  }

  async addUserMessage(id: string, content: string): Promise<void> {
    await this.update(id, (c) => {
      c.messages.push({ role: 'user', content, createdAt: new Date().toISOString() });
    });
  }

  async addCouncilTurn(id: string, turn: CouncilTurnRecord): Promise<void> {
    await this.update(id, (c) => {
      c.messages.push({ role: 'assistant', mode: 'council', createdAt: new Date().toISOString(), ...turn });
    });
  }

  async addChairmanTurn(id: string, turn: ChairmanTurnRecord): Promise<void> {
    await this.update(id, (c) => {
      c.messages.push({ role: 'assistant', mode: 'chairman', createdAt: new Date().toISOString(), ...turn });
    });
  }

  async updateTitle(id: string, title: string): Promise<void> {
    await this.update(id, (c) => {
      c.title = title;
    });
  }

  async updateSettings(id: string, settings: ConversationSettings): Promise<void> {
    await this.update(id, (c) => {
      c.settings = { ...c.settings, ...settings };
    });
  }

  async delete(id: string): Promise<boolean> {
    const filePath = this.pathFor(id);
    try {
      await rm(filePath);
      return true;
    } catch (err) {
      if (isMissingFile(err)) return false;
      throw new StorageError(`Could not delete ${filePath}`, { cause: err });
    }
  }

  async deleteAll(): Promise<void> {
    await rm(this.conversationsDir, { recursive: true, force: true });
    log.info('deleted all conversations');
  }
}
