import {
  ConfigService,
  DeliberationService,
  JsonConfigStore,
  JsonConversationStore,
  OpenRouterGateway,
  type CouncilConfig,
  type DeliberationEvents,
} from '@synod/core';
import { getConfigDir, getDataDir } from './adapters/xdg-paths.js';

export interface Runtime {
  config: CouncilConfig;
  configService: ConfigService;
  conversationStore: JsonConversationStore;
  service: DeliberationService;
}

export interface RuntimeOptions {
  /** Takes precedence over the environment and the preferences file. */
  apiKey?: string;
  events?: DeliberationEvents;
  configDir?: string;
  dataDir?: string;
  env?: NodeJS.ProcessEnv;
}

/** Wires the file-backed stores and the OpenRouter gateway into a service. */
export async function createRuntime(options: RuntimeOptions = {}): Promise<Runtime> {
  const env = options.env ?? process.env;
  const configStore = new JsonConfigStore(options.configDir ?? getConfigDir(env));
  const configService = new ConfigService(configStore, env);
  const config = await configService.resolve();
  if (options.apiKey) config.openRouterApiKey = options.apiKey;

  const conversationStore = new JsonConversationStore(options.dataDir ?? getDataDir(env));
  const llmGateway = new OpenRouterGateway({
    apiKey: config.openRouterApiKey,
    apiUrl: config.openRouterApiUrl,
  });

  const service = new DeliberationService({
    llmGateway,
    configStore,
    conversationStore,
    events: options.events,
    env,
  });

  return { config, configService, conversationStore, service };
}
