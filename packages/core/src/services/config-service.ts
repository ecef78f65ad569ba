import type { CouncilConfig, CouncilSnapshot } from '../domain/council/council-config.js';
import {
  DEFAULT_COUNCIL_MODELS,
  DEFAULT_CHAIRMAN_MODEL,
  OPENROUTER_API_URL,
  snapshotCouncil,
} from '../domain/council/council-config.js';
import type { ConversationSettings } from '../domain/conversation/conversation.js';
import type { ConfigStore, CouncilConfigPrefs } from '../ports/config-store.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-service');

export function parseModelList(value: string): string[] {
  return value.split(',').map((s) => s.trim()).filter(Boolean);
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  log.warn(`ignoring unrecognised WEB_SEARCH value: ${value}`);
  return undefined;
}

/**
 * Environment first, then the preferences file, then built-in defaults.
 * Per-conversation settings and per-turn overrides are laid on top when a
 * turn snapshot is taken.
 */
export class ConfigService {
  constructor(
    private configStore: ConfigStore,
    private env: NodeJS.ProcessEnv = process.env,
  ) {}

  async resolve(): Promise<CouncilConfig> {
    const envApiKey = this.env.OPENROUTER_API_KEY ?? '';
    const envCouncilModels = parseModelList(this.env.COUNCIL_MODELS ?? '');
    const envChairmanModel = this.env.CHAIRMAN_MODEL?.trim() ?? '';
    const envApiUrl = this.env.OPENROUTER_API_URL?.trim() ?? '';
    const envWebSearch = parseFlag(this.env.WEB_SEARCH);

    const prefs = await this.configStore.getCouncilConfigPrefs();
    const prefCouncilModels = (prefs.councilModels ?? []).map((m) => m.trim()).filter(Boolean);

    let councilModels: string[];
    if (envCouncilModels.length > 0) {
      councilModels = envCouncilModels;
    } else if (prefCouncilModels.length > 0) {
      councilModels = prefCouncilModels;
    } else {
      councilModels = [...DEFAULT_COUNCIL_MODELS];
    }

    return {
      openRouterApiKey: envApiKey || prefs.apiKey || '',
      openRouterApiUrl: envApiUrl || OPENROUTER_API_URL,
      councilModels,
      chairmanModel: envChairmanModel || prefs.chairmanModel?.trim() || DEFAULT_CHAIRMAN_MODEL,
      webSearchEnabled: envWebSearch ?? prefs.webSearchEnabled ?? false,
    };
  }

  /** Frozen configuration for one turn. Throws `ConfigError` if it is unusable. */
  async resolveSnapshot(
    settings?: ConversationSettings,
    overrides?: ConversationSettings,
  ): Promise<CouncilSnapshot> {
    const config = await this.resolve();
    const pick = <K extends keyof ConversationSettings>(key: K) => overrides?.[key] ?? settings?.[key];

    const councilModels = pick('councilModels');
    return snapshotCouncil({
      councilModels: councilModels && councilModels.length > 0 ? councilModels : config.councilModels,
      chairmanModel: pick('chairmanModel') || config.chairmanModel,
      webSearchEnabled: pick('webSearchEnabled') ?? config.webSearchEnabled,
    });
  }

  async saveCouncilConfig(prefs: CouncilConfigPrefs): Promise<void> {
    const config: CouncilConfigPrefs = {};
    if (prefs.chairmanModel) config.chairmanModel = prefs.chairmanModel.trim();
    if (prefs.councilModels) config.councilModels = prefs.councilModels.map((m) => m.trim()).filter(Boolean);
    if (prefs.webSearchEnabled !== undefined) config.webSearchEnabled = prefs.webSearchEnabled;
    if (prefs.apiKey) config.apiKey = prefs.apiKey;
    await this.configStore.saveCouncilConfigPrefs(config);
  }

  async reset(): Promise<void> {
    await this.configStore.resetCouncilConfigPrefs();
  }
}
