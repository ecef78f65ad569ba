import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { ConfigStore, CouncilConfigPrefs } from '../ports/config-store.js';
import { StorageError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('config-store');

const CouncilConfigPrefsSchema = z.object({
  chairmanModel: z.string().optional(),
  councilModels: z.array(z.string()).optional(),
  webSearchEnabled: z.boolean().optional(),
  apiKey: z.string().optional(),
});

const PreferencesSchema = z
  .object({
    councilConfig: CouncilConfigPrefsSchema.optional(),
  })
  .passthrough();

type Preferences = z.infer<typeof PreferencesSchema>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonConfigStore implements ConfigStore {
  constructor(private readonly configDir: string) {}

  get prefsPath(): string {
    return join(this.configDir, 'preferences.json');
  }

  private async readPrefs(): Promise<Preferences> {
    let data: string;
    try {
      data = await readFile(this.prefsPath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return {};
      throw new StorageError(`Could not read ${this.prefsPath}`, { cause: err });
    }

    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch (err) {
      throw new StorageError(`${this.prefsPath} is not valid JSON`, { cause: err });
    }
    const parsed = PreferencesSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError(`${this.prefsPath} is invalid: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    return parsed.data;
  }

  private async writePrefs(prefs: Preferences): Promise<void> {
    await mkdir(this.configDir, { recursive: true });
    await writeFile(this.prefsPath, JSON.stringify(prefs, null, 2), 'utf-8');
    log.debug(`wrote ${this.prefsPath}`);
  }

  async getCouncilConfigPrefs(): Promise<CouncilConfigPrefs> {
    const prefs = await this.readPrefs();
    return prefs.councilConfig ?? {};
  }

  async saveCouncilConfigPrefs(config: CouncilConfigPrefs): Promise<void> {
    const prefs = await this.readPrefs();
    prefs.councilConfig = { ...prefs.councilConfig, ...config };
    await this.writePrefs(prefs);
  }

  async resetCouncilConfigPrefs(): Promise<void> {
    const prefs = await this.readPrefs();
    delete prefs.councilConfig;
    await this.writePrefs(prefs);
  }
}
