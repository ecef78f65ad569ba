export interface CouncilConfigPrefs {
  chairmanModel?: string;
  councilModels?: string[];
  webSearchEnabled?: boolean;
  apiKey?: string;
}

export interface ConfigStore {
  getCouncilConfigPrefs(): Promise<CouncilConfigPrefs>;
  /** Merges into the stored preferences; keys left out keep their value. */
  saveCouncilConfigPrefs(prefs: CouncilConfigPrefs): Promise<void>;
  resetCouncilConfigPrefs(): Promise<void>;
}
