import { readFileSync } from 'node:fs';

import type { OutlineSettingsStore } from '../application/ports';
import { mergeOutlineSettings, type OutlineSettings } from '../application/settings';

export const DEFAULT_SETTINGS_FILE = 'mdtoc.config.json';

export class JsonFileSettingsStore implements OutlineSettingsStore {
  private readonly filePath: string;

  constructor(filePath: string = DEFAULT_SETTINGS_FILE) {
    this.filePath = filePath;
  }

  load(): OutlineSettings {
    try {
      const raw = readFileSync(this.filePath, 'utf8');
      const parsed: unknown = JSON.parse(raw);
      return mergeOutlineSettings(parsed);
    } catch {
      // Missing or malformed config files fall back to defaults.
      return mergeOutlineSettings(undefined);
    }
  }
}
