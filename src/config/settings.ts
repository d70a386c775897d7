/**
 * Settings Manager
 *
 * Editor configuration using dotted keys, the same shape as the
 * settings.json file in the user's config directory.
 */

export interface EditorSettings {
  'editor.tabSize': number;
  'editor.autoIndent': boolean;
  'editor.caseSensitiveSearch': boolean;
  'editor.writeTabs': boolean;
  'editor.undoLimit': number;
  'editor.mouseReporting': boolean;
}

export type SettingKey = keyof EditorSettings;

export const defaultSettings: Readonly<EditorSettings> = {
  'editor.tabSize': 4,
  'editor.autoIndent': true,
  'editor.caseSensitiveSearch': false,
  'editor.writeTabs': false,
  'editor.undoLimit': 500,
  'editor.mouseReporting': true,
};

/**
 * Per-document options derived from settings when a buffer is created.
 * The toggle prompt changes these on one document only.
 */
export interface DocumentOptions {
  tabSize: number;
  autoindent: boolean;
  caseSensitive: boolean;
  writeTabs: boolean;
  undoLimit: number;
}

export class Settings {
  private settings: EditorSettings;

  constructor(initial: Partial<EditorSettings> = {}) {
    this.settings = { ...defaultSettings };
    this.update(initial);
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a setting value
   */
  set<K extends SettingKey>(key: K, value: EditorSettings[K]): void {
    this.settings[key] = value;
  }

  /**
   * Update multiple settings. Undefined values are skipped.
   */
  update(partial: Partial<EditorSettings>): void {
    for (const key of Object.keys(partial) as SettingKey[]) {
      const value = partial[key];
      if (key in this.settings && value !== undefined) {
        this.set(key, value);
      }
    }
  }

  /**
   * Snapshot of the options a new document starts with.
   */
  documentOptions(): DocumentOptions {
    return {
      tabSize: this.settings['editor.tabSize'],
      autoindent: this.settings['editor.autoIndent'],
      caseSensitive: this.settings['editor.caseSensitiveSearch'],
      writeTabs: this.settings['editor.writeTabs'],
      undoLimit: this.settings['editor.undoLimit'],
    };
  }
}

export const settings = new Settings();
