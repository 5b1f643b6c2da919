import type { ServerConfig } from "../types/config.js";
import { defaultConfig, readConfig } from "./loader.js";
import { logger } from "../logger.js";

/** Install-related user preferences, as read at the start of one operation. */
export interface Preferences {
  readonly showOutputWindowForInstalls: boolean;
  readonly elevateToolInstalls: boolean;
}

/**
 * Source of preferences. Operations call read() once each and never cache
 * the result, so edits take effect on the next operation.
 */
export interface PreferenceSource {
  read(): Preferences;
}

export function preferencesFromConfig(config: ServerConfig): Preferences {
  return {
    showOutputWindowForInstalls: config.preferences.show_output_window_for_installs,
    elevateToolInstalls: config.preferences.elevate_tool_installs,
  };
}

/** Fixed preferences. */
export function staticPreferences(prefs: Partial<Preferences> = {}): PreferenceSource {
  const value: Preferences = {
    showOutputWindowForInstalls: prefs.showOutputWindowForInstalls ?? true,
    elevateToolInstalls: prefs.elevateToolInstalls ?? false,
  };
  return { read: () => value };
}

/**
 * Re-reads the config file on every read(). Never writes it; a missing or
 * unreadable file gives the default preferences.
 */
export function configPreferenceSource(configPath: string): PreferenceSource {
  return {
    read: () => {
      try {
        return preferencesFromConfig(readConfig(configPath));
      } catch (err) {
        logger.debug({ configPath, error: err }, "Preferences unreadable — using defaults");
        return preferencesFromConfig(defaultConfig());
      }
    },
  };
}
