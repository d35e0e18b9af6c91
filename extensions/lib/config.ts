/**
 * config.ts — TOML settings for vault-picker.
 *
 * Read from ~/.vault-picker/config.toml (or $VAULT_PICKER_CONFIG):
 *
 *   [vault]
 *   dir = "~/notes"
 *
 *   [picker]
 *   search = "ripgrep"   # or "builtin"
 *   override = false     # start with the fuzzy picker enabled
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseToml } from "smol-toml";

// ---- Types ----

export const SEARCH_NAMES = ["ripgrep", "builtin"] as const;
export type SearchName = (typeof SEARCH_NAMES)[number];

export interface PickerConfig {
  vault: {
    dir: string;
  };
  picker: {
    search: SearchName;
    override: boolean;
  };
}

export interface LoadedConfig {
  config: PickerConfig;
  warnings: string[];
}

// ---- Constants ----

export const CONFIG_PATH =
  process.env.VAULT_PICKER_CONFIG || join(process.env.HOME || "", ".vault-picker", "config.toml");

export const DEFAULT_CONFIG: PickerConfig = {
  vault: { dir: "~/notes" },
  picker: { search: "ripgrep", override: false },
};

function defaults(): PickerConfig {
  return {
    vault: { ...DEFAULT_CONFIG.vault },
    picker: { ...DEFAULT_CONFIG.picker },
  };
}

function isSearchName(v: string): v is SearchName {
  return SEARCH_NAMES.some((n) => n === v);
}

function table(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const section = raw[name];
  if (section == null) return {};
  if (typeof section !== "object" || Array.isArray(section)) {
    throw new Error(`[${name}] must be a table`);
  }
  return { ...section };
}

// ---- Parsing ----

/**
 * Parse a config.toml string. Missing keys take their defaults.
 * Throws on invalid TOML or wrong types.
 */
export function parseConfigToml(content: string): PickerConfig {
  const raw: Record<string, unknown> = parseToml(content);
  const vault = table(raw, "vault");
  const picker = table(raw, "picker");

  const config = defaults();

  if (vault.dir != null) {
    if (typeof vault.dir !== "string" || vault.dir.trim() === "") {
      throw new Error("vault.dir must be a non-empty string");
    }
    config.vault.dir = vault.dir;
  }

  if (picker.search != null) {
    if (typeof picker.search !== "string" || !isSearchName(picker.search)) {
      throw new Error(`picker.search must be one of: ${SEARCH_NAMES.join(", ")}`);
    }
    config.picker.search = picker.search;
  }

  if (picker.override != null) {
    if (typeof picker.override !== "boolean") {
      throw new Error(`picker.override must be boolean, got ${typeof picker.override}`);
    }
    config.picker.override = picker.override;
  }

  return config;
}

/** Defaults when the file is missing; defaults plus a warning when it is broken. */
export function loadConfig(path: string = CONFIG_PATH): LoadedConfig {
  if (!existsSync(path)) return { config: defaults(), warnings: [] };
  try {
    return { config: parseConfigToml(readFileSync(path, "utf-8")), warnings: [] };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { config: defaults(), warnings: [`${path}: ${msg} (using defaults)`] };
  }
}
