/**
 * Settings
 *
 * Loads mirror-config settings from YAML, TOML or JSON, applies environment
 * overrides and resolves {{VARIABLE}} placeholders in paths
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { SettingsError } from "./errors.js";
import { readIfExists } from "./fsUtils.js";
import {
  TemplateVariableResolver,
  type VariableSource,
} from "./TemplateVariableResolver.js";
import type { Settings } from "./types.js";

export const SETTINGS_FILENAMES = [
  "mirror-config.yaml",
  "mirror-config.yml",
  "mirror-config.toml",
  "mirror-config.json",
];

export const DEFAULT_SETTINGS: Settings = {
  mirrorHome: "{{HOME}}/MagicMirror",
  workspace: "{{HOME}}/my_config",
  pagesModule: "MMM-pages",
  placeholder: "MODULE",
  indent: "      ",
  fragmentExtension: ".js",
  baselineModules: ["clock"],
  protectedPrefix: "default/",
  process: {
    fallbackName: "MagicMirror",
    knownNames: ["magicmirror", "mm", "magic-mirror"],
    pathHint: "magicmirror",
  },
  verifyTimeoutMs: 30_000,
};

export interface LoadSettingsOptions {
  /** Explicit settings file; otherwise searched for in the workspace */
  configPath?: string;
  /** Defaults to process.env with HOME filled in */
  env?: VariableSource;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Parse a settings file by extension
 */
export async function parseSettingsFile(filePath: string): Promise<unknown> {
  const ext = path.extname(filePath).toLowerCase();
  const content = await fs.readFile(filePath, "utf-8");

  try {
    if ([".yaml", ".yml"].includes(ext)) {
      const YAML = await import("yaml");
      return YAML.parse(content) ?? {};
    }
    if (ext === ".toml") {
      const TOML = await import("@iarna/toml");
      return TOML.parse(content);
    }
    if (ext === ".json") {
      return JSON.parse(content);
    }
  } catch (error) {
    throw new SettingsError(
      `Invalid settings file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  throw new SettingsError(`Unsupported settings format: ${filePath}`);
}

/**
 * Merge raw parsed values over the defaults, checking each value's type
 */
export function mergeSettings(raw: unknown, source = "settings"): Settings {
  if (!isRecord(raw)) {
    throw new SettingsError(`${source}: expected a mapping at the top level`);
  }

  const settings: Settings = {
    ...DEFAULT_SETTINGS,
    baselineModules: [...DEFAULT_SETTINGS.baselineModules],
    process: {
      ...DEFAULT_SETTINGS.process,
      knownNames: [...DEFAULT_SETTINGS.process.knownNames],
    },
  };
  const errors: string[] = [];

  const stringKeys = [
    "mirrorHome",
    "workspace",
    "pagesModule",
    "placeholder",
    "indent",
    "fragmentExtension",
    "protectedPrefix",
  ] as const;

  for (const [key, value] of Object.entries(raw)) {
    const stringKey = stringKeys.find((k) => k === key);
    if (stringKey) {
      if (typeof value === "string") {
        settings[stringKey] = value;
      } else {
        errors.push(`${key} must be a string`);
      }
    } else if (key === "baselineModules") {
      if (isStringArray(value)) {
        settings.baselineModules = value;
      } else {
        errors.push(`${key} must be a list of strings`);
      }
    } else if (key === "verifyTimeoutMs") {
      if (typeof value === "number" && Number.isInteger(value) && value > 0) {
        settings.verifyTimeoutMs = value;
      } else {
        errors.push(`${key} must be a positive integer`);
      }
    } else if (key === "process") {
      if (!isRecord(value)) {
        errors.push(`${key} must be a mapping`);
        continue;
      }
      for (const [subKey, subValue] of Object.entries(value)) {
        if (subKey === "fallbackName" || subKey === "pathHint") {
          if (typeof subValue === "string") {
            settings.process[subKey] = subValue;
          } else {
            errors.push(`process.${subKey} must be a string`);
          }
        } else if (subKey === "knownNames") {
          if (isStringArray(subValue)) {
            settings.process.knownNames = subValue.map((n) => n.toLowerCase());
          } else {
            errors.push(`process.${subKey} must be a list of strings`);
          }
        } else {
          console.warn(`⚠️  ${source}: unknown setting process.${subKey}`);
        }
      }
    } else {
      console.warn(`⚠️  ${source}: unknown setting ${key}`);
    }
  }

  if (errors.length > 0) {
    throw new SettingsError(
      `${source}:\n${errors.map((e) => `  • ${e}`).join("\n")}`,
    );
  }

  return settings;
}

/**
 * Load settings: defaults ← settings file ← environment, then resolve paths
 */
export async function loadSettings(
  options: LoadSettingsOptions = {},
): Promise<Settings> {
  const env = options.env ?? TemplateVariableResolver.environment();

  let filePath = options.configPath;
  if (!filePath) {
    const workspace = resolvePath(
      env.MIRROR_CONFIG_WORKSPACE ?? DEFAULT_SETTINGS.workspace,
      env,
    );
    for (const name of SETTINGS_FILENAMES) {
      const candidate = path.join(workspace, name);
      if ((await readIfExists(candidate)) !== null) {
        filePath = candidate;
        break;
      }
    }
  }

  const settings = filePath
    ? mergeSettings(await parseSettingsFile(filePath), filePath)
    : mergeSettings({});

  if (env.MAGICMIRROR_HOME) {
    settings.mirrorHome = env.MAGICMIRROR_HOME;
  }
  if (env.MIRROR_CONFIG_WORKSPACE) {
    settings.workspace = env.MIRROR_CONFIG_WORKSPACE;
  }

  settings.mirrorHome = resolvePath(settings.mirrorHome, env);
  settings.workspace = resolvePath(settings.workspace, env);

  return settings;
}

function resolvePath(template: string, env: VariableSource): string {
  try {
    return path.resolve(TemplateVariableResolver.resolve(template, env));
  } catch (error) {
    throw new SettingsError(
      error instanceof Error ? error.message : String(error),
    );
  }
}
