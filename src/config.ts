import { readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from './errors.js';

export const DEFAULT_API_URL = 'https://openrouter.ai/api/v1/chat/completions';
export const DEFAULT_MODEL = 'openai/gpt-3.5-turbo';
export const CONFIG_FILE_NAME = '.commitcraftconfig';
export const API_KEY_ENV = 'OPENROUTER_API_KEY';

export const CONFIG_KEYS = ['api_key', 'api_url', 'default_model'] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

export interface AppConfig {
  readonly apiKey: string;
  readonly apiUrl: string;
  readonly defaultModel: string;
}

const configFileSchema = z.object({
  api_key: z.string().optional(),
  api_url: z.string().optional(),
  default_model: z.string().optional(),
});

export function getConfigPath(home: string = homedir()): string {
  return join(home, CONFIG_FILE_NAME);
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((name) => name === key);
}

function withDefaults(values: { apiKey?: string; apiUrl?: string; defaultModel?: string }): AppConfig {
  return Object.freeze({
    apiKey: values.apiKey ?? '',
    apiUrl: values.apiUrl || DEFAULT_API_URL,
    defaultModel: values.defaultModel || DEFAULT_MODEL,
  });
}

/**
 * Read the stored config only. A missing file gives the defaults; an
 * unreadable or malformed one is reported and also gives the defaults.
 */
export function readConfigFile(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      console.error(`[commitcraft] Failed to read config (using defaults): ${configPath}`);
      console.error(err instanceof Error ? err.message : err);
    }
    return withDefaults({});
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    console.error(`[commitcraft] Invalid JSON in config (using defaults): ${configPath}`);
    console.error(err instanceof Error ? err.message : err);
    return withDefaults({});
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    console.error(`[commitcraft] Invalid config values (using defaults): ${configPath}`);
    console.error(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('\n'));
    return withDefaults({});
  }

  return withDefaults({
    apiKey: parsed.data.api_key,
    apiUrl: parsed.data.api_url,
    defaultModel: parsed.data.default_model,
  });
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the config for this process: stored values, then defaults, then
 * the API key from the environment. The environment key is never saved.
 */
export function loadConfig(opts: LoadConfigOptions = {}): AppConfig {
  const configPath = opts.configPath ?? getConfigPath();
  const env = opts.env ?? process.env;

  const stored = readConfigFile(configPath);
  const envKey = env[API_KEY_ENV];

  return withDefaults({
    apiKey: envKey ? envKey : stored.apiKey,
    apiUrl: stored.apiUrl,
    defaultModel: stored.defaultModel,
  });
}

export function saveConfig(config: AppConfig, configPath: string = getConfigPath()): void {
  const data = {
    api_key: config.apiKey,
    api_url: config.apiUrl || DEFAULT_API_URL,
    default_model: config.defaultModel || DEFAULT_MODEL,
  };
  writeFileSync(configPath, JSON.stringify(data, null, 2), 'utf-8');
}

export function getConfigValue(config: AppConfig, key: ConfigKey): string {
  switch (key) {
    case 'api_key':
      return config.apiKey;
    case 'api_url':
      return config.apiUrl;
    case 'default_model':
      return config.defaultModel;
  }
}

export function setConfigValue(config: AppConfig, key: ConfigKey, value: string): AppConfig {
  switch (key) {
    case 'api_key':
      if (!value) throw new ConfigError('Invalid API key: API key cannot be empty');
      return withDefaults({ ...config, apiKey: value });
    case 'api_url':
      if (!value) throw new ConfigError('Invalid API URL: API URL cannot be empty');
      return withDefaults({ ...config, apiUrl: value });
    case 'default_model':
      return withDefaults({ ...config, defaultModel: value });
  }
}

export function parseConfigKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ConfigError(`Unknown configuration key: ${key}. Valid keys are: ${CONFIG_KEYS.join(', ')}`);
  }
  return key;
}
