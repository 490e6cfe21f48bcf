/**
 * LLM Configuration
 *
 * Model settings for the default Anthropic collaborators, resolved from
 * (lowest to highest priority) defaults, a JSON config file, environment
 * variables and runtime overrides. A layer never clears a value with
 * undefined/null.
 *
 * Config file locations, first hit wins:
 *   <custom path>, ./research-agent.config.json, ./.research-agent.config.json,
 *   ~/.research-agent/llm.config.json
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import _ from 'lodash';
import { z } from 'zod';
import { createAgentLogger } from '../tracing';

const log = createAgentLogger('LLMConfig', 'config');

export interface LLMConfig {
  apiKey?: string;
  /** Alternative Anthropic-compatible endpoint */
  baseUrl?: string;
  model?: string;
  /** 0..1 */
  temperature?: number;
  maxTokens?: number;
  /** Per request, milliseconds */
  timeout?: number;
  /** SDK-level retries per model call */
  maxRetries?: number;
}

export const DEFAULT_LLM_CONFIG: LLMConfig = {
  model: 'claude-3-5-haiku-20241022',
  temperature: 0,
  maxTokens: 2048,
  timeout: 60000,
  maxRetries: 2,
};

const CONFIG_PATHS = [
  './research-agent.config.json',
  './.research-agent.config.json',
  path.join(os.homedir(), '.research-agent', 'llm.config.json'),
];

export const ENV_MAPPINGS: Record<keyof LLMConfig, string> = {
  apiKey: 'ANTHROPIC_API_KEY',
  baseUrl: 'ANTHROPIC_API_URL',
  model: 'LLM_MODEL',
  temperature: 'LLM_TEMPERATURE',
  maxTokens: 'LLM_MAX_TOKENS',
  timeout: 'LLM_TIMEOUT',
  maxRetries: 'LLM_MAX_RETRIES',
};

// Each field falls back to undefined on its own, so one bad key does not
// discard the rest of the file
const ConfigFileSchema = z.object({
  apiKey: z.string().optional().catch(undefined),
  baseUrl: z.string().optional().catch(undefined),
  model: z.string().optional().catch(undefined),
  temperature: z
    .number()
    .transform((value) => _.clamp(value, 0, 1))
    .optional()
    .catch(undefined),
  maxTokens: z.number().int().positive().optional().catch(undefined),
  timeout: z.number().positive().optional().catch(undefined),
  maxRetries: z.number().int().nonnegative().optional().catch(undefined),
});

function resolveConfigPath(customPath?: string): string | null {
  const candidates = customPath ? [customPath, ...CONFIG_PATHS] : CONFIG_PATHS;
  const found = candidates
    .map((candidate) => (path.isAbsolute(candidate) ? candidate : path.resolve(process.cwd(), candidate)))
    .find((candidate) => fs.existsSync(candidate));
  return found ?? null;
}

/**
 * @throws Error when the file cannot be read or is not JSON
 */
function readConfigFile(filePath: string): Partial<LLMConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new Error(
      `Failed to read LLM config from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn('Config file is not a JSON object, ignoring it', { filePath });
    return {};
  }
  return parsed.data;
}

function envString(key: keyof LLMConfig): string | undefined {
  const value = process.env[ENV_MAPPINGS[key]]?.trim();
  return value ? value : undefined;
}

function envNumber(key: keyof LLMConfig): number | undefined {
  const raw = envString(key);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

function readEnv(): Partial<LLMConfig> {
  return {
    apiKey: envString('apiKey'),
    baseUrl: envString('baseUrl'),
    model: envString('model'),
    temperature: envNumber('temperature'),
    maxTokens: envNumber('maxTokens'),
    timeout: envNumber('timeout'),
    maxRetries: envNumber('maxRetries'),
  };
}

function defined<T extends object>(layer: T): Partial<T> {
  return _.omitBy<T>(layer, _.isNil);
}

let cachedConfig: LLMConfig | null = null;
let loadedFrom: string | null = null;

/**
 * Resolve the LLM configuration. Calls without overrides or a custom
 * path are cached until `clearConfigCache()` or `forceReload`.
 *
 * @param customConfigPath - file searched before the default locations
 */
export function loadLLMConfig(
  overrides?: Partial<LLMConfig>,
  customConfigPath?: string,
  forceReload = false
): LLMConfig {
  const cacheable = !overrides && !customConfigPath;
  if (cacheable && cachedConfig && !forceReload) {
    return cachedConfig;
  }

  const filePath = resolveConfigPath(customConfigPath);
  if (filePath) {
    loadedFrom = filePath;
    log.info('Using config file', { filePath });
  }

  const config: LLMConfig = {
    ...defined(DEFAULT_LLM_CONFIG),
    ...(filePath ? defined(readConfigFile(filePath)) : {}),
    ...defined(readEnv()),
    ...defined(overrides ?? {}),
  };

  log.debug('Resolved LLM config', {
    model: config.model,
    hasApiKey: Boolean(config.apiKey),
    baseUrl: config.baseUrl,
    timeout: config.timeout,
    maxRetries: config.maxRetries,
  });

  if (cacheable) {
    cachedConfig = config;
  }
  return config;
}

/**
 * Path of the config file used by the last load, if any
 */
export function getConfigPath(): string | null {
  return loadedFrom;
}

export function clearConfigCache(): void {
  cachedConfig = null;
  loadedFrom = null;
}
