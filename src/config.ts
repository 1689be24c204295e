/**
 * agentlog Configuration
 *
 * Manages .agentlog/config.json in the current project directory.
 * Also supports global config at ~/.agentlog/config.json (or
 * $AGENTLOG_HOME/config.json).
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import { ValidationError } from './ontology/errors.js';
import { parseEntity } from './ontology/validation.js';

/** Directory name for local agentlog config */
export const AGENTLOG_DIR = '.agentlog';

/** Config filename */
export const CONFIG_FILE = 'config.json';

export const ConfigSchema = z.object({
  version: z.string().default('0.1.0'),
  connector: z
    .object({
      /** Trace format assumed when none is given on the command line */
      defaultFormat: z.string().default('openai'),
      defaultModelId: z.string().default('gpt-4'),
      interfaceId: z.string().default('openai-api'),
      capabilityVersion: z.string().default('1.0.0'),
    })
    .default({}),
  output: z
    .object({
      /** JSON indentation; 0 writes compact documents */
      indent: z.number().int().min(0).max(10).default(2),
    })
    .default({}),
});

export type AgentLogConfig = z.infer<typeof ConfigSchema>;

/**
 * Default configuration for new projects.
 */
export function defaultConfig(): AgentLogConfig {
  return ConfigSchema.parse({});
}

/**
 * Resolve the global agentlog home directory.
 */
export function globalConfigDir(): string {
  return process.env.AGENTLOG_HOME ?? join(homedir(), AGENTLOG_DIR);
}

/**
 * Resolve the local .agentlog directory for the current project.
 */
export function localConfigDir(cwd?: string): string {
  return join(resolve(cwd ?? process.cwd()), AGENTLOG_DIR);
}

/**
 * Resolve the path to the local config file.
 */
export function localConfigPath(cwd?: string): string {
  return join(localConfigDir(cwd), CONFIG_FILE);
}

/**
 * Check if agentlog is initialized in the given directory.
 */
export function isInitialized(cwd?: string): boolean {
  return existsSync(localConfigPath(cwd));
}

/**
 * Load the config from the local .agentlog/ directory.
 * Falls back to global config if local doesn't exist, then to defaults.
 *
 * @throws ValidationError when a config file is not valid
 */
export async function loadConfig(cwd?: string): Promise<AgentLogConfig> {
  const localPath = localConfigPath(cwd);
  const globalPath = join(globalConfigDir(), CONFIG_FILE);

  for (const configPath of [localPath, globalPath]) {
    if (existsSync(configPath)) {
      const raw = await readFile(configPath, 'utf-8');
      return parseConfig(raw, configPath);
    }
  }

  return defaultConfig();
}

function parseConfig(raw: string, configPath: string): AgentLogConfig {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError('Config', [{ path: configPath, message: `Not valid JSON: ${reason}` }]);
  }
  return parseEntity(ConfigSchema, data, 'Config');
}

/**
 * Save the config to the local .agentlog/ directory.
 */
export async function saveConfig(config: AgentLogConfig, cwd?: string): Promise<void> {
  const dir = localConfigDir(cwd);
  await mkdir(dir, { recursive: true });
  const configPath = join(dir, CONFIG_FILE);
  await writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
}

/**
 * Initialize agentlog in the given directory.
 * Creates .agentlog/ and writes default config.
 */
export async function initializeProject(cwd?: string): Promise<AgentLogConfig> {
  const config = defaultConfig();
  await saveConfig(config, cwd);
  return config;
}
