import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILE,
  defaultConfig,
  initializeProject,
  isInitialized,
  loadConfig,
  localConfigPath,
  saveConfig,
} from '../config.js';
import { ValidationError } from '../ontology/errors.js';

describe('config', () => {
  let projectDir: string;
  let homeDir: string;
  let previousHome: string | undefined;

  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), 'agentlog-project-'));
    homeDir = await mkdtemp(join(tmpdir(), 'agentlog-home-'));
    previousHome = process.env.AGENTLOG_HOME;
    process.env.AGENTLOG_HOME = homeDir;
  });

  afterEach(async () => {
    if (previousHome === undefined) {
      delete process.env.AGENTLOG_HOME;
    } else {
      process.env.AGENTLOG_HOME = previousHome;
    }
    await rm(projectDir, { recursive: true, force: true });
    await rm(homeDir, { recursive: true, force: true });
  });

  it('has connector and output defaults', () => {
    expect(defaultConfig()).toEqual({
      version: '0.1.0',
      connector: {
        defaultFormat: 'openai',
        defaultModelId: 'gpt-4',
        interfaceId: 'openai-api',
        capabilityVersion: '1.0.0',
      },
      output: { indent: 2 },
    });
  });

  it('falls back to defaults when no config exists', async () => {
    expect(await loadConfig(projectDir)).toEqual(defaultConfig());
  });

  it('initializes a project', async () => {
    expect(isInitialized(projectDir)).toBe(false);
    await initializeProject(projectDir);
    expect(isInitialized(projectDir)).toBe(true);

    const written: unknown = JSON.parse(await readFile(localConfigPath(projectDir), 'utf-8'));
    expect(written).toEqual(defaultConfig());
  });

  it('reads the local config and fills missing keys', async () => {
    await mkdir(join(projectDir, '.agentlog'));
    await writeFile(localConfigPath(projectDir), JSON.stringify({ connector: { defaultModelId: 'local-model' } }));

    const config = await loadConfig(projectDir);
    expect(config.connector.defaultModelId).toBe('local-model');
    expect(config.connector.interfaceId).toBe('openai-api');
    expect(config.output.indent).toBe(2);
  });

  it('falls back to the global config', async () => {
    await writeFile(join(homeDir, CONFIG_FILE), JSON.stringify({ output: { indent: 0 } }));
    expect((await loadConfig(projectDir)).output.indent).toBe(0);
  });

  it('prefers the local config over the global one', async () => {
    await writeFile(join(homeDir, CONFIG_FILE), JSON.stringify({ output: { indent: 0 } }));
    await saveConfig({ ...defaultConfig(), output: { indent: 4 } }, projectDir);
    expect((await loadConfig(projectDir)).output.indent).toBe(4);
  });

  it('rejects config files that are not JSON', async () => {
    await mkdir(join(projectDir, '.agentlog'));
    await writeFile(localConfigPath(projectDir), '{ indent: 2');

    const error = await loadConfig(projectDir).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.entity).toBe('Config');
      expect(error.field).toBe(localConfigPath(projectDir));
    }
  });

  it('rejects out-of-range values', async () => {
    await mkdir(join(projectDir, '.agentlog'));
    await writeFile(localConfigPath(projectDir), JSON.stringify({ output: { indent: 20 } }));

    const error = await loadConfig(projectDir).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.field).toBe('output.indent');
    }
  });
});
