import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

import { DEFAULT_CHAT_BASE_URL } from '@estate-lens/chat-core';

import { ConfigError } from './configError.js';
import { DEFAULT_API_KEY_ENV, cliConfigSchema, type CliConfig } from './types.js';

export const DEFAULT_MODEL = 'sonar';

function createDefaultConfig(): CliConfig {
  return {
    schemaVersion: 1,
    defaultProfile: 'default',
    profiles: {
      default: {
        endpoint: DEFAULT_CHAT_BASE_URL,
        model: DEFAULT_MODEL,
        apiKeyEnv: DEFAULT_API_KEY_ENV,
        updatedAt: new Date(0).toISOString(),
      },
    },
  };
}

export class ConfigStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  getPath(): string {
    return this.filePath;
  }

  async ensureInitialized(): Promise<boolean> {
    try {
      await access(this.filePath);
      return false;
    } catch {
      await this.save(createDefaultConfig());
      return true;
    }
  }

  async load(): Promise<CliConfig> {
    const content = await readFile(this.filePath, 'utf-8');

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`config file ${this.filePath} is not valid JSON: ${reason}`);
    }

    const parsed = cliConfigSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`config file ${this.filePath} is invalid: ${issues}`);
    }

    return parsed.data;
  }

  async save(config: CliConfig): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(config, null, 2), 'utf-8');
  }
}
