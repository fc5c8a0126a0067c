import process from 'node:process';

import { ConfigError } from './configError.js';
import { ConfigStore } from './configStore.js';
import {
  DEFAULT_API_KEY_ENV,
  type CliConfig,
  type ProfileResolver,
  type ProfileSummary,
  type ResolvedProfile,
  type UpsertProfileInput,
} from './types.js';

export { ConfigError };

export class ConfigService implements ProfileResolver {
  private readonly store: ConfigStore;

  private readonly env: NodeJS.ProcessEnv;

  private cache?: CliConfig;

  constructor(store: ConfigStore, env: NodeJS.ProcessEnv = process.env) {
    this.store = store;
    this.env = env;
  }

  async initialize(): Promise<void> {
    await this.store.ensureInitialized();
  }

  async ensureConfigFile(): Promise<{ created: boolean; path: string }> {
    const created = await this.store.ensureInitialized();
    return { created, path: this.store.getPath() };
  }

  async getProfile(name?: string): Promise<ResolvedProfile> {
    const config = await this.loadConfig();
    const profileName = name ?? config.defaultProfile;
    const profile = Object.hasOwn(config.profiles, profileName) ? config.profiles[profileName] : undefined;

    if (!profile) {
      throw new ConfigError(`profile '${profileName}' does not exist`);
    }

    const apiKeyEnv = profile.apiKeyEnv ?? DEFAULT_API_KEY_ENV;
    const apiKey = this.env[apiKeyEnv]?.trim() || undefined;

    return {
      name: profileName,
      endpoint: profile.endpoint,
      model: profile.model,
      apiKeyEnv,
      timeoutMs: profile.timeoutMs,
      logFile: profile.logFile,
      apiKey,
    };
  }

  async upsertProfile(name: string, input: UpsertProfileInput): Promise<void> {
    const profileName = name.trim();
    if (!profileName) {
      throw new ConfigError('profile name must not be empty');
    }

    const config = await this.loadConfig();
    config.profiles[profileName] = {
      endpoint: input.endpoint,
      model: input.model,
      apiKeyEnv: input.apiKeyEnv,
      timeoutMs: input.timeoutMs,
      logFile: input.logFile,
      updatedAt: new Date().toISOString(),
    };

    if (!config.defaultProfile) {
      config.defaultProfile = profileName;
    }

    await this.persist(config);
  }

  async setDefaultProfile(name: string): Promise<void> {
    const config = await this.loadConfig();
    if (!Object.hasOwn(config.profiles, name)) {
      throw new ConfigError(`profile '${name}' does not exist`);
    }

    config.defaultProfile = name;
    await this.persist(config);
  }

  async listProfiles(): Promise<ProfileSummary[]> {
    const config = await this.loadConfig();
    return Object.entries(config.profiles).map(([name, profile]) => ({
      name,
      endpoint: profile.endpoint,
      model: profile.model,
      apiKeyEnv: profile.apiKeyEnv ?? DEFAULT_API_KEY_ENV,
      updatedAt: profile.updatedAt,
      isDefault: name === config.defaultProfile,
    }));
  }

  private async loadConfig(): Promise<CliConfig> {
    if (!this.cache) {
      this.cache = await this.store.load();
    }
    return this.cache;
  }

  private async persist(config: CliConfig): Promise<void> {
    this.cache = config;
    await this.store.save(config);
  }
}
