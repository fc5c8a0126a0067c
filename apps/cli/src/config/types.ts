import { z } from 'zod';

export const DEFAULT_API_KEY_ENV = 'PERPLEXITY_API_KEY';

export const profileConfigSchema = z.object({
  endpoint: z.string(),
  model: z.string(),
  apiKeyEnv: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  logFile: z.string().optional(),
  updatedAt: z.string(),
});

export const cliConfigSchema = z.object({
  schemaVersion: z.literal(1),
  defaultProfile: z.string(),
  profiles: z.record(profileConfigSchema),
});

export type ProfileConfig = z.infer<typeof profileConfigSchema>;

export type CliConfig = z.infer<typeof cliConfigSchema>;

export interface ProfileSummary {
  name: string;
  endpoint: string;
  model: string;
  apiKeyEnv: string;
  updatedAt: string;
  isDefault: boolean;
}

export interface UpsertProfileInput {
  endpoint: string;
  model: string;
  apiKeyEnv?: string;
  timeoutMs?: number;
  logFile?: string;
}

export interface ResolvedProfile {
  name: string;
  endpoint: string;
  model: string;
  apiKeyEnv: string;
  timeoutMs?: number;
  logFile?: string;
  apiKey?: string;
}

/** The slice of ConfigService that search-style commands depend on. */
export interface ProfileResolver {
  getProfile(name?: string): Promise<ResolvedProfile>;
}
