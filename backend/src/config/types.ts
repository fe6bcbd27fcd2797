import { z } from 'zod';

/**
 * Configuration types for the chat server
 */

export const InferenceConfigSchema = z.object({
  baseUrl: z.string().url(),
  model: z.string().min(1),
  temperature: z.number().min(0).max(2)
});

export type InferenceConfig = z.infer<typeof InferenceConfigSchema>;

export const AppConfigSchema = z.object({
  port: z.number().int().positive(),
  // Shared flat file holding every identity and its history
  storePath: z.string().min(1),
  // How long a loaded store stays cached before the file is read again
  storeCacheTtlMs: z.number().int().nonnegative(),
  // Guest pruning runs on every Nth request of a session
  guestCleanupInterval: z.number().int().positive(),
  // Entries shown in the history sidebar
  historyLimit: z.number().int().positive(),
  inference: InferenceConfigSchema,
  // Platform secret file consulted when GROQ_API_KEY is not set
  secretsFile: z.string(),
  frontendUrl: z.string()
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

// Everything in config.json is optional; missing keys fall back to defaults
export const AppConfigFileSchema = AppConfigSchema.extend({
  inference: InferenceConfigSchema.partial()
}).partial();

export type AppConfigFile = z.infer<typeof AppConfigFileSchema>;
