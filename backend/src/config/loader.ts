import { readFile } from 'fs/promises';
import { join } from 'path';
import { AppConfigFileSchema, type AppConfig } from './types.js';
import { Logger } from '../utils/logger.js';

/** Returned by resolveApiKey when no credential is available; inference refuses to run with it */
export const NO_CREDENTIAL = 'NOKEY';

export const DEFAULT_CONFIG: AppConfig = {
  port: 3010,
  storePath: join('data', 'users.json'),
  storeCacheTtlMs: 5 * 60 * 1000,
  guestCleanupInterval: 10,
  historyLimit: 5,
  inference: {
    baseUrl: 'https://api.groq.com/openai/v1',
    model: 'llama-3.1-8b-instant',
    temperature: 0.7
  },
  secretsFile: '/run/secrets/groq_api_key',
  frontendUrl: 'http://localhost:5173'
};

export class ConfigLoader {
  private static instance: ConfigLoader | null = null;
  private config: AppConfig | null = null;
  private configPath: string;

  constructor(configPath?: string) {
    // Look for config in these locations (in order):
    // 1. Explicit path
    // 2. Environment variable CONFIG_PATH
    // 3. ./config/config.json
    this.configPath = configPath || process.env.CONFIG_PATH || join(process.cwd(), 'config', 'config.json');
  }

  static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      ConfigLoader.instance = new ConfigLoader();
    }
    return ConfigLoader.instance;
  }

  static resetInstance(): void {
    ConfigLoader.instance = null;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async loadConfig(): Promise<AppConfig> {
    if (this.config) {
      return this.config;
    }

    let fileContents: string;
    try {
      fileContents = await readFile(this.configPath, 'utf-8');
    } catch (error) {
      // config.json is optional
      Logger.debug(`No config file at ${this.configPath}, using defaults:`, error);
      this.config = DEFAULT_CONFIG;
      return this.config;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fileContents);
    } catch (error) {
      Logger.warn(`Config file ${this.configPath} is not valid JSON, using defaults:`, error);
      this.config = DEFAULT_CONFIG;
      return this.config;
    }

    const parsed = AppConfigFileSchema.safeParse(raw);
    if (!parsed.success) {
      Logger.warn(`Invalid configuration in ${this.configPath}, using defaults:`, parsed.error.errors);
      this.config = DEFAULT_CONFIG;
      return this.config;
    }

    const { inference, ...rest } = parsed.data;
    this.config = {
      ...DEFAULT_CONFIG,
      ...rest,
      inference: { ...DEFAULT_CONFIG.inference, ...inference }
    };
    Logger.info(`Loaded configuration from ${this.configPath}`);
    return this.config;
  }

  /**
   * Inference API key, resolved in order from the GROQ_API_KEY environment
   * variable, then the platform secret file, else NO_CREDENTIAL.
   */
  async resolveApiKey(env: NodeJS.ProcessEnv = process.env): Promise<string> {
    const fromEnv = env.GROQ_API_KEY?.trim();
    if (fromEnv) {
      return fromEnv;
    }

    const config = await this.loadConfig();
    if (config.secretsFile) {
      try {
        const secret = (await readFile(config.secretsFile, 'utf-8')).trim();
        if (secret) {
          return secret;
        }
      } catch (error) {
        Logger.debug(`No secret file at ${config.secretsFile}:`, error);
      }
    }

    return NO_CREDENTIAL;
  }
}
