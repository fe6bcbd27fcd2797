/**
 * Category logger. Categories are toggled through LOG_* environment variables,
 * read on every call so values loaded from .env after import still apply.
 */

export const LOG_CATEGORIES = ['store', 'session', 'debug', 'inference'] as const;
export type LogCategory = typeof LOG_CATEGORIES[number];

const CATEGORY_SWITCHES: Record<LogCategory, { variable: string; enabledByDefault: boolean }> = {
  store: { variable: 'LOG_STORE', enabledByDefault: true },         // store reads/writes and guest pruning
  session: { variable: 'LOG_SESSION', enabledByDefault: false },    // session lifecycle
  debug: { variable: 'LOG_DEBUG', enabledByDefault: false },        // noisy debug logs
  inference: { variable: 'LOG_INFERENCE', enabledByDefault: false } // requests to the model
};

export function isCategoryEnabled(category: LogCategory, env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.LOG_ALL === 'true') return true;
  const { variable, enabledByDefault } = CATEGORY_SWITCHES[category];
  return enabledByDefault ? env[variable] !== 'false' : env[variable] === 'true';
}

export class Logger {
  static store(...args: unknown[]) {
    Logger.write('store', args);
  }

  static session(...args: unknown[]) {
    Logger.write('session', args);
  }

  static debug(...args: unknown[]) {
    Logger.write('debug', args);
  }

  static inference(...args: unknown[]) {
    Logger.write('inference', args);
  }

  // error, warn and info are never filtered
  static error(...args: unknown[]) {
    console.error(...args);
  }

  static warn(...args: unknown[]) {
    console.warn(...args);
  }

  static info(...args: unknown[]) {
    console.log(...args);
  }

  /** Startup summary of which categories are on */
  static printSettings(env: NodeJS.ProcessEnv = process.env) {
    console.log('📊 Log Settings:');
    for (const category of LOG_CATEGORIES) {
      const enabled = isCategoryEnabled(category, env);
      console.log(`  ${category}: ${enabled ? '✅' : '❌'} (${CATEGORY_SWITCHES[category].variable})`);
    }
    console.log('  To change: LOG_DEBUG=true LOG_STORE=false npm start\n');
  }

  private static write(category: LogCategory, args: unknown[]) {
    if (isCategoryEnabled(category)) {
      console.log(...args);
    }
  }
}
