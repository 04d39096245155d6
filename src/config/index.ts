import type { Config, LogLevel } from './types.js';

const VERSION = '1.0.0';
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  return level ?? 'info';
}

export class ConfigManager {
  private static instance: ConfigManager;
  private config: Config;

  private constructor() {
    this.config = this.loadConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  public getConfig(): Config {
    return this.config;
  }

  public get<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  private loadConfig(): Config {
    const config: Config = {
      throughput: {
        windowMs: 1000,
        windowCapacity: 10,
      },
      reporter: {
        intervalMs: 1000,
      },
      http: {
        userAgent: `rangefetch/${VERSION}`,
      },
      logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
        file: process.env.LOG_FILE,
      },
    };

    return config;
  }

  public updateConfig(updates: Partial<Config>): void {
    this.config = { ...this.config, ...updates };
  }
}

// Export singleton instance getter
export const getConfig = (): Config => ConfigManager.getInstance().getConfig();
