import { Config } from './types.js';

export const VERSION = '1.0.0';

const LOG_LEVELS: ReadonlyArray<Config['logging']['level']> = ['error', 'warn', 'info', 'debug'];

function parseLogLevel(value: string | undefined): Config['logging']['level'] {
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? 'info';
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
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
      download: {
        userAgent: process.env.DOWNLOAD_USER_AGENT ?? `download-tracker/${VERSION}`,
        certPath: process.env.DOWNLOAD_CERT || undefined,
        chunkSize: parsePositiveInt(process.env.DOWNLOAD_CHUNK_SIZE, 8192),
        speedSamples: 5,
        tickInterval: 1000,
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
