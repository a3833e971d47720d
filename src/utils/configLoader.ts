import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { parsePort } from './cliArgs';

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
}

export interface StorageConfig {
  videosPath: string;
  catalogPath: string;
}

export interface MirrorConfig {
  requestTimeoutMs: number;
}

export interface CleanupConfig {
  enabled: boolean;
  staleAfterMinutes: number;
  intervalMinutes: number;
}

export interface LoggingConfig {
  directory: string;
  toFile: boolean;
}

export interface AppConfig {
  server: ServerConfig;
  storage: StorageConfig;
  mirror: MirrorConfig;
  cleanup: CleanupConfig;
  logging: LoggingConfig;
}

type PartialAppConfig = { [K in keyof AppConfig]?: Partial<AppConfig[K]> };

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private config: AppConfig;
  private configPath: string;

  private constructor(configPath: string) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  public static getInstance(): ConfigLoader {
    if (!ConfigLoader.instance) {
      const defaultPath = process.env.CONFIG_PATH || path.join(process.cwd(), 'config.yaml');
      ConfigLoader.instance = new ConfigLoader(defaultPath);
    }
    return ConfigLoader.instance;
  }

  /**
   * Loads a configuration file without touching the shared instance.
   */
  public static fromFile(configPath: string): ConfigLoader {
    return new ConfigLoader(configPath);
  }

  private loadConfig(): AppConfig {
    try {
      if (!fs.existsSync(this.configPath)) {
        console.warn(`Configuration file not found at ${this.configPath}, using default values`);
        const config = this.getDefaultConfig();
        this.applyEnvironmentOverrides(config);
        return config;
      }

      const fileContents = fs.readFileSync(this.configPath, 'utf8');
      const yamlConfig: unknown = yaml.load(fileContents);

      const config = this.mergeWithDefaults(this.toPartialConfig(yamlConfig));

      this.applyEnvironmentOverrides(config);

      console.info('Configuration loaded successfully');
      return config;
    } catch (error) {
      console.error(`Error loading configuration: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return this.getDefaultConfig();
    }
  }

  private getDefaultConfig(): AppConfig {
    return {
      server: {
        port: 8080,
        host: '0.0.0.0',
        logLevel: 'info'
      },
      storage: {
        videosPath: path.join(process.cwd(), 'videos'),
        catalogPath: path.join(process.cwd(), 'videos.db')
      },
      mirror: {
        requestTimeoutMs: 30000
      },
      cleanup: {
        enabled: true,
        staleAfterMinutes: 60,
        intervalMinutes: 30
      },
      logging: {
        directory: path.join(process.cwd(), 'logs'),
        toFile: true
      }
    };
  }

  // YAML gives back untyped data, so only plain-object sections are kept.
  private toPartialConfig(raw: unknown): PartialAppConfig {
    if (!isRecord(raw)) {
      return {};
    }
    const section = <K extends keyof AppConfig>(key: K): Partial<AppConfig[K]> | undefined => {
      const value = raw[key];
      return isRecord(value) ? (value as Partial<AppConfig[K]>) : undefined;
    };
    return {
      server: section('server'),
      storage: section('storage'),
      mirror: section('mirror'),
      cleanup: section('cleanup'),
      logging: section('logging')
    };
  }

  private mergeWithDefaults(partialConfig: PartialAppConfig): AppConfig {
    const defaults = this.getDefaultConfig();
    const storage = { ...defaults.storage, ...partialConfig.storage };
    const logging = { ...defaults.logging, ...partialConfig.logging };

    // Relative paths in the file are taken from the file's own directory.
    const baseDir = path.dirname(this.configPath);
    storage.videosPath = path.resolve(baseDir, storage.videosPath);
    storage.catalogPath = path.resolve(baseDir, storage.catalogPath);
    logging.directory = path.resolve(baseDir, logging.directory);

    return {
      server: { ...defaults.server, ...partialConfig.server },
      storage,
      mirror: { ...defaults.mirror, ...partialConfig.mirror },
      cleanup: { ...defaults.cleanup, ...partialConfig.cleanup },
      logging
    };
  }

  private applyEnvironmentOverrides(config: AppConfig): void {
    if (process.env.SERVER_PORT) {
      const port = parsePort(process.env.SERVER_PORT);
      if (port === undefined) {
        console.warn(`Ignoring invalid SERVER_PORT value: ${process.env.SERVER_PORT}`);
      } else {
        config.server.port = port;
      }
    }
    if (process.env.SERVER_HOST) {
      config.server.host = process.env.SERVER_HOST;
    }
    if (process.env.LOG_LEVEL) {
      config.server.logLevel = process.env.LOG_LEVEL;
    }

    if (process.env.VIDEOS_PATH) {
      config.storage.videosPath = path.resolve(process.env.VIDEOS_PATH);
    }
    if (process.env.CATALOG_PATH) {
      config.storage.catalogPath = path.resolve(process.env.CATALOG_PATH);
    }
  }

  public getConfig(): AppConfig {
    return this.config;
  }

  public overridePort(port: number): void {
    this.config.server.port = port;
  }

  public getServerConfig(): ServerConfig {
    return this.config.server;
  }

  public getStorageConfig(): StorageConfig {
    return this.config.storage;
  }

  public getMirrorConfig(): MirrorConfig {
    return this.config.mirror;
  }

  public getCleanupConfig(): CleanupConfig {
    return this.config.cleanup;
  }

  public getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }
}
