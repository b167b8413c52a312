import { EventEmitter } from "node:events";
import { existsSync, readFileSync, watch, type FSWatcher } from "node:fs";
import { dirname, resolve } from "node:path";
import YAML from "yaml";
import { z } from "zod";
import { logger } from "../observability/logger.ts";
import { DEFAULT_RETRY_CONFIG } from "../retry/retry-executor.ts";
import type { PersistedStateConfig, ResolvedConfig, RetryConfig } from "../types/config.ts";

const DEFAULT_PERSISTENCE_CONFIG: PersistedStateConfig = {
  sqlitePath: resolve(".runtime/key-balancer.sqlite"),
  fallbackJsonPath: resolve(".runtime/key-balancer.json"),
  flushIntervalMs: 250,
  retryDelayMs: 1000,
};

const configDocumentSchema = z
  .object({
    keysFile: z.string().min(1).optional(),
    reloadPolicy: z.enum(["retain", "prune", "disable"]).optional(),
    retry: z
      .object({
        maxRetries: z.number().int().nonnegative(),
        baseDelayMs: z.number().positive(),
        backoffFactor: z.number().positive(),
      })
      .partial()
      .optional(),
    cache: z.object({ capacity: z.number().int().positive().optional() }).optional(),
    persistence: z
      .object({
        sqlitePath: z.string().min(1),
        fallbackJsonPath: z.string().min(1),
        flushIntervalMs: z.number().int().nonnegative(),
        retryDelayMs: z.number().int().positive(),
      })
      .partial()
      .optional(),
  })
  .strict();

type ConfigDocument = z.infer<typeof configDocumentSchema>;

export interface ConfigManagerOptions {
  configPath?: string;
  /** Watch the config file and the key file for changes. */
  watch?: boolean;
  env?: NodeJS.ProcessEnv;
}

export type ConfigUpdateHandler = (config: ResolvedConfig) => void;

/**
 * ConfigManager resolves the balancer configuration from a YAML document,
 * environment overrides and defaults, and optionally re-emits it when the
 * config file or the key file changes on disk.
 */
export class ConfigManager {
  private readonly emitter = new EventEmitter();
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;
  private readonly watchers: FSWatcher[] = [];
  private currentConfig: ResolvedConfig;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    // Priority: option > ENV var > CWD
    this.configPath = this.resolveConfigPath(
      options.configPath,
      this.env.KEY_BALANCER_CONFIG_PATH,
      "key-balancer.yaml",
    );

    logger.info({ configPath: this.configPath }, "Config path resolved");

    this.currentConfig = this.load();
    if (options.watch) {
      this.watchFiles();
    }
  }

  getConfig(): ResolvedConfig {
    return this.currentConfig;
  }

  subscribe(handler: ConfigUpdateHandler): () => void {
    this.emitter.on("update", handler);
    return () => {
      this.emitter.off("update", handler);
    };
  }

  forceReload(): ResolvedConfig {
    const config = this.load();
    this.currentConfig = config;
    this.emitter.emit("update", config);
    return config;
  }

  close(): void {
    this.watchers.forEach((watcher) => watcher.close());
    this.watchers.length = 0;
    this.emitter.removeAllListeners();
  }

  private resolveConfigPath(
    option: string | undefined,
    envVar: string | undefined,
    filename: string,
  ): string {
    if (option) {
      return resolve(option);
    }
    if (envVar) {
      return resolve(envVar);
    }
    return resolve(process.cwd(), filename);
  }

  private watchFiles(): void {
    const targets = [this.configPath];
    if (this.currentConfig.keysFile) {
      targets.push(this.currentConfig.keysFile);
    }

    targets.forEach((path) => {
      const performReload = () => {
        try {
          this.forceReload();
          logger.info({ path }, "Configuration reloaded");
        } catch (error) {
          logger.error({ error, path }, "Failed to reload configuration");
        }
      };

      const target = existsSync(path) ? path : dirname(path);
      try {
        this.watchers.push(watch(target, { persistent: false }, performReload));
      } catch (error) {
        logger.error({ error, path: target }, "Failed to watch configuration file");
      }
    });
  }

  private load(): ResolvedConfig {
    const document = this.readDocument(this.configPath);
    const baseDir = dirname(this.configPath);

    const retry: RetryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      ...(document.retry ?? {}),
    };
    const maxRetriesOverride = this.readIntegerEnv("KEY_BALANCER_MAX_RETRIES");
    if (maxRetriesOverride !== null) {
      retry.maxRetries = maxRetriesOverride;
    }

    const persistence: PersistedStateConfig = {
      ...DEFAULT_PERSISTENCE_CONFIG,
      ...(document.persistence ?? {}),
    };
    if (document.persistence?.sqlitePath) {
      persistence.sqlitePath = resolve(baseDir, document.persistence.sqlitePath);
    }
    if (document.persistence?.fallbackJsonPath) {
      persistence.fallbackJsonPath = resolve(baseDir, document.persistence.fallbackJsonPath);
    }

    const keysFile = this.env.KEY_BALANCER_KEYS_FILE ?? document.keysFile;

    return {
      keysFile: keysFile ? resolve(baseDir, keysFile) : null,
      reloadPolicy: document.reloadPolicy ?? "retain",
      retry,
      cache: { capacity: document.cache?.capacity },
      persistence,
    } satisfies ResolvedConfig;
  }

  private readDocument(path: string): ConfigDocument {
    if (!existsSync(path)) {
      return {};
    }
    const raw = readFileSync(path, "utf8");
    if (!raw.trim()) {
      return {};
    }

    try {
      const result = configDocumentSchema.safeParse(YAML.parse(raw) ?? {});
      if (!result.success) {
        logger.error(
          { path, issues: result.error.issues },
          "Invalid configuration document; using defaults",
        );
        return {};
      }
      return result.data;
    } catch (error) {
      logger.error({ error, path }, "Failed to parse configuration YAML; using defaults");
      return {};
    }
  }

  private readIntegerEnv(name: string): number | null {
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === "") {
      return null;
    }
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
      logger.warn({ name, raw }, "Ignoring invalid integer environment override");
      return null;
    }
    return value;
  }
}
