import crypto from 'node:crypto';
import config from 'config';
import { z } from 'zod';
import { logger } from './logger.js';
import type { ImaCredentials } from './ima/types.js';

const log = logger.child({ module: 'config' });

const fileConfigSchema = z.object({
  port: z.coerce.number().int().default(8081),
  logLevel: z.string().default('info'),
  api: z.object({ requireKey: z.boolean().default(false) }).default({}),
  rateLimit: z
    .object({ max: z.number().int().default(60), windowMs: z.number().int().default(60_000) })
    .default({}),
  ima: z
    .object({
      baseUrl: z.string().url().default('https://ima.qq.com'),
      knowledgeBaseId: z.string().default('7305806844290061'),
      requestTimeoutSeconds: z.number().int().default(30),
      retryCount: z.number().int().default(2),
      askTimeoutMs: z.number().int().default(55_000),
      robotType: z.number().int().default(5),
      sceneType: z.number().int().default(1),
      modelType: z.number().int().default(4),
      rawLog: z
        .object({
          enabled: z.boolean().default(false),
          dir: z.string().default('logs/raw'),
          maxBytes: z.number().int().default(1_048_576),
          onSuccess: z.boolean().default(false),
        })
        .default({}),
    })
    .default({}),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;

// Blank values count as unset.
const optionalEnv = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  IMA_COOKIES: optionalEnv,
  IMA_X_IMA_COOKIE: optionalEnv,
  IMA_X_IMA_BKN: optionalEnv,
  IMA_KNOWLEDGE_BASE_ID: optionalEnv,
  IMA_CLIENT_ID: optionalEnv,
  IMA_USER_ID: optionalEnv,
  IMA_REFRESH_TOKEN: optionalEnv,
  IMA_REQUEST_TIMEOUT: optionalEnv,
  IMA_RETRY_COUNT: optionalEnv,
  IMA_PROXY: optionalEnv,
  IMA_RAW_LOG_ENABLED: optionalEnv,
  IMA_RAW_LOG_DIR: optionalEnv,
  IMA_RAW_LOG_MAX_BYTES: optionalEnv,
  IMA_RAW_LOG_ON_SUCCESS: optionalEnv,
  IMA_ASK_TIMEOUT_MS: optionalEnv,
  PORT: optionalEnv,
  LOG_LEVEL: optionalEnv,
  MCP_API_KEY: optionalEnv,
  MCP_RATE_LIMIT_MAX: optionalEnv,
  MCP_RATE_LIMIT_WINDOW_MS: optionalEnv,
});

type Env = z.infer<typeof envSchema>;

export function clampInt(raw: string | undefined, fallback: number, min: number, max: number): number {
  const n = parseInt(raw ?? `${fallback}`, 10);
  return Math.min(Math.max(Number.isNaN(n) ? fallback : n, min), max);
}

const envFlag = (raw: string | undefined, fallback: boolean) =>
  raw === undefined ? fallback : raw.toLowerCase() === 'true';

export function readFileConfig(): FileConfig {
  return fileConfigSchema.parse(config.util.toObject(config));
}

export type ServerSettings = {
  port: number;
  logLevel: string;
  apiKey?: string;
  requireKey: boolean;
  rateLimit: { max: number; windowMs: number };
  askTimeoutMs: number;
  baseUrl: string;
};

export type ValidationResult = { ok: true } | { ok: false; error: string };

export type ConfigStatus = {
  isConfigured: boolean;
  errorMessage?: string;
  sessionInfo?: { clientId: string; createdAt: string; updatedAt: string | null };
};

export type EnvPresence = 'set' | 'missing' | 'auto';

/**
 * Builds the credential bundle and server settings from environment
 * variables over the `config` files. Credentials are loaded once and then
 * shared with the client, which refreshes their token fields in place.
 */
export class ConfigManager {
  private readonly env: Env;
  private credentials: ImaCredentials | undefined;

  constructor(
    env: NodeJS.ProcessEnv = process.env,
    private readonly file: FileConfig = readFileConfig(),
  ) {
    this.env = envSchema.parse(env);
  }

  get settings(): ServerSettings {
    const { env, file } = this;
    return {
      port: clampInt(env.PORT, file.port, 1, 65535),
      logLevel: env.LOG_LEVEL ?? file.logLevel,
      apiKey: env.MCP_API_KEY,
      requireKey: Boolean(env.MCP_API_KEY) || file.api.requireKey,
      rateLimit: {
        max: clampInt(env.MCP_RATE_LIMIT_MAX, file.rateLimit.max, 1, 10_000),
        windowMs: clampInt(env.MCP_RATE_LIMIT_WINDOW_MS, file.rateLimit.windowMs, 1000, 3_600_000),
      },
      askTimeoutMs: clampInt(env.IMA_ASK_TIMEOUT_MS, file.ima.askTimeoutMs, 5000, 600_000),
      baseUrl: file.ima.baseUrl,
    };
  }

  loadCredentials(autoGenerate = true): ImaCredentials {
    const { env, file } = this;
    let clientId = env.IMA_CLIENT_ID;
    if (autoGenerate && !clientId) {
      clientId = crypto.randomUUID();
      log.info({ clientId }, 'Generated client id');
    }

    const credentials: ImaCredentials = {
      cookies: env.IMA_COOKIES,
      xImaCookie: env.IMA_X_IMA_COOKIE ?? '',
      xImaBkn: env.IMA_X_IMA_BKN ?? '',
      knowledgeBaseId: env.IMA_KNOWLEDGE_BASE_ID ?? file.ima.knowledgeBaseId,
      clientId: clientId ?? '',
      userId: env.IMA_USER_ID,
      refreshToken: env.IMA_REFRESH_TOKEN,
      timeoutSeconds: clampInt(env.IMA_REQUEST_TIMEOUT, file.ima.requestTimeoutSeconds, 5, 300),
      retryCount: clampInt(env.IMA_RETRY_COUNT, file.ima.retryCount, 0, 5),
      proxy: env.IMA_PROXY,
      robotType: file.ima.robotType,
      sceneType: file.ima.sceneType,
      modelType: file.ima.modelType,
      rawLog: {
        enabled: envFlag(env.IMA_RAW_LOG_ENABLED, file.ima.rawLog.enabled),
        dir: env.IMA_RAW_LOG_DIR ?? file.ima.rawLog.dir,
        maxBytes: clampInt(env.IMA_RAW_LOG_MAX_BYTES, file.ima.rawLog.maxBytes, 0, 50 * 1024 * 1024),
        onSuccess: envFlag(env.IMA_RAW_LOG_ON_SUCCESS, file.ima.rawLog.onSuccess),
      },
      createdAt: new Date(),
    };
    log.info('Configuration loaded from environment');
    return credentials;
  }

  getCredentials(): ImaCredentials {
    if (!this.credentials) this.credentials = this.loadCredentials();
    return this.credentials;
  }

  validate(): ValidationResult {
    const required: Array<[string | undefined, string]> = [
      [this.env.IMA_X_IMA_COOKIE, 'IMA_X_IMA_COOKIE'],
      [this.env.IMA_X_IMA_BKN, 'IMA_X_IMA_BKN'],
    ];
    for (const [value, name] of required) {
      if (!value) return { ok: false, error: `Missing required environment variable: ${name}` };
    }
    return { ok: true };
  }

  getStatus(): ConfigStatus {
    const result = this.validate();
    if (!result.ok) return { isConfigured: false, errorMessage: result.error };
    const creds = this.getCredentials();
    return {
      isConfigured: true,
      sessionInfo: {
        clientId: creds.clientId,
        createdAt: creds.createdAt.toISOString(),
        updatedAt: creds.updatedAt ? creds.updatedAt.toISOString() : null,
      },
    };
  }

  envPresence(): Record<string, EnvPresence> {
    const { env } = this;
    return {
      IMA_COOKIES: env.IMA_COOKIES ? 'set' : 'missing',
      IMA_X_IMA_COOKIE: env.IMA_X_IMA_COOKIE ? 'set' : 'missing',
      IMA_X_IMA_BKN: env.IMA_X_IMA_BKN ? 'set' : 'missing',
      IMA_CLIENT_ID: env.IMA_CLIENT_ID ? 'set' : 'auto',
    };
  }
}
