import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';

export type LogLevelSetting = 'debug' | 'info' | 'warn' | 'error';
export type AppEnv = 'dev' | 'prod' | 'test';

const LevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
const EnvSchema = z.enum(['dev', 'prod', 'test']);

// Every field optional: the YAML file may omit whole sections
const RawConfigSchema = z.object({
  app: z
    .object({
      name: z.string().optional(),
      env: EnvSchema.optional(),
    })
    .optional(),
  logger: z
    .object({
      level: LevelSchema.optional(),
    })
    .optional(),
  logging: z
    .object({
      color: z.boolean().optional(),
      level: LevelSchema.optional(),
    })
    .optional(),
  adapters: z
    .object({
      qq: z
        .object({
          enabled: z.boolean().optional(),
          wsPort: z.number().int().positive().optional(),
          token: z.union([z.string(), z.number()]).optional(),
        })
        .optional(),
      mock: z
        .object({
          enabled: z.boolean().optional(),
        })
        .optional(),
    })
    .optional(),
  steam: z
    .object({
      enabled: z.boolean().optional(),
      apiKey: z.string().optional(),
      baseUrl: z.string().url().optional(),
      timeoutMs: z.number().int().positive().optional(),
      dataFile: z.string().min(1).optional(),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof RawConfigSchema>;

export type AppConfigRequired = {
  app: {
    name: string;
    env: AppEnv;
  };
  logging: {
    color: boolean;
    level: LogLevelSetting;
  };
  adapters: {
    qq: {
      enabled: boolean;
      wsPort: number;
      token?: string;
    };
    mock: {
      enabled: boolean;
    };
  };
  steam: {
    enabled: boolean;
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    dataFile: string;
  };
};

export type ConfigEnv = Record<string, string | undefined>;

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Merge the parsed YAML document with environment overrides and defaults.
 * Throws a ZodError when the document has the wrong shape.
 */
export function normalizeConfig(raw: unknown, env: ConfigEnv = {}): AppConfigRequired {
  const cfg = RawConfigSchema.parse(raw ?? {});
  const parsedEnv = EnvSchema.safeParse(env.NODE_ENV);
  const appEnv: AppEnv = parsedEnv.success ? parsedEnv.data : (cfg.app?.env ?? 'prod');
  const token = cfg.adapters?.qq?.token ?? env.QQ_ADAPTER_TOKEN;

  const result: AppConfigRequired = {
    app: {
      name: cfg.app?.name ?? 'SteamPresenceBot',
      env: appEnv,
    },
    logging: {
      color: cfg.logging?.color ?? true,
      level: cfg.logging?.level ?? cfg.logger?.level ?? 'info',
    },
    adapters: {
      qq: {
        enabled: cfg.adapters?.qq?.enabled ?? true,
        wsPort: cfg.adapters?.qq?.wsPort ?? 6090,
        token: token === undefined || token === '' ? undefined : String(token),
      },
      mock: {
        enabled: cfg.adapters?.mock?.enabled ?? false,
      },
    },
    steam: {
      enabled: envFlag(env.STEAM_ENABLED) ?? cfg.steam?.enabled ?? false,
      apiKey: (cfg.steam?.apiKey || env.STEAM_API_KEY || '').trim(),
      baseUrl: cfg.steam?.baseUrl ?? 'https://api.steampowered.com',
      timeoutMs: cfg.steam?.timeoutMs ?? 8000,
      dataFile: cfg.steam?.dataFile ?? './data/steam-aliases.json',
    },
  };

  // Auto-disable QQ adapter if token is missing in prod (warn instead of fail)
  if (result.adapters.qq.enabled && result.app.env === 'prod' && !result.adapters.qq.token) {
    console.warn(
      '[CONFIG] QQ adapter enabled in prod but no token configured. Disabling adapter. Set adapters.qq.token or QQ_ADAPTER_TOKEN to enable.',
    );
    result.adapters.qq.enabled = false;
  }

  return result;
}

let cachedConfig: AppConfigRequired | null = null;

export function loadConfig(
  filePath: string = resolve(process.cwd(), 'config', 'default.yaml'),
): AppConfigRequired {
  if (cachedConfig) return cachedConfig;
  const raw = readFileSync(filePath, 'utf-8');
  cachedConfig = normalizeConfig(parse(raw), process.env);
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
