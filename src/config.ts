/**
 * forgeport Configuration
 *
 * Layers, lowest precedence first:
 * defaults ← JSON config file ← environment ← explicit overrides (CLI flags).
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

/** Config file looked up in the working directory */
export const CONFIG_FILE = 'forgeport.config.json';

export const RateLimitSchema = z.object({
  buffer: z.number().int().nonnegative().default(10),
  maxAttempts: z.number().int().positive().default(3),
  baseDelayMs: z.number().nonnegative().default(2000),
  maxDelayMs: z.number().nonnegative().default(60_000),
  resetPaddingMs: z.number().nonnegative().default(10_000),
});

export const TransferConfigSchema = z.object({
  gitlab: z
    .object({
      url: z.string().url().default('https://gitlab.com'),
      token: z.string().default(''),
    })
    .default({}),
  github: z
    .object({
      apiUrl: z.string().url().default('https://api.github.com'),
      token: z.string().default(''),
    })
    .default({}),
  exportDir: z.string().min(1).default('metadata_export'),
  rateLimit: RateLimitSchema.default({}),
  autoResolve: z.enum(['off', 'email', 'email+username']).default('email'),
  allowNameMismatch: z.boolean().default(false),
});

export type TransferConfig = z.infer<typeof TransferConfigSchema>;

/** What a config file may contain: every field optional, no defaults applied */
export const ConfigFileSchema = z
  .object({
    gitlab: z.object({ url: z.string().url().optional(), token: z.string().optional() }).optional(),
    github: z.object({ apiUrl: z.string().url().optional(), token: z.string().optional() }).optional(),
    exportDir: z.string().min(1).optional(),
    rateLimit: RateLimitSchema.partial().optional(),
    autoResolve: z.enum(['off', 'email', 'email+username']).optional(),
    allowNameMismatch: z.boolean().optional(),
  })
  .strict();

/** Partial config as accepted from a file or overrides */
export interface TransferConfigInput {
  gitlab?: { url?: string; token?: string };
  github?: { apiUrl?: string; token?: string };
  exportDir?: string;
  rateLimit?: Partial<TransferConfig['rateLimit']>;
  autoResolve?: TransferConfig['autoResolve'];
  allowNameMismatch?: boolean;
}

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** Explicit config file; missing files are an error only when given here */
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: TransferConfigInput;
  cwd?: string;
}

export function defaultConfig(): TransferConfig {
  return TransferConfigSchema.parse({});
}

/**
 * Last defined value across the layers; undefined never masks a lower layer.
 */
function pick<T>(layers: TransferConfigInput[], get: (layer: TransferConfigInput) => T | undefined): T | undefined {
  let value: T | undefined;
  for (const layer of layers) {
    const candidate = get(layer);
    if (candidate !== undefined) value = candidate;
  }
  return value;
}

function mergeLayers(layers: TransferConfigInput[]): TransferConfigInput {
  return {
    gitlab: {
      url: pick(layers, (l) => l.gitlab?.url),
      token: pick(layers, (l) => l.gitlab?.token),
    },
    github: {
      apiUrl: pick(layers, (l) => l.github?.apiUrl),
      token: pick(layers, (l) => l.github?.token),
    },
    exportDir: pick(layers, (l) => l.exportDir),
    rateLimit: {
      buffer: pick(layers, (l) => l.rateLimit?.buffer),
      maxAttempts: pick(layers, (l) => l.rateLimit?.maxAttempts),
      baseDelayMs: pick(layers, (l) => l.rateLimit?.baseDelayMs),
      maxDelayMs: pick(layers, (l) => l.rateLimit?.maxDelayMs),
      resetPaddingMs: pick(layers, (l) => l.rateLimit?.resetPaddingMs),
    },
    autoResolve: pick(layers, (l) => l.autoResolve),
    allowNameMismatch: pick(layers, (l) => l.allowNameMismatch),
  };
}

export function configFromEnv(env: NodeJS.ProcessEnv): TransferConfigInput {
  return {
    gitlab: { url: env.GITLAB_URL || undefined, token: env.GITLAB_TOKEN || undefined },
    github: { apiUrl: env.GITHUB_API_URL || undefined, token: env.GITHUB_TOKEN || undefined },
    exportDir: env.FORGEPORT_EXPORT_DIR || undefined,
  };
}

async function readConfigFile(path: string): Promise<unknown> {
  const raw = await readFile(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${path}`, { cause: err });
  }
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<TransferConfig> {
  const layers: TransferConfigInput[] = [];

  const filePath = resolve(options.cwd ?? process.cwd(), options.file ?? CONFIG_FILE);
  if (existsSync(filePath)) {
    const parsed = ConfigFileSchema.safeParse(await readConfigFile(filePath));
    if (!parsed.success) {
      throw new ConfigError(`Invalid config in ${filePath}: ${formatIssues(parsed.error)}`);
    }
    layers.push(parsed.data);
  } else if (options.file) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  layers.push(configFromEnv(options.env ?? process.env));
  if (options.overrides) {
    layers.push(options.overrides);
  }

  const result = TransferConfigSchema.safeParse(mergeLayers(layers));
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
