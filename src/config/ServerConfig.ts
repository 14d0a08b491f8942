import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export const DEFAULT_TOOL_TIMEOUT_MS = 10_000;
export const DEFAULT_LOG_FILE = 'gitops-status-mcp.log';

export const ServerConfigSchema = z.object({
  kubeConfigPath: z.string().min(1).optional(),
  context: z.string().min(1).optional(),
  inCluster: z.boolean().default(false),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
      fileEnabled: z.boolean().default(false),
      filePath: z.string().min(1).default(DEFAULT_LOG_FILE),
    })
    .default({}),
  toolTimeoutMs: z.number().int().positive().default(DEFAULT_TOOL_TIMEOUT_MS),
  /** Mask secret-looking values in pod logs before returning them */
  redactLogs: z.boolean().default(true),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig['logging'];

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

type Env = Record<string, string | undefined>;

interface RawConfig {
  kubeConfigPath?: string;
  context?: string;
  inCluster?: boolean;
  logging: { level?: string; fileEnabled?: boolean; filePath?: string };
  toolTimeoutMs?: number;
  redactLogs?: boolean;
}

export function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes' || normalized === 'on';
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function fromEnv(env: Env): RawConfig {
  return {
    context: nonEmpty(env.MCP_KUBE_CONTEXT),
    inCluster: parseFlag(env.MCP_IN_CLUSTER),
    logging: {
      level: nonEmpty(env.MCP_LOG_LEVEL)?.toLowerCase(),
      fileEnabled: parseFlag(env.MCP_LOG_ENABLE),
      filePath: nonEmpty(env.MCP_LOG_FILE),
    },
    toolTimeoutMs: parseNumber(env.MCP_TOOL_TIMEOUT_MS),
    redactLogs: parseFlag(env.MCP_REDACT_LOGS),
  };
}

const VALUE_FLAGS = ['--kubeconfig', '--context', '--log-level', '--timeout-ms'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAGS.some((candidate) => candidate === flag);
}

function applyArgs(raw: RawConfig, argv: string[]): RawConfig {
  const result: RawConfig = { ...raw, logging: { ...raw.logging } };

  for (let index = 0; index < argv.length; index++) {
    const arg = argv[index];
    const eq = arg.indexOf('=');
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;

    if (flag === '--in-cluster') {
      result.inCluster = true;
      continue;
    }
    if (flag === '--no-redact') {
      result.redactLogs = false;
      continue;
    }
    if (!isValueFlag(flag)) {
      throw new ConfigurationError(`Unknown argument: ${arg}`);
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[index + 1];
      index++;
    }
    if (value === undefined || value === '') {
      throw new ConfigurationError(`Missing value for ${flag}`);
    }

    switch (flag) {
      case '--kubeconfig':
        result.kubeConfigPath = value;
        break;
      case '--context':
        result.context = value;
        break;
      case '--log-level':
        result.logging.level = value.toLowerCase();
        break;
      case '--timeout-ms':
        result.toolTimeoutMs = Number(value);
        break;
    }
  }

  return result;
}

/**
 * Resolve configuration from defaults, then environment, then command line.
 * The KUBECONFIG variable is left to the Kubernetes client, which accepts a
 * colon separated list.
 */
export function loadServerConfig(
  argv: string[] = process.argv.slice(2),
  env: Env = process.env,
): ServerConfig {
  const raw = applyArgs(fromEnv(env), argv);
  const parsed = ServerConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}
