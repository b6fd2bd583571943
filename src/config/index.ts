import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export const DEFAULT_CONFIG_PATH = "./cluster-backup.yaml";

const HOUR_MS = 3_600_000;

/** Accepts real booleans from YAML and "true"/"false"/"1"/"0" from the environment. */
const flag = z.preprocess((value) => {
  if (typeof value !== "string") return value;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") return true;
  if (normalized === "false" || normalized === "0" || normalized === "no") return false;
  return value;
}, z.boolean());

const retentionSchema = z
  .object({
    dailyCount: z.coerce.number().int().min(0).default(7),
    weeklyCount: z.coerce.number().int().min(0).default(4),
    monthlyCount: z.coerce.number().int().min(0).default(6),
    yearlyCount: z.coerce.number().int().min(0).default(1),
    /** Day the backup week starts on: 0 = Sunday … 6 = Saturday. */
    weekStart: z.coerce.number().int().min(0).max(6).default(1),
    /** Day of the year (1-366) on which each yearly period begins. */
    yearlyBackupDay: z.coerce.number().int().min(1).max(366).default(1),
  })
  .default({});

const configSchema = z.object({
  backupRoot: z.string().min(1, "backupRoot is required"),
  mysqlDataDir: z.string().min(1).default("/var/lib/mysql"),
  logsDirectory: z.string().min(1).optional(),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  retention: retentionSchema,

  lock: z
    .object({
      timeoutMs: z.coerce.number().int().min(0).default(60_000),
      pollIntervalMs: z.coerce.number().int().min(10).default(1_000),
      /** Break a lock file older than this; never broken when unset. */
      staleAfterMs: z.coerce.number().int().positive().optional(),
    })
    .default({}),

  tool: z
    .object({
      binary: z.string().min(1).default("xtrabackup"),
      defaultsFile: z.string().min(1).optional(),
      compress: flag.default(true),
      parallel: z.coerce.number().int().min(1).max(64).default(1),
      timeoutMs: z.coerce.number().int().positive().default(6 * HOUR_MS),
    })
    .default({}),

  prepare: z
    .object({
      /** Prepare copies of the artifacts here instead of mutating them in place. */
      workDir: z.string().min(1).optional(),
      /** How long an unfinished preparation marker blocks a new run. */
      graceMs: z.coerce.number().int().min(0).default(HOUR_MS),
    })
    .default({}),

  notification: z
    .object({
      resendApiKey: z.string().min(1).optional(),
      to: z.string().email().optional(),
      from: z.string().min(1).default("backups@localhost"),
    })
    .default({}),

  runLogPath: z.string().min(1).optional(),
});

export type Config = z.infer<typeof configSchema>;

/** Thrown when configuration cannot be read or fails validation. */
export class ConfigError extends Error {
  readonly name = "ConfigError" as const;
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Path to a YAML file; the default path is optional, an explicit one is not. */
  configPath?: string;
  env?: Env;
}

/**
 * Build the validated configuration: YAML file values first, environment
 * variables on top. Called once at startup, before any lock is taken.
 */
export function loadConfig(opts: LoadConfigOptions = {}): Config {
  const env = opts.env ?? process.env;
  const fileValues = readConfigFile(opts.configPath);
  return parseConfig(mergeDeep(fileValues, envValues(env)));
}

/** Validate an already-assembled raw configuration object. */
export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError("Invalid configuration", issues);
  }

  const config = result.data;
  if (!config.runLogPath && config.logsDirectory) {
    return { ...config, runLogPath: join(config.logsDirectory, "run-log.db") };
  }
  return config;
}

function readConfigFile(configPath: string | undefined): Record<string, unknown> {
  const path = configPath ?? DEFAULT_CONFIG_PATH;
  if (!existsSync(path)) {
    if (configPath) throw new ConfigError(`Configuration file '${configPath}' not found`);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Configuration file '${path}' is not valid YAML (${reason})`);
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`Configuration file '${path}' must contain a mapping at the top level`);
  }
  return parsed;
}

function envValues(env: Env): Record<string, unknown> {
  return {
    backupRoot: env.BACKUP_ROOT,
    mysqlDataDir: env.MYSQL_DATA_DIR,
    logsDirectory: env.LOGS_DIRECTORY,
    logLevel: env.LOG_LEVEL,
    retention: {
      dailyCount: env.RETENTION_DAILY_COUNT,
      weeklyCount: env.RETENTION_WEEKLY_COUNT,
      monthlyCount: env.RETENTION_MONTHLY_COUNT,
      yearlyCount: env.RETENTION_YEARLY_COUNT,
      weekStart: env.BEGINNING_OF_WEEK,
      yearlyBackupDay: env.YEARLY_BACKUP_DATE,
    },
    lock: {
      timeoutMs: env.LOCK_TIMEOUT_MS,
      staleAfterMs: env.LOCK_STALE_AFTER_MS,
    },
    tool: {
      binary: env.XTRABACKUP_PATH,
      defaultsFile: env.MYSQL_DEFAULTS_FILE,
      compress: env.XTRABACKUP_COMPRESS,
      timeoutMs: env.XTRABACKUP_TIMEOUT_MS,
    },
    prepare: {
      workDir: env.PREPARE_WORK_DIR,
    },
    notification: {
      resendApiKey: env.RESEND_API_KEY,
      to: env.NOTIFICATION_EMAIL,
      from: env.NOTIFICATION_FROM,
    },
    runLogPath: env.RUN_LOG_PATH,
  };
}

/** Overlay `override` onto `base`, ignoring undefined and empty-string leaves. */
function mergeDeep(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined || value === "") continue;
    const existing = out[key];
    if (isRecord(value)) {
      out[key] = mergeDeep(isRecord(existing) ? existing : {}, value);
    } else {
      out[key] = value;
    }
  }
  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
