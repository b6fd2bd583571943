#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import type { BackupType } from "./catalog/types.js";
import { type Config, ConfigError, loadConfig } from "./config/index.js";
import { configureLogger, logger } from "./config/logger.js";
import { LockTimeoutError } from "./lock/cluster-lock.js";
import type { ChainTarget } from "./orchestrator/backup-orchestrator.js";
import { type BuildServicesOptions, buildServices, type Services } from "./services.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
/** EX_TEMPFAIL: the lock was busy; try again later. */
export const EXIT_LOCK_TIMEOUT = 75;

export type CliCommand =
  | { name: "backup"; type?: BackupType }
  | { name: "prepare"; target?: ChainTarget }
  | { name: "restore"; target?: ChainTarget; dataDir?: string }
  | { name: "rotate" }
  | { name: "verify" }
  | { name: "status" }
  | { name: "history"; limit: number }
  | { name: "help" };

type CommandName = Exclude<CliCommand["name"], "help">;

export interface CliInvocation {
  command: CliCommand;
  configPath?: string;
  verbose: boolean;
}

type GlobalOptions = {
  config?: string;
  verbose: boolean;
};

type TargetOptions = {
  id?: string;
  date?: string;
};

/** Bad command line; reported with the usage text. */
export class UsageError extends Error {
  readonly name = "UsageError" as const;
}

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

function parseDate(value: string): string {
  if (!DATE_RE.test(value)) throw new InvalidArgumentError(`Invalid --date (expected YYYY-MM-DD): ${value}`);
  return value;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) throw new InvalidArgumentError(`Invalid --limit: ${value}`);
  return limit;
}

function withTargetOptions(cmd: Command): Command {
  return cmd
    .option("--id <id>", "anchor id of the chain")
    .addOption(
      new Option("--date <yyyy-mm-dd>", "most recent chain anchored on that day").argParser(parseDate).conflicts("id"),
    );
}

/**
 * The command tree. Output is silenced and exits become CommanderError
 * throws, so parsing never writes to the terminal or ends the process.
 */
function buildProgram(onSelect: (name: CommandName, cmd: Command) => void): Command {
  const program = new Command("cluster-backup")
    .usage("<command> [options]")
    .description("Full and incremental XtraBackup backups, preparation and rotation for a Galera cluster")
    .option("-c, --config <path>", "YAML configuration file (default ./cluster-backup.yaml)")
    .option("-v, --verbose", "debug logging", false)
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });

  const sub = (name: CommandName, description: string): Command =>
    program
      .command(name)
      .description(description)
      .allowExcessArguments(true)
      .action((_opts: unknown, cmd: Command) => onSelect(name, cmd));

  sub("backup", "take the scheduled backup, or the forced type")
    .addOption(new Option("--full", "force a full backup").conflicts("incremental"))
    .option("--incremental", "force an incremental backup");
  withTargetOptions(sub("prepare", "prepare a chain for restore"));
  withTargetOptions(sub("restore", "copy a prepared chain into the MySQL data directory")).option(
    "--data-dir <dir>",
    "MySQL data directory to restore into",
  );
  sub("rotate", "prune chains retention no longer keeps");
  sub("verify", "check artifacts and mark broken ones");
  sub("status", "list chains and their retention");
  sub("history", "recent runs from the run log").option("--limit <n>", "rows to show", parseLimit, 20);

  return program;
}

export function usage(): string {
  return buildProgram(() => {}).helpInformation();
}

/** Turn argv (without node and script) into a command. Throws UsageError. */
export function parseCommand(argv: string[]): CliInvocation {
  if (argv.length === 0) throw new UsageError("No command given");

  const selected: { current: { name: CommandName; cmd: Command } | null } = { current: null };
  const program = buildProgram((name, cmd) => {
    selected.current = { name, cmd };
  });

  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (!(err instanceof CommanderError)) throw err;
    if (err.code === "commander.helpDisplayed" || (err.code === "commander.help" && err.exitCode === 0)) {
      return { command: { name: "help" }, ...globals(program) };
    }
    if (err.code === "commander.help") throw new UsageError("No command given");
    throw new UsageError(err.message.replace(/^error: /, ""));
  }

  if (!selected.current) throw new UsageError("No command given");
  return { command: toCommand(selected.current.name, selected.current.cmd), ...globals(program) };
}

function globals(program: Command): { configPath?: string; verbose: boolean } {
  const opts = program.opts<GlobalOptions>();
  return { configPath: opts.config, verbose: opts.verbose };
}

function toCommand(name: CommandName, cmd: Command): CliCommand {
  if (cmd.args.length > 0) throw new UsageError(`Unexpected arguments: ${cmd.args.join(" ")}`);
  switch (name) {
    case "backup": {
      const opts = cmd.opts<{ full?: boolean; incremental?: boolean }>();
      const type: BackupType | undefined = opts.full ? "FULL" : opts.incremental ? "INCREMENTAL" : undefined;
      return { name, type };
    }
    case "prepare":
      return { name, target: targetOf(cmd.opts<TargetOptions>()) };
    case "restore": {
      const opts = cmd.opts<TargetOptions & { dataDir?: string }>();
      return { name, target: targetOf(opts), dataDir: opts.dataDir };
    }
    case "history":
      return { name, limit: cmd.opts<{ limit: number }>().limit };
    default:
      return { name };
  }
}

function targetOf(opts: TargetOptions): ChainTarget | undefined {
  if (opts.id) return { id: opts.id };
  if (opts.date) return { date: opts.date };
  return undefined;
}

export interface CliDeps {
  env?: Record<string, string | undefined>;
  buildServices?: (config: Config, opts?: BuildServicesOptions) => Services;
  /** Aborted on SIGTERM or SIGINT; the running command unwinds and releases the lock. */
  signal?: AbortSignal;
  /** Receives the JSON report. */
  write?: (text: string) => void;
}

/** Run one invocation and return the process exit code. */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const write = deps.write ?? ((text: string) => process.stdout.write(text));

  let invocation: CliInvocation;
  let config: Config;
  try {
    invocation = parseCommand(argv);
    if (invocation.command.name === "help") {
      write(usage());
      return EXIT_OK;
    }
    config = loadConfig({ configPath: invocation.configPath, env: deps.env });
  } catch (err) {
    if (err instanceof UsageError || err instanceof ConfigError) {
      logger.error(err.message);
      if (err instanceof UsageError) write(usage());
      return EXIT_USAGE;
    }
    throw err;
  }

  configureLogger({
    logLevel: invocation.verbose ? "debug" : config.logLevel,
    logsDirectory: config.logsDirectory,
  });

  const services = (deps.buildServices ?? buildServices)(config, { signal: deps.signal });
  try {
    const { report, ok } = await execute(invocation.command, services);
    write(`${JSON.stringify(report, null, 2)}\n`);
    return ok ? EXIT_OK : EXIT_FAILURE;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    write(`${JSON.stringify({ error: err instanceof Error ? err.name : "Error", message }, null, 2)}\n`);
    return err instanceof LockTimeoutError ? EXIT_LOCK_TIMEOUT : EXIT_FAILURE;
  } finally {
    services.close();
  }
}

async function execute(command: CliCommand, services: Services): Promise<{ report: unknown; ok: boolean }> {
  const { orchestrator } = services;
  switch (command.name) {
    case "backup":
      return { report: await orchestrator.runBackup({ type: command.type }), ok: true };
    case "prepare":
      return { report: await orchestrator.runPrepare({ target: command.target }), ok: true };
    case "restore":
      return {
        report: await orchestrator.runRestore({ target: command.target, dataDir: command.dataDir }),
        ok: true,
      };
    case "rotate": {
      const report = await orchestrator.runRotate();
      return { report, ok: report.failed.length === 0 };
    }
    case "verify": {
      const report = await orchestrator.runVerify();
      return { report, ok: report.failed === 0 };
    }
    case "status":
      return { report: await orchestrator.status(), ok: true };
    case "history":
      if (!services.runLog) {
        return { report: { error: "RunLogDisabled", message: "No run log configured (set RUN_LOG_PATH)" }, ok: false };
      }
      return { report: services.runLog.list({ limit: command.limit }), ok: true };
    case "help":
      return { report: usage(), ok: true };
  }
}

// ---------------------------------------------------------------------------
// CLI entrypoint: only runs when executed directly
// ---------------------------------------------------------------------------

const isMain = process.argv[1]?.endsWith("cli.js") || process.argv[1]?.endsWith("cli.ts");

if (isMain) {
  const cancel = new AbortController();
  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    // A second signal gets the default handling and ends the process at once.
    process.once(signal, () => {
      logger.warn(`Received ${signal}; cancelling the running command`);
      cancel.abort();
    });
  }

  runCli(process.argv.slice(2), { signal: cancel.signal })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err) => {
      logger.error("Unhandled failure", { err });
      process.exitCode = EXIT_FAILURE;
    });
}
