#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from "commander";
import pc from "picocolors";
import type { AuditProgressEvent, AuditProgressHandler } from "./audit/progress.js";
import { runAuditCommand, type AuditCommandOptions } from "./commands/audit.js";
import {
  combineLoggers,
  createAppLogger,
  createConsoleLogger,
  type AppLogger,
  type Logger
} from "./logging/logger.js";
import { defaultRegistry } from "./rules/registry.js";

const program = new Command();

class Spinner {
  private frames = ["-", "\\", "|", "/"];
  private frameIndex = 0;
  private timer: ReturnType<typeof setInterval> | null = null;
  private text = "";

  constructor(private stream: { isTTY?: boolean; write: (chunk: string) => unknown }) {}

  start(text: string) {
    this.text = text;
    if (!this.stream.isTTY) return;
    if (this.timer) return;
    this.render();
    this.timer = setInterval(() => this.render(), 120);
  }

  update(text: string) {
    this.text = text;
  }

  stop() {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.clear();
  }

  /** Prints a full line above the spinner without leaving a half-drawn frame behind. */
  writeAbove(chunk: string) {
    if (!this.timer) {
      this.stream.write(chunk);
      return;
    }
    this.clear();
    this.stream.write(chunk);
    this.render();
  }

  private render() {
    if (!this.stream.isTTY) return;
    const frame = this.frames[this.frameIndex % this.frames.length];
    this.frameIndex += 1;
    this.stream.write(`\r\x1b[2K${frame} ${this.text}`);
  }

  private clear() {
    if (!this.stream.isTTY) return;
    this.stream.write("\r\x1b[2K");
  }
}

function logCliError(logger: Logger, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  const name = err instanceof Error ? err.name : "Error";
  logger.error(`Error: ${message}`, { error: name });
}

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Concurrency must be a positive integer.");
  }
  return parsed;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function createProgressReporter(update: (message: string) => void): AuditProgressHandler {
  return (event: AuditProgressEvent) => {
    const verb = event.phase === "fetching" ? "Fetching" : "Audited";
    update(`[${event.current}/${event.total}] ${verb} ${event.repository}`);
  };
}

program
  .name("repo-audit")
  .description("Audit GitHub repository settings, workflows and packaging against a set of rules")
  .version("0.1.0");

program
  .command("audit [repositories...]", { isDefault: true })
  .description("Audit repositories (owner/name, a bare name you own, or --active)")
  .option("--active", "Audit every non-archived, non-fork repository you own")
  .option("--github-token <token>", "GitHub token (defaults to GITHUB_TOKEN, GH_TOKEN or `gh auth token`)")
  .option("--rule <rule>", "Only run this rule (repeatable)", collect, [])
  .addOption(new Option("--format <format>", "Group output by repository or by rule").choices(["repo", "rule"]))
  .option("--json", "Print the result as JSON")
  .option("--concurrency <n>", "Repositories audited in parallel", parseConcurrency)
  .option("--fix", "Apply settings fixes for fixable findings after the audit")
  .option("--verbose", "Enable debug logging")
  .option("--log-file <path>", "Append JSON-lines logs to this file")
  .addOption(new Option("-c, --config <path>", "Path to repo-audit.config.json").hideHelp())
  .action(async (repositories: string[], options: AuditCommandOptions) => {
    const isJsonOutput = Boolean(options.json);
    const spinner = !isJsonOutput && !options.verbose && process.stderr.isTTY ? new Spinner(process.stderr) : null;
    const consoleLogger = createConsoleLogger({
      verbose: options.verbose,
      stream: { write: (chunk: string) => (spinner ? spinner.writeAbove(chunk) : process.stderr.write(chunk)) }
    });
    let appLogger: AppLogger | null = null;
    if (options.logFile) {
      try {
        appLogger = await createAppLogger({ filePath: options.logFile });
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        consoleLogger.warn(`Could not open log file ${options.logFile}: ${message}`);
      }
    }
    const logger = appLogger ? combineLoggers(consoleLogger, appLogger) : consoleLogger;

    const controller = new AbortController();
    let interrupts = 0;
    const onSigint = () => {
      interrupts += 1;
      if (interrupts > 1) {
        process.exit(130);
      }
      logger.warn("Interrupted. Finishing repositories in flight; press Ctrl+C again to exit now.");
      controller.abort();
    };
    process.on("SIGINT", onSigint);

    try {
      spinner?.start("Auditing repositories...");
      process.exitCode = await runAuditCommand(repositories, options, {
        cwd: process.cwd(),
        write: (text) => console.log(text),
        writeStatus: (text) => console.error(text),
        logger,
        signal: controller.signal,
        onProgress: spinner ? createProgressReporter((message) => spinner.update(message)) : undefined,
        onAuditDone: () => spinner?.stop()
      });
    } catch (err) {
      spinner?.stop();
      logCliError(logger, err);
      process.exitCode = 2;
    } finally {
      process.off("SIGINT", onSigint);
      await appLogger?.close();
    }
  });

program
  .command("rules")
  .description("List the compiled-in rules")
  .option("--json", "Print the rules as JSON")
  .action((options: { json?: boolean }) => {
    const rules = defaultRegistry.all();
    if (options.json) {
      console.log(
        JSON.stringify(
          rules.map((rule) => ({
            id: rule.id,
            severity: rule.severity,
            description: rule.description,
            fixable: rule.fix !== undefined
          })),
          null,
          2
        )
      );
      return;
    }
    const width = Math.max(...rules.map((rule) => rule.id.length));
    for (const rule of rules) {
      const severity = rule.severity === "error" ? pc.red("error  ") : pc.yellow("warning");
      console.log(`${rule.id.padEnd(width)}  ${severity}  ${rule.description}`);
    }
  });

await program.parseAsync(process.argv);
