#!/usr/bin/env node
import "reflect-metadata";
import { INestApplicationContext, LogLevel, Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { Command, CommanderError, Option } from "commander";
import { RUNTIME_CONFIG, RuntimeConfig } from "./runtime/config";
import { toErrorInfo } from "./runtime/errors";
import { ResultFileWriter } from "./workflow/result-file.writer";
import { WorkflowModule } from "./workflow/workflow.module";
import { WorkflowService } from "./workflow/workflow.service";

// each level also enables everything more severe
const LOG_LEVELS: Record<string, LogLevel[]> = {
  DEBUG: ["debug", "verbose", "log", "warn", "error", "fatal"],
  INFO: ["log", "warn", "error", "fatal"],
  WARNING: ["warn", "error", "fatal"],
  ERROR: ["error", "fatal"],
  CRITICAL: ["fatal"],
};

export type CliArgs = {
  workflowFile: string;
  resultFile?: string;
  logLevel: string;
};

type CliOptions = {
  resultFile?: string;
  logLevel: string;
};

export function logLevelsFor(level: string): LogLevel[] {
  return LOG_LEVELS[level.toUpperCase()] ?? LOG_LEVELS.INFO;
}

export function createProgram(): Command {
  return new Command()
    .name("labflow")
    .description("Runs one workflow file against the task service and writes its result")
    .argument("<workflow>", "path to the workflow JSON file")
    .option("--result-file <path>", "where to write the result JSON (default: LABFLOW_RESULT_FILE or result.json)")
    .addOption(
      new Option("--log-level <level>", "logging level").choices(Object.keys(LOG_LEVELS)).default("INFO"),
    )
    .allowExcessArguments(false)
    .exitOverride();
}

/** Parses user arguments (without node and script). Throws a CommanderError on bad input. */
export function parseCliArgs(argv: string[]): CliArgs {
  const program = createProgram();
  program.parse(argv, { from: "user" });
  const opts = program.opts<CliOptions>();
  return { workflowFile: program.args[0], resultFile: opts.resultFile, logLevel: opts.logLevel };
}

async function runWorkflow(args: CliArgs): Promise<number> {
  const logger = new Logger("labflow");
  let app: INestApplicationContext | undefined;
  try {
    app = await NestFactory.createApplicationContext(WorkflowModule, { logger: logLevelsFor(args.logLevel) });
    const cfg = app.get<RuntimeConfig>(RUNTIME_CONFIG);

    const run = await app.get(WorkflowService).runFile(args.workflowFile);
    const { runId, ...result } = run;
    await app.get(ResultFileWriter).write(args.resultFile ?? cfg.resultFile, result);

    if (result.finalStatus !== "SUCCEEDED") {
      logger.error(`run ${runId} failed: ${result.error?.message ?? "no detail"}`);
      return 1;
    }
    logger.log(`run ${runId} succeeded with ${result.steps.length} step(s)`);
    return 0;
  } catch (e) {
    logger.error(toErrorInfo(e).message);
    return 1;
  } finally {
    await app?.close();
  }
}

/** Runs one workflow file and writes its result. Resolves to the process exit code. */
export async function runCli(argv: string[]): Promise<number> {
  let code = 1;
  const program = createProgram().action(async (workflowFile: string, opts: CliOptions) => {
    code = await runWorkflow({ workflowFile, resultFile: opts.resultFile, logLevel: opts.logLevel });
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (e) {
    // commander has already printed usage problems; --help ends here with exit code 0
    if (e instanceof CommanderError) return e.exitCode === 0 ? 0 : 1;
    throw e;
  }
  return code;
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e: unknown) => {
      process.stderr.write(`${e instanceof Error ? e.stack ?? e.message : String(e)}\n`);
      process.exitCode = 1;
    });
}
