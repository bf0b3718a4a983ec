import { loadConfig } from "../config";
import {
  CommandContext,
  hasFailedExecution,
  runHandleEvent,
  runListen,
  runReplay,
  runResume,
  runStart,
  runStatus,
} from "../core/commands";
import { closeFetchDispatcher } from "../core/fetch";
import { createDocumentOrchestrator } from "../core/orchestratorFactory";
import { createRunId, createWorkerId, Logger, MetricsRegistry } from "../observability";
import { createSink } from "../sink";
import { createStore } from "../store";
import { DocumentRef } from "../types";

export type CommandName = "start" | "replay" | "resume" | "status" | "handle-event" | "listen";

export interface ParsedCliArgs {
  command: CommandName;
  container?: string;
  key?: string;
  fromStage?: string;
  eventPath?: string;
  iterations?: number;
  limit?: number;
  configPath?: string;
}

const COMMANDS: readonly CommandName[] = ["start", "replay", "resume", "status", "handle-event", "listen"];

const HELP_TEXT = `
Usage:
  docpipe <command> [options]

Commands:
  start --container <name> --key <key>      Start (or join) the execution for a document
  replay --container <name> --key <key>     Re-run a finished document as a new generation
  resume                                    Pick up pending executions and expired leases
  status [--container <name> --key <key>]   Show one execution, or store totals
  handle-event --event <file>               Start executions for a storage event JSON file
  listen                                    Long-poll the trigger queue and start executions

Options:
  --config <path>       Optional path to JSON config file
  --from-stage <name>   First stage to re-run (replay)
  --limit <n>           Max executions to resume (default 100)
  --iterations <n>      Limit polling iterations (listen)
  -h, --help            Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  const value = index >= 0 ? argv[index + 1] : undefined;
  return value && !value.startsWith("--") ? value : undefined;
}

function intOption(argv: string[], name: string): number | undefined {
  const raw = optionValue(argv, name);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    container: optionValue(argv, "--container"),
    key: optionValue(argv, "--key"),
    fromStage: optionValue(argv, "--from-stage"),
    eventPath: optionValue(argv, "--event"),
    iterations: intOption(argv, "--iterations"),
    limit: intOption(argv, "--limit"),
    configPath: optionValue(argv, "--config"),
  };
}

function documentRefFrom(parsed: ParsedCliArgs): DocumentRef | undefined {
  if (parsed.container === undefined && parsed.key === undefined) {
    return undefined;
  }
  if (!parsed.container || !parsed.key) {
    throw new Error(`${parsed.command} needs both --container and --key`);
  }
  return { container: parsed.container, key: parsed.key };
}

function requireDocumentRef(parsed: ParsedCliArgs): DocumentRef {
  const ref = documentRefFrom(parsed);
  if (!ref) {
    throw new Error(`${parsed.command} needs --container and --key`);
  }
  return ref;
}

export async function executeCommand(context: CommandContext, parsed: ParsedCliArgs): Promise<number> {
  const logger = context.logger;
  switch (parsed.command) {
    case "start": {
      const outcome = await runStart({ ...context, logger: logger.child("start") }, requireDocumentRef(parsed));
      return hasFailedExecution([outcome]) ? 1 : 0;
    }
    case "replay": {
      const outcome = await runReplay(
        { ...context, logger: logger.child("replay") },
        requireDocumentRef(parsed),
        parsed.fromStage,
      );
      return hasFailedExecution([outcome]) ? 1 : 0;
    }
    case "resume":
      await runResume({ ...context, logger: logger.child("resume") }, parsed.limit ?? 100);
      return 0;
    case "status": {
      const result = await runStatus({ ...context, logger: logger.child("status") }, documentRefFrom(parsed));
      console.log(JSON.stringify(result ?? null, null, 2));
      return result ? 0 : 1;
    }
    case "handle-event": {
      if (!parsed.eventPath) {
        throw new Error("handle-event needs --event <file>");
      }
      const outcomes = await runHandleEvent({ ...context, logger: logger.child("handle_event") }, parsed.eventPath);
      return hasFailedExecution(outcomes) ? 1 : 0;
    }
    case "listen": {
      const controller = new AbortController();
      const stop = (signalName: string) => {
        logger.warn("shutdown_requested", { signal: signalName });
        controller.abort();
        context.orchestrator.cancelAll();
      };
      const onSigint = () => stop("SIGINT");
      const onSigterm = () => stop("SIGTERM");
      process.once("SIGINT", onSigint);
      process.once("SIGTERM", onSigterm);
      try {
        await runListen(
          { ...context, logger: logger.child("listen") },
          { iterations: parsed.iterations, signal: controller.signal },
        );
      } finally {
        process.removeListener("SIGINT", onSigint);
        process.removeListener("SIGTERM", onSigterm);
      }
      return 0;
    }
  }
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = loadConfig(parsed.configPath);
  const runId = createRunId();
  const store = createStore(config);
  const sink = createSink(config, runId);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId });
  const orchestrator = createDocumentOrchestrator(config, {
    store,
    sink,
    metrics,
    logger: logger.child("orchestrator"),
    workerId: createWorkerId(),
  });

  logger.info("command_start", {
    command: parsed.command,
    container: parsed.container,
    key: parsed.key,
    fromStage: parsed.fromStage,
    storeMode: config.storeMode,
    iterations: parsed.iterations,
  });

  try {
    const exitCode = await executeCommand({ runId, config, store, logger, metrics, orchestrator }, parsed);
    logger.info("command_complete", { command: parsed.command, exitCode });
    return exitCode;
  } finally {
    await store.close();
    await closeFetchDispatcher();
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
