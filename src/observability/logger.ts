import { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LogOutput {
  log(line: string): void;
  error(line: string): void;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly output: LogOutput;

  constructor(context: LoggerContext, output: LogOutput = console) {
    this.context = context;
    this.output = output;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, this.output);
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    const line = JSON.stringify(payload);
    if (level === "error") {
      this.output.error(line);
      return;
    }
    this.output.log(line);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
