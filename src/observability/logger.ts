import fs from "node:fs";
import path from "node:path";
import { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  /** JSON-lines run log; every line is appended here as well as echoed. */
  logFile?: string;
  echo?: boolean;
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
    if (context.logFile) {
      fs.mkdirSync(path.dirname(context.logFile), { recursive: true });
    }
  }

  get logFile(): string | undefined {
    return this.context.logFile;
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
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
    if (this.context.logFile) {
      fs.appendFileSync(this.context.logFile, `${line}\n`, "utf-8");
    }

    if (this.context.echo === false) {
      return;
    }
    if (level === "error") {
      console.error(line);
      return;
    }
    console.log(line);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
