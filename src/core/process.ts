import { spawn } from "node:child_process";
import { Logger } from "../observability";

export class ExternalToolError extends Error {
  readonly exitCode: number | null;

  constructor(message: string, exitCode: number | null) {
    super(message);
    this.name = "ExternalToolError";
    this.exitCode = exitCode;
  }
}

/** Runs `command`, feeding `input` on stdin; resolves with stdout, rejects on a non-zero exit. */
export function runCommand(command: string, args: string[], logger: Logger, input?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      stdio: "pipe",
      env: process.env,
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    proc.stdin.on("error", (error) => {
      logger.debug("external_tool_stdin_error", { command, error: error.message });
    });
    proc.on("error", (error) => {
      reject(new ExternalToolError(`${command} failed to start: ${error.message}`, null));
    });
    proc.on("close", (code) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout).toString("utf-8"));
        return;
      }
      const detail = Buffer.concat(stderr).toString("utf-8").trim();
      logger.debug("external_tool_stderr", { command, data: detail });
      reject(new ExternalToolError(`${command} exited with code ${code}${detail ? `: ${detail}` : ""}`, code));
    });

    if (input !== undefined) {
      proc.stdin.end(input, "utf-8");
    } else {
      proc.stdin.end();
    }
  });
}

