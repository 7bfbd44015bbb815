import { runCommand } from "../core/process";
import { Logger } from "../observability";

export interface MarkupConverter {
  toPlainText(markup: string): Promise<string>;
}

/** Pipes markup through an external converter such as `latex2text`. */
export class CommandMarkupConverter implements MarkupConverter {
  private readonly command: string;
  private readonly args: string[];
  private readonly logger: Logger;

  constructor(command: string, args: string[], logger: Logger) {
    this.command = command;
    this.args = args;
    this.logger = logger;
  }

  async toPlainText(markup: string): Promise<string> {
    const output = await runCommand(this.command, this.args, this.logger, markup);
    return output.replace(/\r?\n$/, "");
  }
}
