import fs from "node:fs";
import path from "node:path";
import { ExternalToolError, runCommand } from "../core/process";
import { Logger } from "../observability";

export interface TextExtractionTool {
  /**
   * Converts `pdfPath` to markup text inside `outputDir`, stopping after `lastPage` when given.
   * Resolves with the path of the produced text file.
   */
  extract(pdfPath: string, outputDir: string, lastPage?: number): Promise<string>;
}

/** Runs an OCR/markup extractor with the `<pdf> -o <dir> [-p 1-N]` command line (nougat). */
export class CommandTextExtractionTool implements TextExtractionTool {
  private readonly command: string;
  private readonly logger: Logger;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.logger = logger;
  }

  async extract(pdfPath: string, outputDir: string, lastPage?: number): Promise<string> {
    const args = [pdfPath, "-o", outputDir];
    if (lastPage !== undefined) {
      args.push("-p", `1-${lastPage}`);
    }

    this.logger.info("extract_tool_start", { command: this.command, args });
    await runCommand(this.command, args, this.logger);

    const produced = path.join(outputDir, `${path.basename(pdfPath, path.extname(pdfPath))}.mmd`);
    if (!fs.existsSync(produced)) {
      throw new ExternalToolError(`${this.command} finished without writing ${produced}`, 0);
    }
    return produced;
  }
}
