import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { MarkupConverter } from "./markupConverter";

/** Applied in order; longer directives come before their prefixes. */
export const LITERAL_SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  ["\\\\", " "],
  ["\\newline", " "],
  ["\n", " "],
  ["\\(", ""],
  ["\\)", ""],
  ["\\[", ""],
  ["\\]", ""],
  ["\\mathrm", ""],
  ["\\mathbf", ""],
  ["\\mathit", ""],
  ["\\mathsf", ""],
  ["\\textbf", ""],
  ["\\textit", ""],
  ["\\textrm", ""],
  ["\\emph", ""],
  ["\\text", ""],
  ["\\pm", "±"],
  ["\\mp", "∓"],
  ["\\qquad", " "],
  ["\\quad", " "],
  ["\\,", " "],
  ["\\;", " "],
  ["\\:", " "],
];

export const ENVIRONMENT_BEGIN = "\\begin{";
const ESCAPE = "\\";

export function applySubstitutions(raw: string): string {
  let text = raw;
  for (const [from, to] of LITERAL_SUBSTITUTIONS) {
    text = text.split(from).join(to);
  }
  return text;
}

export interface TextNormalizerDeps {
  converter: MarkupConverter;
  logger: Logger;
  metrics?: MetricsRegistry;
}

export class TextNormalizer {
  private readonly deps: TextNormalizerDeps;

  constructor(deps: TextNormalizerDeps) {
    this.deps = deps;
  }

  /**
   * Plain text for one context sentence. Sentences holding an environment (a nested table, say) come
   * back empty. Conversion failures are logged and the substituted text is returned as is.
   */
  async normalize(raw: string): Promise<string> {
    const text = applySubstitutions(raw);

    if (text.includes(ENVIRONMENT_BEGIN)) {
      return "";
    }

    if (!text.includes(ESCAPE)) {
      return text.replace(/[{}]/g, "");
    }

    try {
      return await this.deps.converter.toPlainText(text);
    } catch (error) {
      this.deps.metrics?.incrementCounter("conversions_failed", 1);
      this.deps.logger.error("markup_conversion_failed", { text, error: errorMessage(error) });
      return text;
    }
  }
}
