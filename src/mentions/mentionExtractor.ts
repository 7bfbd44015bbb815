import { MentionKey, MentionKind, MentionMap } from "../types";

interface CitationPattern {
  kind: MentionKind;
  pattern: RegExp;
  skipLine?: (line: string) => boolean;
}

/** `Fig. 3`, `Figure 3`, `figures 3`. */
export const FIGURE_PATTERN = /[Ff]ig\. (\d+)|[Ff]igures? (\d+)/g;
export const TABLE_PATTERN = /[Tt]able (\d+)/g;

const SENTENCE_BOUNDARY = ". ";

/** Tabular rows end in `\\`; numbers on such lines are cell content, not citations. */
export function isTableContinuationLine(line: string): boolean {
  return line.trimEnd().endsWith("\\\\");
}

const CITATION_PATTERNS: readonly CitationPattern[] = [
  { kind: "Figure", pattern: FIGURE_PATTERN },
  { kind: "Table", pattern: TABLE_PATTERN, skipLine: isTableContinuationLine },
];

/**
 * The sentence around a match, bounded by `". "` on either side or by the ends of the line. Naive on
 * purpose: abbreviations and decimals cut sentences short.
 */
export function snipSentence(line: string, start: number, matched: string): string {
  const before = line.slice(0, start).split(SENTENCE_BOUNDARY).pop() ?? "";
  const after = line.slice(start + matched.length).split(SENTENCE_BOUNDARY)[0];
  return before + matched + after;
}

function capturedNumber(match: RegExpMatchArray): string | undefined {
  return match.slice(1).find((group) => group !== undefined);
}

function collect(lines: readonly string[], citation: CitationPattern, into: MentionMap): void {
  for (const line of lines) {
    if (citation.skipLine?.(line)) {
      continue;
    }

    for (const match of line.matchAll(citation.pattern)) {
      const number = capturedNumber(match);
      if (number === undefined || match.index === undefined) {
        continue;
      }
      const key: MentionKey = `${citation.kind} ${number}`;
      const contexts = into[key] ?? [];
      contexts.push(snipSentence(line, match.index, match[0]));
      into[key] = contexts;
    }
  }
}

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

/** Figure keys first, then table keys, each in order of first appearance. */
export function extractMentions(lines: readonly string[]): MentionMap {
  const mentions: MentionMap = {};
  for (const citation of CITATION_PATTERNS) {
    collect(lines, citation, mentions);
  }
  return mentions;
}
