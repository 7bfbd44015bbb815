import fs from "node:fs";
import path from "node:path";
import { DocumentRecord, PLOT_LOCATION_NOT_FOUND } from "../types";

export const METADATA_LABELS = {
  paperName: "PAPER NAME :",
  lastModified: "LAST MODIFICATION DATE :",
  url: "URL :",
  collection: "COLLECTION :",
  techReportNumbers: "TECH REP NUM:",
  plotLocation: "PLOT LOC:",
} as const;

const ALL_LABELS: readonly string[] = Object.values(METADATA_LABELS);

export interface ParsedMetadata {
  paperName?: string;
  lastModified?: string;
  url?: string;
  collection?: string;
  techReportNumbers: string[];
  plotLocation?: string;
}

function startsWithLabel(line: string): boolean {
  return ALL_LABELS.some((label) => line.startsWith(label));
}

function valueAfter(line: string, label: string): string {
  return line.slice(label.length).trim();
}

/**
 * Parses a metadata file by line prefix. The paper name may continue over several lines, up to the
 * modification-date label (or any other label).
 */
export function parseMetadata(text: string): ParsedMetadata {
  const parsed: ParsedMetadata = { techReportNumbers: [] };
  const nameLines: string[] = [];
  let capturingName = false;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trimStart();

    if (line.startsWith(METADATA_LABELS.paperName)) {
      capturingName = true;
      nameLines.push(valueAfter(line, METADATA_LABELS.paperName));
      continue;
    }

    if (capturingName && !startsWithLabel(line)) {
      if (line.trim()) {
        nameLines.push(line.trim());
      }
      continue;
    }
    capturingName = false;

    if (line.startsWith(METADATA_LABELS.lastModified)) {
      parsed.lastModified = valueAfter(line, METADATA_LABELS.lastModified);
    } else if (line.startsWith(METADATA_LABELS.url)) {
      parsed.url = valueAfter(line, METADATA_LABELS.url);
    } else if (line.startsWith(METADATA_LABELS.collection)) {
      parsed.collection = valueAfter(line, METADATA_LABELS.collection);
    } else if (line.startsWith(METADATA_LABELS.techReportNumbers)) {
      parsed.techReportNumbers = valueAfter(line, METADATA_LABELS.techReportNumbers)
        .split(",")
        .map((value) => value.trim())
        .filter((value) => value.length > 0);
    } else if (line.startsWith(METADATA_LABELS.plotLocation)) {
      parsed.plotLocation = valueAfter(line, METADATA_LABELS.plotLocation);
    }
  }

  if (nameLines.length > 0) {
    parsed.paperName = nameLines.join(" ");
  }
  return parsed;
}

export function formatMetadata(record: DocumentRecord): string {
  const lines = [
    `${METADATA_LABELS.paperName} ${(record.title ?? "").replace(/\n/g, "")}`,
    `${METADATA_LABELS.lastModified} ${record.lastModified ?? ""}`,
    `${METADATA_LABELS.url} ${(record.url ?? "").replace(/\n/g, "")}`,
    `${METADATA_LABELS.collection} ${(record.collection ?? "").replace(/ /g, "_")}`,
    `${METADATA_LABELS.techReportNumbers} ${record.techReportNumbers.join(", ")}`,
    `${METADATA_LABELS.plotLocation} ${record.plotLocation || PLOT_LOCATION_NOT_FOUND}`,
  ];
  return `${lines.join("\n")}\n`;
}

export function readMetadataFile(filePath: string): ParsedMetadata | undefined {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }
  return parseMetadata(fs.readFileSync(filePath, "utf-8"));
}

export function writeMetadataFile(filePath: string, record: DocumentRecord): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, formatMetadata(record), "utf-8");
}
