import fs from "node:fs";
import path from "node:path";
import { MentionKey, MentionMap, MentionRecord } from "../types";
import { TextNormalizer } from "./textNormalizer";

export interface DocumentInfo {
  paper: string;
  paperName?: string;
  plotLocation: string;
}

function isMentionKey(key: string): key is MentionKey {
  return key.startsWith("Figure ") || key.startsWith("Table ");
}

function mentionKeys(mentions: MentionMap): MentionKey[] {
  return Object.keys(mentions).filter(isMentionKey);
}

export async function normalizeMentions(mentions: MentionMap, normalizer: TextNormalizer): Promise<MentionMap> {
  const normalized: MentionMap = {};
  for (const key of mentionKeys(mentions)) {
    const contexts: string[] = [];
    for (const context of mentions[key]) {
      contexts.push(await normalizer.normalize(context));
    }
    normalized[key] = contexts;
  }
  return normalized;
}

/**
 * One record per key. Every record carries the whole normalized map for the document, not only its
 * own key's contexts; consumers rely on that shape.
 */
export async function assembleRecords(doc: DocumentInfo, mentions: MentionMap, normalizer: TextNormalizer): Promise<MentionRecord[]> {
  const normalized = await normalizeMentions(mentions, normalizer);
  return mentionKeys(normalized).map((name) => ({
    name,
    mentions: normalized,
    atlusUrl: doc.plotLocation,
    paper: doc.paper,
    paperName: doc.paperName ?? null,
  }));
}

/** Replaces any previous output at `outputPath`. */
export async function writeRecords(outputPath: string, records: MentionRecord[]): Promise<void> {
  await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
  await fs.promises.rm(outputPath, { force: true });
  const tempPath = `${outputPath}.part`;
  await fs.promises.writeFile(tempPath, `${JSON.stringify(records, null, 4)}\n`, "utf-8");
  await fs.promises.rename(tempPath, outputPath);
}
