import fs from "node:fs";
import { PDFParse } from "pdf-parse";

interface ParserLike {
  getText(): Promise<{
    total: number;
    pages: Array<{
      num: number;
      text: string;
    }>;
  }>;
  destroy(): Promise<void>;
}

export interface PdfPageReader {
  /** Text of every page, first page first. */
  readPages(pdfPath: string): Promise<string[]>;
}

interface PdfParsePageReaderDeps {
  parserFactory?: (data: Buffer) => ParserLike;
  readFile?: (filePath: string) => Promise<Buffer>;
}

export class PdfParsePageReader implements PdfPageReader {
  private readonly parserFactory: (data: Buffer) => ParserLike;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps?: PdfParsePageReaderDeps) {
    this.parserFactory =
      deps?.parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
    this.readFile = deps?.readFile ?? fs.promises.readFile;
  }

  async readPages(pdfPath: string): Promise<string[]> {
    const pdfBuffer = await this.readFile(pdfPath);
    const parser = this.parserFactory(pdfBuffer);

    try {
      const result = await parser.getText();
      return [...result.pages].sort((a, b) => a.num - b.num).map((page) => page.text);
    } finally {
      await parser.destroy().catch(() => undefined);
    }
  }
}

/** 1-indexed number of the last page containing `keyword`, scanning from the end. */
export function findKeywordInPages(pages: readonly string[], keyword: string): number | undefined {
  for (let index = pages.length - 1; index >= 0; index -= 1) {
    if (pages[index].includes(keyword)) {
      return index + 1;
    }
  }
  return undefined;
}

export async function findKeywordPage(reader: PdfPageReader, pdfPath: string, keyword: string): Promise<number | undefined> {
  return findKeywordInPages(await reader.readPages(pdfPath), keyword);
}

/** Smallest found page; `undefined` means no limit. */
export function minPageBound(pages: Array<number | undefined>): number | undefined {
  const found = pages.filter((page): page is number => page !== undefined);
  return found.length > 0 ? Math.min(...found) : undefined;
}

/** Last page worth extracting, so references and acknowledgments stay out of the text. */
export async function findPageBound(reader: PdfPageReader, pdfPath: string, keywords: readonly string[]): Promise<number | undefined> {
  const pages = await reader.readPages(pdfPath);
  return minPageBound(keywords.map((keyword) => findKeywordInPages(pages, keyword)));
}
