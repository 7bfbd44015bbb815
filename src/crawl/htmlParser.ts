import { load } from "cheerio";

export interface ParsedPaperLink {
  url: string;
  title: string;
}

/** Used when a record page carries no modification box. */
export const FALLBACK_MODIFICATION_DATE = "2001-01-01";

const RECORD_ID_PATTERN = /record\/(\d+)/;

function normalizeUrl(baseUrl: string, href: string): string {
  return new URL(href, baseUrl).toString();
}

export function buildSearchUrl(baseUrl: string, collection: string, resultPage: number, resultsPerPage: number): string {
  const trimmed = baseUrl.endsWith("/") ? baseUrl.slice(0, -1) : baseUrl;
  const jrec = resultPage * resultsPerPage + 1;
  return `${trimmed}/search?cc=${collection.replace(/ /g, "+")}&rg=${resultsPerPage}&m1=a&jrec=${jrec}`;
}

export function recordFolderName(url: string): string | undefined {
  const match = url.match(RECORD_ID_PATTERN);
  return match ? `CDS_Record_${match[1]}` : undefined;
}

export function extractPaperLinks(html: string, pageUrl: string): ParsedPaperLink[] {
  const $ = load(html);
  const links: ParsedPaperLink[] = [];

  $("a.titlelink").each((_, element) => {
    const href = $(element).attr("href");
    const title = $(element).text();
    if (!href || title.includes("[...]")) {
      return;
    }

    const link = href.endsWith("?ln=en") ? href.slice(0, -"?ln=en".length) : href;
    links.push({ url: normalizeUrl(pageUrl, link), title });
  });

  return links;
}

export function extractModificationDate(html: string): string | undefined {
  const $ = load(html);
  const box = $("div.recordlastmodifiedbox").first();
  if (box.length === 0) {
    return undefined;
  }
  const text = box.text().replace(/\s+/g, " ").trim();
  return text.split("last modified").pop()?.trim();
}

export function extractRecordCount(html: string): number | undefined {
  const $ = load(html);
  const strong = $("td.searchresultsboxheader[align='center'] strong").first();
  if (strong.length === 0) {
    return undefined;
  }
  const parsed = Number.parseInt(strong.text().trim().replace(/,/g, ""), 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export function extractPdfUrl(html: string, pageUrl: string): string | undefined {
  const $ = load(html);
  const content = $("meta[name='citation_pdf_url']").attr("content");
  return content ? normalizeUrl(pageUrl, content) : undefined;
}

export function extractTechReportNumbers(html: string): string[] {
  const $ = load(html);
  const numbers: string[] = [];
  $("meta[name='citation_technical_report_number']").each((_, element) => {
    const content = $(element).attr("content");
    if (content) {
      numbers.push(content);
    }
  });
  return numbers;
}
