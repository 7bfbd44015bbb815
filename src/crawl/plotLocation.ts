import { CheerioAPI, load } from "cheerio";
import { PlotLocationConfig } from "../config";
import { HttpClient } from "../core/fetch";
import { errorMessage, Logger } from "../observability";
import { PLOT_LOCATION_NOT_FOUND } from "../types";

export interface PlotProbeContext {
  $: CheerioAPI;
  documentUrl: string;
  config: PlotLocationConfig;
  http: Pick<HttpClient, "getStatus">;
  logger: Logger;
}

export interface PlotLocationProbe {
  name: string;
  probe(ctx: PlotProbeContext): Promise<string | undefined>;
}

function firstLinkContaining($: CheerioAPI, pattern: string): string | undefined {
  const anchor = $("a[href]")
    .filter((_, element) => ($(element).attr("href") ?? "").includes(pattern))
    .first();
  return anchor.attr("href");
}

/** Link in the row labelled "Note". */
export const noteProbe: PlotLocationProbe = {
  name: "note",
  async probe({ $ }) {
    const label = $("td.formatRecordLabel")
      .filter((_, element) => $(element).text().trim() === "Note")
      .first();
    if (label.length === 0) {
      return undefined;
    }
    return label.closest("tr").find("a").first().attr("href");
  },
};

export const papersLinkProbe: PlotLocationProbe = {
  name: "papers_link",
  async probe({ $, config }) {
    return firstLinkContaining($, config.papersLinkPattern);
  },
};

export const resultsLinkProbe: PlotLocationProbe = {
  name: "results_link",
  async probe({ $, config }) {
    return firstLinkContaining($, config.resultsLinkPattern);
  },
};

/** Figures previewed from the repository itself: the record page is the plot location. */
export const repositoryFigureProbe: PlotLocationProbe = {
  name: "repository_figures",
  async probe({ $, config, documentUrl }) {
    const hasRepositoryFigures = $("meta[property='og:image'], meta[property='og:image:secure_url']")
      .toArray()
      .some((element) => {
        const content = $(element).attr("content") ?? "";
        return content.includes(config.repositoryRecordPattern) && content.includes("Figure");
      });
    return hasRepositoryFigures ? documentUrl : undefined;
  },
};

/** `ANA-EXOT-2019-01-PAPER.pdf` → `<papersBaseUrl>EXOT-2019-01`, kept only if the page answers 2xx. */
export const paperNameProbe: PlotLocationProbe = {
  name: "paper_name",
  async probe({ $, config, http, logger, documentUrl }) {
    const pdfUrl = $("meta[name='citation_pdf_url']").attr("content");
    if (!pdfUrl) {
      return undefined;
    }

    const pdfName = (pdfUrl.split("/").pop() ?? "").replace(/\.pdf$/i, "");
    if (!pdfName.includes("PAPER")) {
      return undefined;
    }

    const candidate = `${config.papersBaseUrl}${pdfName.replace("ANA-", "").replace("-PAPER", "")}`;
    try {
      const status = await http.getStatus(candidate);
      return status >= 200 && status < 300 ? candidate : undefined;
    } catch (error) {
      logger.warn("plot_location_probe_failed", { url: documentUrl, candidate, error: errorMessage(error) });
      return undefined;
    }
  },
};

export const DEFAULT_PLOT_LOCATION_PROBES: readonly PlotLocationProbe[] = [
  noteProbe,
  papersLinkProbe,
  resultsLinkProbe,
  repositoryFigureProbe,
  paperNameProbe,
];

export interface ResolvePlotLocationDeps {
  config: PlotLocationConfig;
  http: Pick<HttpClient, "getStatus">;
  logger: Logger;
  probes?: readonly PlotLocationProbe[];
}

/** First probe to answer wins; otherwise the not-found marker. */
export async function resolvePlotLocation(html: string, documentUrl: string, deps: ResolvePlotLocationDeps): Promise<string> {
  const ctx: PlotProbeContext = {
    $: load(html),
    documentUrl,
    config: deps.config,
    http: deps.http,
    logger: deps.logger,
  };

  for (const probe of deps.probes ?? DEFAULT_PLOT_LOCATION_PROBES) {
    const location = await probe.probe(ctx);
    if (location) {
      deps.logger.debug("plot_location_resolved", { url: documentUrl, probe: probe.name, location });
      return location;
    }
  }

  return PLOT_LOCATION_NOT_FOUND;
}
