import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { makeTempDir } from "../testing/helpers";
import { DocumentRecord } from "../types";
import { formatMetadata, parseMetadata, readMetadataFile, writeMetadataFile } from "./metadataFile";

const record: DocumentRecord = {
  recordId: "CDS_Record_101",
  title: "Search for new physics",
  lastModified: "2024-03-05",
  url: "https://repo.test/record/101",
  collection: "ATLAS Papers",
  techReportNumbers: ["CERN-EP-2024-001", "ATLAS-EXOT-2019-01"],
  plotLocation: "https://plots.test/exot-2019-01",
};

describe("formatMetadata", () => {
  it("writes one labelled line per field", () => {
    expect(formatMetadata(record)).toBe(
      [
        "PAPER NAME : Search for new physics",
        "LAST MODIFICATION DATE : 2024-03-05",
        "URL : https://repo.test/record/101",
        "COLLECTION : ATLAS_Papers",
        "TECH REP NUM: CERN-EP-2024-001, ATLAS-EXOT-2019-01",
        "PLOT LOC: https://plots.test/exot-2019-01",
        "",
      ].join("\n"),
    );
  });

  it("writes the not-found marker when no plot location is known", () => {
    expect(formatMetadata({ ...record, plotLocation: "" })).toContain("PLOT LOC: None\n");
  });
});

describe("parseMetadata", () => {
  it("reads back every field of a written file", () => {
    expect(parseMetadata(formatMetadata(record))).toEqual({
      paperName: "Search for new physics",
      lastModified: "2024-03-05",
      url: "https://repo.test/record/101",
      collection: "ATLAS_Papers",
      techReportNumbers: ["CERN-EP-2024-001", "ATLAS-EXOT-2019-01"],
      plotLocation: "https://plots.test/exot-2019-01",
    });
  });

  it("joins a paper name spread over several lines", () => {
    const parsed = parseMetadata(
      "PAPER NAME : Measurement of the\ncross section at 13 TeV\nLAST MODIFICATION DATE : 2023-01-02\n",
    );
    expect(parsed.paperName).toBe("Measurement of the cross section at 13 TeV");
    expect(parsed.lastModified).toBe("2023-01-02");
  });

  it("leaves absent fields undefined", () => {
    const parsed = parseMetadata("TECH REP NUM: \nPLOT LOC: None\n");
    expect(parsed.paperName).toBeUndefined();
    expect(parsed.lastModified).toBeUndefined();
    expect(parsed.techReportNumbers).toEqual([]);
    expect(parsed.plotLocation).toBe("None");
  });
});

describe("metadata files", () => {
  it("returns undefined for a missing file and parses a written one", () => {
    const dir = makeTempDir();
    const filePath = path.join(dir, "CDS_Record_101", "meta_info.txt");
    expect(readMetadataFile(filePath)).toBeUndefined();

    writeMetadataFile(filePath, record);
    expect(fs.existsSync(filePath)).toBe(true);
    expect(readMetadataFile(filePath)?.lastModified).toBe("2024-03-05");
  });
});
