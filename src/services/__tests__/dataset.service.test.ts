import fs from "fs";
import os from "os";
import path from "path";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import DatasetService from "../dataset.service";
import { DatasetColumnError, DatasetUnavailableError } from "../../models/errors.model";
import type { DatasetRow } from "../../models/dataset.model";

const TSV = [
    "# exported listing",
    "# generated for tests",
    "pmid\ttitle_e\tjournal",
    "1\tDeep learning for COVID imaging\tNature",
    "2\tCOVID vaccine trials\tLancet",
    "",
    "3\tProtein folding"
].join("\r\n");

describe("DatasetService.parseTsv", () => {
    it("skips the preamble and pads short rows", () => {
        const dataset = DatasetService.parseTsv(TSV, 2);
        expect(dataset.columns).toEqual(["pmid", "title_e", "journal"]);
        expect(dataset.rows).toEqual([
            { pmid: "1", title_e: "Deep learning for COVID imaging", journal: "Nature" },
            { pmid: "2", title_e: "COVID vaccine trials", journal: "Lancet" },
            { pmid: "3", title_e: "Protein folding", journal: "" }
        ]);
    });

    it("unwraps quoted fields and keeps tabs, newlines and doubled quotes inside them", () => {
        const content = [
            "# preamble",
            "pmid\ttitle_e\tjournal",
            "1\t\"Long COVID, a review\"\tLancet",
            "2\t\"Tabs\tand \"\"quotes\"\"\"\t\"The BMJ\nOnline\"",
            "3\tPlain title\tNature",
            ""
        ].join("\n");

        expect(DatasetService.parseTsv(content, 1).rows).toEqual([
            { pmid: "1", title_e: "Long COVID, a review", journal: "Lancet" },
            { pmid: "2", title_e: "Tabs\tand \"quotes\"", journal: "The BMJ\nOnline" },
            { pmid: "3", title_e: "Plain title", journal: "Nature" }
        ]);
    });

        it("returns an empty dataset when nothing follows the preamble", () => {
        expect(DatasetService.parseTsv("# only\n# preamble\n", 2)).toEqual({ columns: [], rows: [] });
    });
});

describe("DatasetService.search", () => {
    const dataset = DatasetService.parseTsv(TSV, 2);

    it("matches a literal substring ignoring case", () => {
        expect(DatasetService.search(dataset, "title_e", "covid").map(r => r.pmid)).toEqual(["1", "2"]);
        expect(DatasetService.search(dataset, "title_e", "(").map(r => r.pmid)).toEqual([]);
    });

    it("rejects unknown columns", () => {
        expect(() => DatasetService.search(dataset, "abstract", "covid")).toThrow(DatasetColumnError);
    });
});

describe("DatasetService.topCategories", () => {
    const rows: DatasetRow[] = ["A", "B", "B", "C", "C", "D"].map(journal => ({ journal }));

    it("shares ranks between ties and keeps ranks below topN", () => {
        expect(DatasetService.topCategories(rows, "journal", 3)).toEqual([
            { value: "B", count: 2, rank: 1 },
            { value: "C", count: 2, rank: 1 }
        ]);
        expect(DatasetService.topCategories(rows, "journal", 4)).toEqual([
            { value: "B", count: 2, rank: 1 },
            { value: "C", count: 2, rank: 1 },
            { value: "A", count: 1, rank: 3 },
            { value: "D", count: 1, rank: 3 }
        ]);
    });
});

describe("DatasetService loading", () => {
    let dir: string;
    let file: string;

    beforeAll(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "matcompat-dataset-"));
        file = path.join(dir, "export.tsv");
        fs.writeFileSync(file, TSV, "utf-8");
    });

    afterAll(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    beforeEach(() => {
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "error").mockImplementation(() => undefined);
    });

    it("reads the file once and reuses it", async () => {
        const service = new DatasetService({ path: file, skipRows: 2 });
        const first = await service.load();
        const second = await service.load();
        expect(second).toBe(first);
        expect(first.rows).toHaveLength(3);
    });

    it("searches and aggregates the loaded rows", async () => {
        const service = new DatasetService({ path: file, skipRows: 2 });
        const result = await service.searchDataset({
            column: "title_e",
            query: "COVID",
            limit: 1,
            chartColumn: "journal",
            topN: 10
        });
        expect(result).toEqual({
            total: 3,
            matched: 2,
            rows: [{ pmid: "1", title_e: "Deep learning for COVID imaging", journal: "Nature" }],
            chart: [
                { value: "Nature", count: 1, rank: 1 },
                { value: "Lancet", count: 1, rank: 1 }
            ]
        });
    });

    it("reports a missing file as unavailable", async () => {
        const service = new DatasetService({ path: path.join(dir, "missing.tsv"), skipRows: 2 });
        await expect(service.load()).rejects.toBeInstanceOf(DatasetUnavailableError);
    });
});
