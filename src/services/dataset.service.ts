import fs from "fs";
import type { CategoryCount, Dataset, DatasetRow, DatasetSearchResult } from "../models/dataset.model";
import { DatasetColumnError, DatasetUnavailableError } from "../models/errors.model";

export interface DatasetOptions {
    path: string;
    skipRows: number;
}

export interface DatasetSearchQuery {
    column: string;
    query: string;
    limit: number;
    chartColumn: string;
    topN: number;
}

/**
 * Dataset Service - auxiliary TSV export (title, journal, ...) searched next to
 * the score. The file is read once per instance.
 */
class DatasetService {
    private dataset: Dataset | null = null;
    private loading: Promise<Dataset> | null = null;

    constructor(private readonly options: DatasetOptions) { }

    /**
     * Splits TSV text into records of fields. A field opening with `"` runs to
     * its closing quote and may hold tabs, newlines and doubled `""` quotes.
     */
    static splitRecords(content: string): string[][] {
        const records: string[][] = [];
        let record: string[] = [];
        let field = "";
        let quoted = false;
        let i = 0;

        const endRecord = () => {
            record.push(field);
            records.push(record);
            record = [];
            field = "";
        };

        while (i < content.length) {
            const char = content.charAt(i);

            if (quoted) {
                if (char === "\"") {
                    if (content.charAt(i + 1) === "\"") {
                        field += "\"";
                        i += 2;
                        continue;
                    }
                    quoted = false;
                } else {
                    field += char;
                }
                i++;
                continue;
            }

            if (char === "\"" && field.length === 0) {
                quoted = true;
            } else if (char === "\t") {
                record.push(field);
                field = "";
            } else if (char === "\n" || char === "\r") {
                if (char === "\r" && content.charAt(i + 1) === "\n") i++;
                endRecord();
            } else {
                field += char;
            }
            i++;
        }

        if (field.length > 0 || record.length > 0) {
            endRecord();
        }
        return records;
    }

    /**
     * Drops `skipRows` preamble lines, takes the next record as header and the
     * rest as rows. Blank lines are ignored, short rows are padded with "".
     */
    static parseTsv(content: string, skipRows: number): Dataset {
        const body = content.split(/\r?\n/).slice(skipRows).join("\n");
        const records = this.splitRecords(body)
            .filter(fields => fields.length > 1 || (fields[0] ?? "").trim().length > 0);

        const [header, ...data] = records;
        if (!header) {
            return { columns: [], rows: [] };
        }

        const columns = header.map(c => c.trim());
        const rows: DatasetRow[] = data.map(cells => {
            const row: DatasetRow = {};
            columns.forEach((column, i) => {
                row[column] = cells[i] ?? "";
            });
            return row;
        });

        return { columns, rows };
    }

    static search(dataset: Dataset, column: string, query: string): DatasetRow[] {
        if (!dataset.columns.includes(column)) {
            throw new DatasetColumnError(column);
        }
        const needle = query.toLowerCase();
        return dataset.rows.filter(row => (row[column] ?? "").toLowerCase().includes(needle));
    }

    /**
     * Rows per value of `column`. Equal counts share a rank and the next rank
     * skips ahead (1, 2, 2, 4); only entries ranked below `topN` are kept.
     */
    static topCategories(rows: readonly DatasetRow[], column: string, topN: number): CategoryCount[] {
        const counts = new Map<string, number>();
        for (const row of rows) {
            const value = row[column] ?? "";
            counts.set(value, (counts.get(value) ?? 0) + 1);
        }

        const sorted = Array.from(counts.entries())
            .map(([value, count]) => ({ value, count }))
            .sort((a, b) => b.count - a.count);

        const ranked: CategoryCount[] = [];
        sorted.forEach((item, i) => {
            const previous = ranked[i - 1];
            const rank = previous && previous.count === item.count ? previous.rank : i + 1;
            ranked.push({ ...item, rank });
        });

        return ranked.filter(item => item.rank < topN);
    }

    load(): Promise<Dataset> {
        if (this.dataset) {
            return Promise.resolve(this.dataset);
        }
        if (!this.loading) {
            this.loading = this.readDataset().finally(() => {
                this.loading = null;
            });
        }
        return this.loading;
    }

    private async readDataset(): Promise<Dataset> {
        let content: string;
        try {
            content = await fs.promises.readFile(this.options.path, "utf-8");
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`Dataset read failed (${this.options.path}): ${message}`);
            throw new DatasetUnavailableError(`Dataset is not available: ${this.options.path}`);
        }

        const dataset = DatasetService.parseTsv(content, this.options.skipRows);
        this.dataset = dataset;
        console.log("🗂️  Dataset loaded:", {
            path: this.options.path,
            columns: dataset.columns.length,
            rows: dataset.rows.length
        });
        return dataset;
    }

    async searchDataset(q: DatasetSearchQuery): Promise<DatasetSearchResult> {
        const dataset = await this.load();
        const matches = DatasetService.search(dataset, q.column, q.query);
        if (!dataset.columns.includes(q.chartColumn)) {
            throw new DatasetColumnError(q.chartColumn);
        }

        return {
            total: dataset.rows.length,
            matched: matches.length,
            rows: matches.slice(0, q.limit),
            chart: DatasetService.topCategories(matches, q.chartColumn, q.topN)
        };
    }
}

export default DatasetService;
