type DatasetRow = Record<string, string>;

interface Dataset {
    columns: string[];
    rows: DatasetRow[];
}

interface CategoryCount {
    value: string;
    count: number;
    rank: number;
}

interface DatasetSearchResult {
    total: number;
    matched: number;
    rows: DatasetRow[];
    chart: CategoryCount[];
}

export type { DatasetRow, Dataset, CategoryCount, DatasetSearchResult };
