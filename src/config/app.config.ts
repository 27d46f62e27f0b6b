import dotenv from "dotenv";
dotenv.config();

export interface AppConfig {
    port: number;
    mongoUri: string | undefined;
    dbName: string | undefined;
    vocabCollection: string;
    datasetPath: string;
    datasetSkipRows: number;
    maxTextLength: number;
    secretAccessKey: string | undefined;
}

function readInt(raw: string | undefined, fallback: number, name: string): number {
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return value;
}

function readString(raw: string | undefined): string | undefined {
    const value = raw?.trim();
    return value ? value : undefined;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    return {
        port: readInt(env.PORT, 3000, "PORT"),
        mongoUri: readString(env.MONGODB_URI),
        dbName: readString(env.DB_NAME),
        vocabCollection: readString(env.VOCAB_COLLECTION) ?? "palabras_clave",
        datasetPath: readString(env.DATASET_PATH) ?? "litcovid.export.all.tsv",
        datasetSkipRows: readInt(env.DATASET_SKIP_ROWS, 33, "DATASET_SKIP_ROWS"),
        maxTextLength: readInt(env.MAX_TEXT_LENGTH, 200000, "MAX_TEXT_LENGTH"),
        secretAccessKey: readString(env.SECRET_ACCESS_KEY)
    };
}
