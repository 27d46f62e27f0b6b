/**
 * Application errors. `statusCode` is what the HTTP layer answers with when the
 * error reaches a controller.
 */
export class AppError extends Error {
    readonly code: string;
    readonly statusCode: number;

    constructor(message: string, code: string, statusCode: number) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.statusCode = statusCode;
    }
}

/** A vocabulary record could not be turned into a VocabTerm. Aborts the whole load. */
export class DataError extends AppError {
    readonly position: number;

    constructor(message: string, position: number) {
        super(message, "DATA_ERROR", 422);
        this.position = position;
    }
}

export class VocabularyNotLoadedError extends AppError {
    constructor() {
        super("Vocabulary is not loaded yet", "VOCABULARY_NOT_LOADED", 503);
    }
}

export class DatasetColumnError extends AppError {
    readonly column: string;

    constructor(column: string) {
        super(`Unknown dataset column: ${column}`, "DATASET_COLUMN", 400);
        this.column = column;
    }
}

export class DatasetUnavailableError extends AppError {
    constructor(message: string) {
        super(message, "DATASET_UNAVAILABLE", 503);
    }
}
