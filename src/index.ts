import { loadAppConfig } from "./config/app.config";
import DatabaseConfig from "./config/db";
import { createApp } from "./app";
import VocabularyService from "./services/vocabulary.service";
import DatasetService from "./services/dataset.service";
import { MongoVocabularyRepository } from "./services/vocabulary.repository";
import AppStarterService from "./services/App.starter.service";

const config = loadAppConfig();

const vocabulary = new VocabularyService(new MongoVocabularyRepository(config.vocabCollection));
const dataset = new DatasetService({ path: config.datasetPath, skipRows: config.datasetSkipRows });

const app = createApp({
    vocabulary,
    dataset,
    maxTextLength: config.maxTextLength,
    secretAccessKey: config.secretAccessKey
});

const server = app.listen(config.port, () => {
    console.log(`🚀 Server Running: http://localhost:${config.port}`);
    AppStarterService.onStartApp(vocabulary, dataset).catch(error => {
        console.error("Startup failed:", error);
    });
});

function shutdown(): void {
    server.close(() => {
        DatabaseConfig.closeConnection()
            .catch(error => console.error("Error closing database connection:", error))
            .finally(() => process.exit(0));
    });
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
