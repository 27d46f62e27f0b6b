import type VocabularyService from "./vocabulary.service";
import type DatasetService from "./dataset.service";

class AppStarterService {
    /**
     * Loads the vocabulary and warms the dataset. Failures are logged and the
     * server keeps running: scoring answers 503 until a reload succeeds, the
     * dataset is retried on the next search.
     */
    static async onStartApp(vocabulary: VocabularyService, dataset: DatasetService): Promise<void> {
        console.log("Starting MatCompat scoring service...");

        try {
            await vocabulary.load();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`❌ Vocabulary not loaded at startup: ${message}`);
        }

        try {
            await dataset.load();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`⚠️  Dataset not loaded at startup: ${message}`);
        }
    }
}

export default AppStarterService;
