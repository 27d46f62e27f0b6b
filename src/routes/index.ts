import express from "express";
import { createScoreRouter } from "./score.routes";
import { createVocabularyRouter } from "./vocabulary.routes";
import { createDatasetRouter } from "./dataset.routes";
import ScoreController from "../controllers/score.controller";
import VocabularyController from "../controllers/vocabulary.controller";
import DatasetController from "../controllers/dataset.controller";
import type VocabularyService from "../services/vocabulary.service";
import type DatasetService from "../services/dataset.service";

export const SERVICE_NAME = "matcompat-backend";
export const SERVICE_VERSION = "1.0.0";

export interface RouterDeps {
    vocabulary: VocabularyService;
    dataset: DatasetService;
    maxTextLength: number;
    secretAccessKey: string | undefined;
}

export function createRouter(deps: RouterDeps) {
    const router = express.Router();
    const startedAt = Date.now();

    router.get("/health", (_req, res) => {
        res.status(200).json({
            success: true,
            message: "ok",
            data: {
                service: SERVICE_NAME,
                version: SERVICE_VERSION,
                uptimeMs: Date.now() - startedAt,
                vocabularyLoaded: deps.vocabulary.isLoaded()
            }
        });
    });

    router.use("/score", createScoreRouter(new ScoreController(deps.vocabulary, deps.maxTextLength)));
    router.use("/vocabulary", createVocabularyRouter(new VocabularyController(deps.vocabulary), deps.secretAccessKey));
    router.use("/dataset", createDatasetRouter(new DatasetController(deps.dataset)));

    return router;
}
