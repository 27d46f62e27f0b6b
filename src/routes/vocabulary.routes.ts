import express from "express";
import AccessMiddleware from "../middlewares/access.middleware";
import type VocabularyController from "../controllers/vocabulary.controller";

export function createVocabularyRouter(controller: VocabularyController, secretAccessKey: string | undefined) {
    const vocabularyRouter = express.Router();

    vocabularyRouter.get("/", controller.getStats);

    vocabularyRouter.post("/reload", AccessMiddleware.requireSecret(secretAccessKey), controller.reload);

    return vocabularyRouter;
}
