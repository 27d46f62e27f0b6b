import express from "express";
import type ScoreController from "../controllers/score.controller";

export function createScoreRouter(controller: ScoreController) {
    const scoreRouter = express.Router();

    scoreRouter.post("/", controller.scoreText);

    return scoreRouter;
}
