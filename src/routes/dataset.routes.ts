import express from "express";
import type DatasetController from "../controllers/dataset.controller";

export function createDatasetRouter(controller: DatasetController) {
    const datasetRouter = express.Router();

    datasetRouter.get("/search", controller.search);

    return datasetRouter;
}
