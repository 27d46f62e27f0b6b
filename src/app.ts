import express from "express";
import type { NextFunction, Request, Response } from "express";
import cors from "cors";
import { createRouter, type RouterDeps } from "./routes/index";

export function createApp(deps: RouterDeps) {
    const app = express();
    app.use(cors({ origin: "*" }));
    app.use(express.json({ limit: "1mb" }));
    app.use("/api", createRouter(deps));

    app.use((req: Request, res: Response) => {
        res.status(404).json({
            success: false,
            message: `Route not found: ${req.method} ${req.path}`,
            data: null
        });
    });

    // Body parser failures and anything a route let through
    app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
        const status = typeof error === "object" && error !== null && "status" in error && typeof error.status === "number"
            ? error.status
            : 500;
        console.error(
            JSON.stringify({
                level: "error",
                event: "UnhandledRequestError",
                path: req.originalUrl,
                method: req.method,
                status,
                message: error instanceof Error ? error.message : String(error),
                timestamp: new Date().toISOString()
            })
        );
        res.status(status).json({
            success: false,
            message: status < 500 ? "Invalid request body" : "Internal server error",
            data: null
        });
    });

    return app;
}
