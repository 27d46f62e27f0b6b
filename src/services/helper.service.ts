import type { Response } from "express";
import { AppError } from "../models/errors.model";

class HelperService {
    static isNonBlankString(value: unknown): value is string {
        return typeof value === "string" && value.trim().length > 0;
    }

    /**
     * Query-string integer in [1, max]; absent means `fallback`, anything
     * unparseable or out of range means null.
     */
    static parseBoundedInt(value: unknown, fallback: number, max: number): number | null {
        if (value === undefined || value === "") return fallback;
        if (typeof value !== "string" || !/^\d+$/.test(value)) return null;
        const parsed = parseInt(value, 10);
        return parsed >= 1 && parsed <= max ? parsed : null;
    }

    static sendError(res: Response, error: unknown, context: string): Response {
        if (error instanceof AppError) {
            console.warn(
                JSON.stringify({
                    level: "warn",
                    event: context,
                    code: error.code,
                    message: error.message,
                    timestamp: new Date().toISOString()
                })
            );
            return res.status(error.statusCode).json({
                success: false,
                message: error.message,
                data: { code: error.code }
            });
        }

        const message = error instanceof Error ? error.message : "An Unknown Error Occured";
        console.error(`${context} failed:`, error);
        return res.status(500).json({
            success: false,
            message,
            data: null
        });
    }
}

export default HelperService;
