import type { Request, Response, NextFunction, RequestHandler } from "express";

class AccessMiddleware {
    /**
     * Guards admin routes with the `secret-key` header. With no secret
     * configured the routes stay closed.
     */
    static requireSecret(secret: string | undefined): RequestHandler {
        return (req: Request, res: Response, next: NextFunction) => {
            const secretKey = req.header("secret-key");

            if (!secretKey) {
                res.status(401).json({
                    success: false,
                    message: "missing Secret Key",
                    data: null
                });
                return;
            }
            if (!secret) {
                console.error("SECRET_ACCESS_KEY is not set in .env");
                res.status(500).json({
                    success: false,
                    message: "Internal server error",
                    data: null
                });
                return;
            }
            if (secretKey !== secret) {
                res.status(401).json({
                    success: false,
                    message: "Invalid secret Key",
                    data: null
                });
                return;
            }
            next();
        };
    }
}

export default AccessMiddleware;
