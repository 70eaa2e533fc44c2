import express, { type Express, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { logger } from "./config/logger";
import type { ISettingsStore } from "./config/settings-store";
import { evaluateRoutes } from "./routes/evaluate";
import { resultRoutes } from "./routes/result";
import { settingsRoutes } from "./routes/settings";
import { UploadRejectedError, uploadRoutes } from "./routes/upload";
import { EvaluationRunner } from "./shell/evaluation-runner";

export interface AppDependencies {
    runner: EvaluationRunner;
    settings: ISettingsStore;
    storageDir: string;
}

export function createApp({ runner, settings, storageDir }: AppDependencies): Express {
    const app = express();

    // Middleware
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use("/upload", uploadRoutes(storageDir));
    app.use("/evaluate", evaluateRoutes(runner, storageDir));
    app.use("/result", resultRoutes(runner));
    app.use("/settings", settingsRoutes(settings));

    // Health check
    app.get("/health", (req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Root route
    app.get("/", (req: Request, res: Response) => {
        res.json({
            message: "Résumé Match Evaluator API",
            version: "1.0.0",
            description: "Scores résumés against a role with an LLM and renders a ranked PDF report",
            endpoints: {
                "Files": {
                    "POST /upload": "Upload résumé PDFs and an optional job description"
                },
                "Evaluation": {
                    "POST /evaluate": "Start an evaluation run (async)",
                    "DELETE /evaluate/:id": "Cancel a run between candidates",
                    "GET /result/:id": "Run status and report",
                    "GET /result/:id/report": "Download the PDF report"
                },
                "Settings": {
                    "GET /settings": "Whether an API key is stored",
                    "PUT /settings": "Store or clear the API key"
                },
                "System": {
                    "GET /health": "Health check",
                    "GET /": "API information"
                }
            }
        });
    });

    // Upload rejections and anything a route did not handle
    app.use((error: Error, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            return next(error);
        }

        const status = error instanceof multer.MulterError || error instanceof UploadRejectedError ? 400 : 500;
        logger.error({ path: req.path, status, error: error.message }, 'Request failed');
        res.status(status).json({ error: error.message });
    });

    return app;
}
