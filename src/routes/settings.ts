import { Router, type Request, type Response } from "express";
import { z } from "zod";
import { logger } from "../config/logger";
import type { ISettingsStore } from "../config/settings-store";

const settingsSchema = z.object({
    apiKey: z.string()
});

/**
 * GET /settings  whether a completion API key is stored (never the key itself)
 * PUT /settings  store the key; an empty string clears it
 */
export function settingsRoutes(settings: ISettingsStore): Router {
    const router = Router();

    router.get('/', async (req: Request, res: Response) => {
        try {
            const apiKey = await settings.getApiKey();
            res.json({ hasApiKey: Boolean(apiKey) });
        } catch (error: unknown) {
            logger.error({ error: error instanceof Error ? error.message : 'Unknown error' }, 'Settings read failed');
            res.status(500).json({ error: 'Settings read failed' });
        }
    });

    router.put('/', async (req: Request, res: Response) => {
        try {
            const { apiKey } = settingsSchema.parse(req.body);
            await settings.setApiKey(apiKey);
            res.json({ hasApiKey: apiKey.trim().length > 0 });
        } catch (error: unknown) {
            if (error instanceof z.ZodError) {
                return res.status(400).json({
                    error: 'Validation failed',
                    details: error.errors
                });
            }

            logger.error({ error: error instanceof Error ? error.message : 'Unknown error' }, 'Settings update failed');
            res.status(500).json({
                error: 'Settings update failed',
                message: error instanceof Error ? error.message : 'Unknown error'
            });
        }
    });

    return router;
}
