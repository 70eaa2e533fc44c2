import { config } from "dotenv";
import { loadAppConfig } from "./config/app-config";
import { logger } from "./config/logger";
import { SettingsStore } from "./config/settings-store";
import { createApp } from "./app";
import { EvaluationOrchestrator } from "./services/evaluation-orchestrator.service";
import { LLMClient } from "./services/llm-client.service";
import { PdfExtractorService } from "./services/pdf-extractor.service";
import { ReportRendererService } from "./services/report-renderer.service";
import { ReportStoreService } from "./services/report-store.service";
import { EvaluationRunner } from "./shell/evaluation-runner";

// Load environment variables
config();

function startServer() {
    try {
        const appConfig = loadAppConfig(process.env);
        const settings = SettingsStore.create(appConfig.settingsFile);

        const extractor = PdfExtractorService.create();
        const reportStore = ReportStoreService.create();
        const renderer = ReportRendererService.create(appConfig.logoPath);

        const runner = EvaluationRunner.create(
            async () => (await settings.getApiKey()) ?? appConfig.fallbackApiKey,
            (apiKey) => ({
                extractor,
                orchestrator: EvaluationOrchestrator.create(
                    extractor,
                    LLMClient.create(appConfig, apiKey),
                    appConfig.completionMaxRetries
                ),
                reportStore,
                renderer
            }),
            appConfig.reportDir
        );

        const app = createApp({ runner, settings, storageDir: appConfig.storageDir });

        app.listen(appConfig.port, () => {
            logger.info({
                port: appConfig.port,
                model: appConfig.completionModel,
                endpoint: appConfig.completionApiUrl,
                reportDir: appConfig.reportDir,
                settingsFile: appConfig.settingsFile
            }, `Server running at http://localhost:${appConfig.port}`);
        });
    } catch (error: unknown) {
        logger.error({ error: error instanceof Error ? error.message : 'Unknown error' }, 'Failed to start server');
        process.exit(1);
    }
}

startServer();
