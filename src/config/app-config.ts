import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/evaluation-errors';

const configSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    COMPLETION_API_URL: z.string().url().default('https://api.deepseek.com/v1'),
    COMPLETION_MODEL: z.string().min(1).default('deepseek-chat'),
    COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    COMPLETION_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
    COMPLETION_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(0),
    COMPLETION_API_KEY: z.string().optional(),
    STORAGE_DIR: z.string().min(1).default('./storage'),
    REPORT_DIR: z.string().min(1).default('./reports'),
    REPORT_LOGO_PATH: z.string().optional(),
    SETTINGS_FILE: z.string().optional()
});

/**
 * Application configuration, loaded once at startup and passed by reference.
 */
export interface AppConfig {
    readonly port: number;
    readonly completionApiUrl: string;
    readonly completionModel: string;
    readonly completionTimeoutMs: number;
    readonly completionMaxRetries: number;
    readonly completionRetryDelayMs: number;
    readonly fallbackApiKey?: string;
    readonly storageDir: string;
    readonly reportDir: string;
    readonly logoPath?: string;
    readonly settingsFile: string;
}

export function defaultSettingsFile(homeDir: string = os.homedir()): string {
    return path.join(homeDir, '.resume-match', 'settings.json');
}

// Empty strings in .env mean "not set"
function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string> {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            cleaned[key] = value;
        }
    }
    return cleaned;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = configSchema.safeParse(blankToUndefined(env));
    if (!parsed.success) {
        const details = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${details}`);
    }

    const values = parsed.data;
    return Object.freeze({
        port: values.PORT,
        completionApiUrl: values.COMPLETION_API_URL,
        completionModel: values.COMPLETION_MODEL,
        completionTimeoutMs: values.COMPLETION_TIMEOUT_MS,
        completionMaxRetries: values.COMPLETION_MAX_RETRIES,
        completionRetryDelayMs: values.COMPLETION_RETRY_DELAY_MS,
        fallbackApiKey: values.COMPLETION_API_KEY,
        storageDir: values.STORAGE_DIR,
        reportDir: values.REPORT_DIR,
        logoPath: values.REPORT_LOGO_PATH,
        settingsFile: values.SETTINGS_FILE ?? defaultSettingsFile()
    });
}
