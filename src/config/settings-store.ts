import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { logger, type ILogger } from './logger';
import { errorMessage } from '../errors/evaluation-errors';

const settingsSchema = z.object({
    completion_api_key: z.string().optional()
}).passthrough();

export type UserSettings = z.infer<typeof settingsSchema>;

export interface ISettingsFileSystem {
    readFile(path: string, encoding: 'utf-8'): Promise<string>;
    writeFile(path: string, data: string, encoding: 'utf-8'): Promise<void>;
    mkdir(path: string, options: { recursive: true }): Promise<string | undefined>;
}

export interface ISettingsStore {
    load(): Promise<UserSettings>;
    getApiKey(): Promise<string | undefined>;
    setApiKey(apiKey: string): Promise<void>;
}

/**
 * Settings Store
 *
 * User-scoped JSON settings file holding the completion API key. A missing or
 * unreadable file reads as empty settings; write failures are thrown.
 */
export class SettingsStore implements ISettingsStore {
    constructor(
        private filePath: string,
        private logger: ILogger,
        private fileSystem: ISettingsFileSystem = fs.promises
    ) { }

    static create(filePath: string): SettingsStore {
        return new SettingsStore(filePath, logger, fs.promises);
    }

    async load(): Promise<UserSettings> {
        let raw: string;
        try {
            raw = await this.fileSystem.readFile(this.filePath, 'utf-8');
        } catch (error: unknown) {
            this.logger.debug({ filePath: this.filePath, error: errorMessage(error) }, 'No settings file, using defaults');
            return {};
        }

        try {
            const parsed = settingsSchema.safeParse(JSON.parse(raw));
            if (parsed.success) {
                return parsed.data;
            }
            this.logger.warn({ filePath: this.filePath, issues: parsed.error.issues.length }, 'Settings file has an unexpected shape, ignoring it');
        } catch (error: unknown) {
            this.logger.warn({ filePath: this.filePath, error: errorMessage(error) }, 'Settings file is not valid JSON, ignoring it');
        }
        return {};
    }

    async save(settings: UserSettings): Promise<void> {
        await this.fileSystem.mkdir(path.dirname(this.filePath), { recursive: true });
        await this.fileSystem.writeFile(this.filePath, JSON.stringify(settings, null, 2), 'utf-8');
        this.logger.info({ filePath: this.filePath }, 'Settings saved');
    }

    async getApiKey(): Promise<string | undefined> {
        const settings = await this.load();
        const key = settings.completion_api_key?.trim();
        return key ? key : undefined;
    }

    /**
     * An empty key clears the stored credential.
     */
    async setApiKey(apiKey: string): Promise<void> {
        const settings = await this.load();
        const trimmed = apiKey.trim();
        const { completion_api_key: _previous, ...rest } = settings;
        await this.save(trimmed ? { ...rest, completion_api_key: trimmed } : rest);
    }
}
