import * as fs from 'fs';
import * as path from 'path';
import { logger, type ILogger } from '../config/logger';
import { toPersistedReport } from '../reports/report-document';
import type { ReportDocument } from '../types/evaluation';

export interface IReportStoreFileSystem {
    writeFile(path: string, data: string, encoding: 'utf-8'): Promise<void>;
    mkdir(path: string, options: { recursive: true }): Promise<string | undefined>;
}

export interface IReportStore {
    saveJson(report: ReportDocument, outputPath: string): Promise<string>;
}

/**
 * Writes the report as JSON for later inspection, with 1-based candidate numbers.
 */
export class ReportStoreService implements IReportStore {
    constructor(
        private logger: ILogger,
        private fileSystem: IReportStoreFileSystem = fs.promises
    ) { }

    static create(): ReportStoreService {
        return new ReportStoreService(logger, fs.promises);
    }

    async saveJson(report: ReportDocument, outputPath: string): Promise<string> {
        await this.fileSystem.mkdir(path.dirname(outputPath), { recursive: true });
        await this.fileSystem.writeFile(outputPath, JSON.stringify(toPersistedReport(report), null, 2), 'utf-8');

        this.logger.info({
            outputPath,
            candidates: report.total_candidates
        }, 'JSON report saved');

        return outputPath;
    }
}
