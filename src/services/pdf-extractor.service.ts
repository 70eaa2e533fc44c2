import * as fs from 'fs';
import pdf from 'pdf-parse';
import { logger, type ILogger } from '../config/logger';
import { ExtractionError, errorMessage } from '../errors/evaluation-errors';
import { type Result, failure, success } from '../types/result';

// Interfaces for better testability
export interface IFileSystem {
    readFileSync(path: string): Buffer;
}

export interface IPDFParser {
    (buffer: Buffer): Promise<{ text: string; numpages?: number }>;
}

export interface IPdfExtractor {
    extract(filePath: string): Promise<Result<string, ExtractionError>>;
}

/**
 * PDF Extractor Service
 *
 * Pulls the text of every page of a résumé, in page order. Never throws:
 * unreadable files, parser failures and empty documents come back as an
 * ExtractionError so the caller can skip the candidate.
 */
export class PdfExtractorService implements IPdfExtractor {
    constructor(
        private logger: ILogger,
        private fileSystem: IFileSystem = fs,
        private pdfParser: IPDFParser = pdf
    ) { }

    /**
     * Factory method for production use
     */
    static create(): PdfExtractorService {
        return new PdfExtractorService(logger, fs, pdf);
    }

    async extract(filePath: string): Promise<Result<string, ExtractionError>> {
        let buffer: Buffer;
        try {
            buffer = this.fileSystem.readFileSync(filePath);
        } catch (error: unknown) {
            return this.fail(filePath, `Could not read ${filePath}: ${errorMessage(error)}`, error);
        }

        let text: string;
        try {
            const pdfData = await this.pdfParser(buffer);
            text = pdfData.text;

            this.logger.debug({
                filePath,
                pages: pdfData.numpages
            }, 'PDF parsed');
        } catch (error: unknown) {
            return this.fail(filePath, `PDF parsing failed for ${filePath}: ${errorMessage(error)}`, error);
        }

        if (!text || text.trim().length === 0) {
            return this.fail(filePath, `PDF contains no extractable text: ${filePath}`);
        }

        this.logger.info({
            filePath,
            characters: text.length
        }, 'Extracted résumé text');

        return success(text);
    }

    private fail(filePath: string, message: string, cause?: unknown): Result<string, ExtractionError> {
        this.logger.warn({ filePath, error: message }, 'Text extraction failed');
        return failure(new ExtractionError(message, filePath, cause === undefined ? undefined : { cause }));
    }
}
