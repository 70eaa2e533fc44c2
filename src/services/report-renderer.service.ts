import * as fs from 'fs';
import * as path from 'path';
import { PDFDocument, PDFFont, PDFImage, PDFPage, PageSizes, RGB, StandardFonts, rgb } from 'pdf-lib';
import { logger, type ILogger } from '../config/logger';
import { RenderError, errorMessage } from '../errors/evaluation-errors';
import { numberCandidates } from '../reports/report-document';
import type { NumberedEvaluation, ReportDocument, ReportHeader } from '../types/evaluation';

export interface IReportFileSystem {
    readFile(path: string): Promise<Buffer>;
    writeFile(path: string, data: Uint8Array): Promise<void>;
    mkdir(path: string, options: { recursive: true }): Promise<string | undefined>;
}

export interface IReportRenderer {
    render(report: ReportDocument, outputPath: string): Promise<string>;
}

export interface ReportRendererOptions {
    logoPath?: string;
}

export const REPORT_TITLE = 'CV Evaluation Report';
export const REPORT_BANNER = 'Candidate Match Report – Powered by a multi dimensional talent evaluation framework';

const INCH = 72;
const MARGIN = { left: 0.7 * INCH, right: 0.7 * INCH, top: 0.8 * INCH, bottom: 0.7 * INCH };
const LOGO_WIDTH = 0.8 * INCH;
const BRAND_BLUE = rgb(0, 4 / 255, 53 / 255);
const BLACK = rgb(0, 0, 0);

interface TextStyle {
    font: PDFFont;
    size: number;
    leading: number;
    color?: RGB;
    spaceBefore?: number;
    spaceAfter?: number;
}

/**
 * Greedy word wrap. Words wider than the line are split by character.
 */
export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
    const words = text.split(/\s+/).filter(word => word.length > 0);
    const lines: string[] = [];
    let current = '';

    for (const word of words) {
        const candidate = current ? `${current} ${word}` : word;
        if (font.widthOfTextAtSize(candidate, size) <= maxWidth) {
            current = candidate;
            continue;
        }

        if (current) {
            lines.push(current);
            current = '';
        }

        if (font.widthOfTextAtSize(word, size) <= maxWidth) {
            current = word;
            continue;
        }

        let piece = '';
        for (const char of word) {
            if (piece && font.widthOfTextAtSize(piece + char, size) > maxWidth) {
                lines.push(piece);
                piece = '';
            }
            piece += char;
        }
        current = piece;
    }

    if (current) {
        lines.push(current);
    }
    return lines;
}

/**
 * Replace characters the standard fonts cannot encode.
 */
export function toEncodableText(text: string, font: PDFFont): string {
    const supported = new Set(font.getCharacterSet());
    let result = '';
    for (const char of text.replace(/\t/g, ' ')) {
        const codePoint = char.codePointAt(0);
        if (char === '\n' || (codePoint !== undefined && supported.has(codePoint))) {
            result += char;
        } else {
            result += '?';
        }
    }
    return result;
}

/**
 * Top-to-bottom cursor over A4 pages, adding a page when the next block does not fit.
 */
class PageCursor {
    private page: PDFPage;
    private y: number;

    constructor(private doc: PDFDocument) {
        this.page = this.addPage();
        this.y = this.top;
    }

    get contentWidth(): number {
        return this.page.getWidth() - MARGIN.left - MARGIN.right;
    }

    private get top(): number {
        return this.page.getHeight() - MARGIN.top;
    }

    private addPage(): PDFPage {
        return this.doc.addPage(PageSizes.A4);
    }

    ensureSpace(height: number): void {
        if (this.y - height < MARGIN.bottom) {
            this.page = this.addPage();
            this.y = this.top;
        }
    }

    space(height: number): void {
        this.y -= height;
    }

    paragraph(text: string, style: TextStyle, indent: number = 0): void {
        this.space(style.spaceBefore ?? 0);
        const width = this.contentWidth - indent;

        for (const block of toEncodableText(text, style.font).split('\n')) {
            for (const line of wrapText(block, style.font, style.size, width)) {
                this.ensureSpace(style.leading);
                this.page.drawText(line, {
                    x: MARGIN.left + indent,
                    y: this.y - style.size,
                    size: style.size,
                    font: style.font,
                    color: style.color ?? BLACK
                });
                this.y -= style.leading;
            }
        }

        this.space(style.spaceAfter ?? 0);
    }

    labelled(label: string, value: string, labelFont: PDFFont, style: TextStyle): void {
        this.space(style.spaceBefore ?? 0);
        const labelText = toEncodableText(`${label}: `, labelFont);
        const labelWidth = labelFont.widthOfTextAtSize(labelText, style.size);
        const lines = wrapText(toEncodableText(value, style.font), style.font, style.size, this.contentWidth - labelWidth);

        this.ensureSpace(style.leading);
        this.page.drawText(labelText, {
            x: MARGIN.left,
            y: this.y - style.size,
            size: style.size,
            font: labelFont,
            color: style.color ?? BLACK
        });

        if (lines.length === 0) {
            this.y -= style.leading;
        }
        for (const line of lines) {
            this.ensureSpace(style.leading);
            this.page.drawText(line, {
                x: MARGIN.left + labelWidth,
                y: this.y - style.size,
                size: style.size,
                font: style.font,
                color: style.color ?? BLACK
            });
            this.y -= style.leading;
        }

        this.space(style.spaceAfter ?? 0);
    }

    image(image: PDFImage, width: number): void {
        const height = width * (image.height / image.width);
        this.ensureSpace(height);
        this.page.drawImage(image, {
            x: (this.page.getWidth() - width) / 2,
            y: this.y - height,
            width,
            height
        });
        this.y -= height;
    }
}

/**
 * Report Renderer Service
 *
 * Lays the report document out as a paginated A4 PDF with pdf-lib.
 * Candidate numbers are assigned on a copy; the document itself is not touched.
 */
export class ReportRendererService implements IReportRenderer {
    constructor(
        private logger: ILogger,
        private options: ReportRendererOptions = {},
        private fileSystem: IReportFileSystem = fs.promises
    ) { }

    /**
     * Factory method for production use
     */
    static create(logoPath?: string): ReportRendererService {
        return new ReportRendererService(logger, { logoPath }, fs.promises);
    }

    async render(report: ReportDocument, outputPath: string): Promise<string> {
        this.logger.info({ outputPath, candidates: report.total_candidates }, 'Rendering PDF report');

        try {
            const bytes = await this.renderToBytes(report);
            await this.fileSystem.mkdir(path.dirname(outputPath), { recursive: true });
            await this.fileSystem.writeFile(outputPath, bytes);
        } catch (error: unknown) {
            this.logger.error({ outputPath, error: errorMessage(error) }, 'PDF report rendering failed');
            throw new RenderError(`Failed to render report: ${errorMessage(error)}`, outputPath, { cause: error });
        }

        this.logger.info({ outputPath }, 'PDF report generated');
        return outputPath;
    }

    async renderToBytes(report: ReportDocument): Promise<Uint8Array> {
        const doc = await PDFDocument.create();
        doc.setTitle(REPORT_TITLE);
        doc.setSubject(report.report_header.role);

        const regular = await doc.embedFont(StandardFonts.Helvetica);
        const bold = await doc.embedFont(StandardFonts.HelveticaBold);
        const cursor = new PageCursor(doc);

        const body: TextStyle = { font: regular, size: 11, leading: 14, spaceAfter: 3 };
        const subHeading: TextStyle = { font: bold, size: 12, leading: 15, spaceBefore: 6, spaceAfter: 8 };
        const heading: TextStyle = { font: bold, size: 16, leading: 19, spaceBefore: 16, spaceAfter: 12 };

        const logo = await this.loadLogo(doc);
        if (logo) {
            cursor.image(logo, LOGO_WIDTH);
        }
        cursor.space(0.05 * INCH);

        cursor.paragraph(REPORT_BANNER, { font: bold, size: 15, leading: 18, color: BRAND_BLUE, spaceAfter: 12 });
        cursor.space(0.15 * INCH);

        this.drawReportInfo(cursor, report.report_header, bold, body);
        cursor.space(0.15 * INCH);

        cursor.labelled('Assessment Method', report.report_header.assessment_method, bold,
            { ...body, spaceBefore: 6, spaceAfter: 14 });

        const candidates = numberCandidates(report.candidates);
        candidates.forEach((candidate, index) => {
            this.drawCandidate(cursor, candidate, { body, subHeading, heading, bold });
            if (index < candidates.length - 1) {
                cursor.space(0.3 * INCH);
            }
        });

        if (report.overall_summary) {
            cursor.paragraph('Overall Comparative Insight', { ...heading, spaceBefore: 18 });
            cursor.paragraph(report.overall_summary, { ...body, spaceAfter: 12 });
        }

        return doc.save();
    }

    private drawReportInfo(cursor: PageCursor, header: ReportHeader, bold: PDFFont, body: TextStyle): void {
        const rows: Array<[string, string]> = [
            ['Role', header.role],
            ['Department', header.department],
            ['Company', header.company],
            ['Location', header.location],
            ['Work Mode', header.work_mode],
            ['Report Date', header.report_date]
        ];
        for (const [label, value] of rows) {
            cursor.labelled(label, value, bold, body);
        }
    }

    private drawCandidate(
        cursor: PageCursor,
        candidate: NumberedEvaluation,
        styles: { body: TextStyle; subHeading: TextStyle; heading: TextStyle; bold: PDFFont }
    ): void {
        // Keep the heading with at least the name and score lines
        cursor.ensureSpace(styles.heading.leading + (styles.heading.spaceBefore ?? 0) + 2 * styles.body.leading);
        cursor.paragraph(`Candidate ${candidate.candidate_number}`, styles.heading);
        cursor.labelled('Candidate Name', candidate.candidate_name, styles.bold, styles.body);
        cursor.labelled('Match Score', `${candidate.match_score}/100`, styles.bold, styles.body);
        cursor.space(0.15 * INCH);

        cursor.paragraph('Rating Summary', { ...styles.subHeading, spaceBefore: 4 });
        cursor.paragraph(candidate.rating_summary, { ...styles.body, spaceAfter: 12 });

        cursor.paragraph('Strengths', styles.subHeading);
        for (const strength of candidate.strengths) {
            cursor.paragraph(`• ${strength}`, styles.body);
        }
        cursor.space(0.08 * INCH);

        cursor.paragraph('Potential Gaps', styles.subHeading);
        for (const gap of candidate.potential_gaps) {
            cursor.paragraph(`• ${gap}`, styles.body);
        }
    }

    private async loadLogo(doc: PDFDocument): Promise<PDFImage | undefined> {
        const logoPath = this.options.logoPath;
        if (!logoPath) {
            return undefined;
        }

        try {
            const bytes = await this.fileSystem.readFile(logoPath);
            const extension = path.extname(logoPath).toLowerCase();
            return extension === '.jpg' || extension === '.jpeg'
                ? await doc.embedJpg(bytes)
                : await doc.embedPng(bytes);
        } catch (error: unknown) {
            this.logger.warn({ logoPath, error: errorMessage(error) }, 'Could not load report logo');
            return undefined;
        }
    }
}
