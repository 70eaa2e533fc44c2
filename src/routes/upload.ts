import { Router, type Request, type Response } from "express";
import multer from "multer";
import path from "path";
import fs from "fs";
import { logger } from "../config/logger";
import { deriveCandidateName } from "../utils/candidate-source.util";

const MAX_RESUMES = 50;

export class UploadRejectedError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UploadRejectedError';
    }
}

/**
 * Each upload gets its own directory so the original file name, which the
 * candidate name is derived from, can be kept as is.
 */
function createUpload(storageDir: string) {
    const storage = multer.diskStorage({
        destination: (req, file, cb) => {
            const uniqueSuffix = Date.now() + '-' + Math.round(Math.random() * 1E9);
            const directory = path.join(storageDir, uniqueSuffix);
            fs.mkdir(directory, { recursive: true }, (error) => cb(error, directory));
        },
        filename: (req, file, cb) => {
            cb(null, path.basename(file.originalname));
        }
    });

    return multer({
        storage: storage,
        limits: {
            fileSize: 10 * 1024 * 1024, // 10MB limit
        },
        fileFilter: (req, file, cb) => {
            if (file.mimetype === 'application/pdf') {
                cb(null, true);
            } else if (file.fieldname === 'job_description' && file.mimetype.startsWith('text/')) {
                cb(null, true);
            } else {
                cb(new UploadRejectedError('Only PDF résumés and PDF or text job descriptions are allowed'));
            }
        }
    });
}

/**
 * POST /upload
 *
 * Upload résumé PDFs and an optional job description file.
 * Returns stored paths for use in evaluation requests.
 */
export function uploadRoutes(storageDir: string): Router {
    const router = Router();
    const upload = createUpload(storageDir);

    router.post('/', upload.fields([
        { name: 'resumes', maxCount: MAX_RESUMES },
        { name: 'job_description', maxCount: 1 }
    ]), (req: Request, res: Response) => {
        const files: Record<string, Express.Multer.File[]> = req.files && !Array.isArray(req.files) ? req.files : {};
        const resumes = files.resumes ?? [];

        if (resumes.length === 0) {
            return res.status(400).json({
                error: 'Please upload at least one resume'
            });
        }

        const jobDescription = files.job_description?.[0];

        logger.info({
            resumes: resumes.length,
            jobDescription: Boolean(jobDescription),
            totalBytes: resumes.reduce((sum, file) => sum + file.size, 0)
        }, 'Files uploaded successfully');

        res.json({
            resumeFiles: resumes.map(file => ({
                path: file.path,
                candidateName: deriveCandidateName(file.originalname)
            })),
            jobDescriptionFile: jobDescription?.path
        });
    });

    return router;
}
