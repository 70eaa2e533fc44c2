import * as path from 'path';
import type { CandidateSource } from '../types/evaluation';

/**
 * Display name from the file name alone: extension dropped, `_` and `-` read as spaces.
 */
export function deriveCandidateName(filePath: string): string {
    return path.parse(filePath).name.replace(/_/g, ' ').replace(/-/g, ' ');
}

export function toCandidateSource(filePath: string): CandidateSource {
    return {
        file_path: filePath,
        display_name: deriveCandidateName(filePath)
    };
}
