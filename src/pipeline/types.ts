/**
 * Pipeline Types
 */

import type { FfmpegLogLevel } from '@/media/command';
import type { FileInfo } from '@/media/file-info';

export type RunMode = 'default' | 'generate-config' | 'use-config';

export interface PipelineConfig {
    directory: string;
    pattern: string;
    // Deliverable filename, relative to directory
    output: string;

    // Default mode only: start of the first file, seconds cut off the last
    from?: number;
    trimEnd?: number;

    keepAllFiles: boolean;
    renameProcessed: boolean;

    ffmpegPath: string;
    ffprobePath?: string;
    ffmpegLogLevel: FfmpegLogLevel;
}

export interface PlannedFile {
    info: FileInfo;
    trimEndSeconds?: number;
}

export interface RunResult {
    mode: RunMode;
    inputs: string[];
    deliverable?: string;
    configPath?: string;
    // Intermediates and inputs deleted by cleanup
    removed: string[];
    // Inputs renamed with the processed_ prefix
    renamed: string[];
}
