/**
 * Pipeline Types
 */

import { DateSource } from '@/dates/types';
import { ClassificationStage } from '@/routing/types';
import { VersionFormat } from '@/types';

export type SubjectSource = 'oracle' | 'metadata' | 'filename' | 'fallback';

export interface ProcessingPlan {
    sourcePath: string;
    originalName: string;
    subject: string;
    subjectSource: SubjectSource;
    subjectConfidence: number;
    date: string;
    dateSource: DateSource;
    dateConfidence: number;
    version: string;
    filename: string;
    /** Relative to the archive root, "/"-joined. */
    targetFolder: string;
    targetPath: string;
    createFolder: boolean;
    reasoning: string;
    stage: ClassificationStage;
    /** Set when a file with the same name is already in the target folder. */
    warning?: string;
}

export type ProcessingResult =
    | { status: 'success'; plan: ProcessingPlan; targetPath: string; backupPath?: string; processedPath?: string }
    | { status: 'planned'; plan: ProcessingPlan }
    | { status: 'error'; sourcePath: string; error: Error };

export interface PipelineConfig {
    archiveRoot: string;
    processedDirectory?: string;
    structureFile: string;
    maintainStructureFile: boolean;
    dryRun: boolean;

    dateFormat: string;
    datePriority: readonly ('content' | 'creation' | 'modification' | 'current')[];
    timezone: string;

    versionFormat: VersionFormat;
    initialVersion: string;
    maxFilenameLength: number;
    fallbackSubject: string;
    supportedExtensions: readonly string[];
    similarityCheck: boolean;
}

export interface BatchSummary {
    total: number;
    success: number;
    failed: number;
    skipped: number;
    results: ProcessingResult[];
}
