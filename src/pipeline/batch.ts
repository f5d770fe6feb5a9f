import path from 'node:path';
import { glob } from 'glob';
import * as Logging from '@/logging';
import { SKIPPED_FILE_NAMES } from '@/constants';
import { BatchSummary, ProcessingResult } from './types';

export interface InboxListing {
    files: string[];
    skipped: string[];
}

/** Files directly in the inbox, sorted; unsupported ones and README.md are skipped. */
export const listInbox = async (
    inboxDirectory: string,
    isSupported: (filePath: string) => boolean,
): Promise<InboxListing> => {
    const entries = await glob('*', { cwd: inboxDirectory, nodir: true, dot: false });
    const files: string[] = [];
    const skipped: string[] = [];

    for (const entry of entries.sort()) {
        const filePath = path.join(inboxDirectory, entry);
        if (SKIPPED_FILE_NAMES.includes(entry) || !isSupported(filePath)) {
            skipped.push(filePath);
        } else {
            files.push(filePath);
        }
    }
    return { files, skipped };
};

export const runBatch = async (
    listing: InboxListing,
    process: (filePath: string) => Promise<ProcessingResult>,
): Promise<BatchSummary> => {
    const logger = Logging.getLogger();
    const results: ProcessingResult[] = [];

    for (const [index, filePath] of listing.files.entries()) {
        logger.info('[%d/%d] %s', index + 1, listing.files.length, path.basename(filePath));
        results.push(await process(filePath));
    }

    const failed = results.filter((result) => result.status === 'error').length;
    return {
        total: listing.files.length + listing.skipped.length,
        success: results.length - failed,
        failed,
        skipped: listing.skipped.length,
        results,
    };
};
