/**
 * Locate Phase
 *
 * Reads a document from the inbox. Input errors surface as
 * DocumentReadError for the caller to report per document.
 */

import * as Logging from '@/logging';
import * as Reader from '@/reader';
import { NormalizedDocument } from '@/types';

export interface Instance {
    locate(filePath: string): Promise<NormalizedDocument>;
}

export const create = (reader: Reader.ReaderInstance): Instance => {
    const logger = Logging.getLogger();

    const locate = async (filePath: string): Promise<NormalizedDocument> => {
        const document = await reader.read(filePath);
        logger.debug('Read %s (%d bytes, %d characters of text)', document.name, document.sizeBytes, document.content.length);
        return document;
    };

    return { locate };
};
