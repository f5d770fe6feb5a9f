/**
 * Document Reader
 *
 * Turns a file into a NormalizedDocument. Plain-text formats are read as
 * UTF-8 and HTML is flattened to text; any other supported extension is
 * accepted with empty content so the filename and timestamps still drive
 * naming.
 */

import path from 'node:path';
import { convert } from 'html-to-text';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import { DEFAULT_CHARACTER_ENCODING, HTML_EXTENSIONS, TEXT_EXTENSIONS } from '@/constants';
import { NormalizedDocument } from '@/types';

export class DocumentReadError extends Error {
    constructor(message: string, public readonly filePath: string) {
        super(message);
        this.name = 'DocumentReadError';
    }
}

export interface ReaderConfig {
    /** Lower-case extensions with leading dot. */
    supportedExtensions: readonly string[];
}

export interface ReaderInstance {
    read(filePath: string): Promise<NormalizedDocument>;
    isSupported(filePath: string): boolean;
}

const HTML_TITLE = /<title[^>]*>([\s\S]*?)<\/title>/i;
const MARKDOWN_TITLE = /^#\s+(.+?)\s*#*\s*$/m;

export const htmlToText = (html: string): { text: string; title?: string } => {
    const title = HTML_TITLE.exec(html)?.[1]?.trim();
    const text = convert(html, {
        wordwrap: false,
        selectors: [
            { selector: 'a', options: { ignoreHref: true } },
            { selector: 'img', format: 'skip' },
        ],
    });
    return { text, title: title || undefined };
};

export const markdownTitle = (markdown: string): string | undefined =>
    MARKDOWN_TITLE.exec(markdown)?.[1]?.trim() || undefined;

const timestamp = (milliseconds: number): Date | undefined =>
    milliseconds > 0 ? new Date(milliseconds) : undefined;

export const create = (config: ReaderConfig): ReaderInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const supported = new Set(config.supportedExtensions.map((extension) => extension.toLowerCase()));

    const isSupported = (filePath: string): boolean => supported.has(path.extname(filePath).toLowerCase());

    const readContent = async (filePath: string, extension: string): Promise<{ content: string; metadata: Record<string, string> }> => {
        if (TEXT_EXTENSIONS.includes(extension)) {
            const content = await storage.readFile(filePath, DEFAULT_CHARACTER_ENCODING);
            const title = extension === '.md' || extension === '.markdown' ? markdownTitle(content) : undefined;
            return { content, metadata: title ? { title } : {} };
        }
        if (HTML_EXTENSIONS.includes(extension)) {
            const html = await storage.readFile(filePath, DEFAULT_CHARACTER_ENCODING);
            const { text, title } = htmlToText(html);
            return { content: text, metadata: title ? { title } : {} };
        }
        logger.debug('No text extraction for %s files; using file metadata only', extension);
        return { content: '', metadata: {} };
    };

    const read = async (filePath: string): Promise<NormalizedDocument> => {
        const extension = path.extname(filePath).toLowerCase();
        if (!supported.has(extension)) {
            throw new DocumentReadError(`Unsupported file type: ${extension || '(none)'}`, filePath);
        }

        try {
            const stats = await storage.stat(filePath);
            if (!stats.isFile()) {
                throw new DocumentReadError('Not a regular file', filePath);
            }
            const { content, metadata } = await readContent(filePath, extension);
            const name = path.basename(filePath);

            return Object.freeze({
                path: filePath,
                name,
                stem: path.basename(filePath, path.extname(filePath)),
                extension,
                sizeBytes: stats.size,
                creationTime: timestamp(stats.birthtimeMs),
                modificationTime: timestamp(stats.mtimeMs),
                content,
                metadata: Object.freeze(metadata),
            });
        } catch (error: unknown) {
            if (error instanceof DocumentReadError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new DocumentReadError(`Unable to read ${filePath}: ${message}`, filePath);
        }
    };

    return {
        read,
        isSupported,
    };
};
