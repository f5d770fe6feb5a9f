/**
 * Version Resolver
 *
 * Versions live in archived filenames as `v{major}.{minor}[.{patch}]`. The
 * next version for a subject is one step above the highest tag among the
 * similar files in its target folder.
 */

import path from 'node:path';
import { VersionFormat } from '@/types';
import { VersionOptions, VersionTag } from './types';

const VERSION_PATTERN = /v(\d+)\.(\d+)(?:\.(\d+))?/gi;

const KEYWORD_PATTERN = /[\u4e00-\u9fff]+|[a-zA-Z]+/g;

const STOP_WORDS = new Set(['的', '是', '在', '和', '与', '及', '或', '等', '了', '中', '对', '于']);

/** The last version tag found in `text`, or null. */
export const parseVersion = (text: string): VersionTag | null => {
    let last: RegExpExecArray | null = null;
    const regex = new RegExp(VERSION_PATTERN.source, VERSION_PATTERN.flags);
    let match: RegExpExecArray | null;
    while ((match = regex.exec(text)) !== null) {
        last = match;
    }
    if (!last) {
        return null;
    }
    const tag: VersionTag = { major: Number(last[1]), minor: Number(last[2]) };
    if (last[3] !== undefined) {
        tag.patch = Number(last[3]);
    }
    return tag;
};

/**
 * Stem of an archived filename. An all-digit "extension" is part of a
 * patch version, not a file type.
 */
export const fileStem = (filename: string): string => {
    const extension = path.extname(filename);
    if (extension === '' || /^\.\d+$/.test(extension)) {
        return filename;
    }
    return filename.slice(0, -extension.length);
};

export const parseFilenameVersion = (filename: string): VersionTag | null => parseVersion(fileStem(filename));

export const formatVersion = (tag: VersionTag): string =>
    tag.patch === undefined ? `v${tag.major}.${tag.minor}` : `v${tag.major}.${tag.minor}.${tag.patch}`;

export const incrementVersion = (tag: VersionTag, format: VersionFormat): VersionTag =>
    format === 'semantic'
        ? { major: tag.major, minor: tag.minor, patch: (tag.patch ?? 0) + 1 }
        : { major: tag.major, minor: tag.minor + 1 };

export const compareVersions = (a: VersionTag, b: VersionTag): number =>
    (a.major - b.major) || (a.minor - b.minor) || ((a.patch ?? 0) - (b.patch ?? 0));

export const initialVersionTag = (options: VersionOptions): VersionTag => {
    const parsed = parseVersion(options.initialVersion);
    if (!parsed) {
        throw new Error(`Invalid initial version: ${options.initialVersion}`);
    }
    return parsed;
};

export const extractKeywords = (subject: string): string[] => {
    const keywords: string[] = [];
    for (const word of subject.match(KEYWORD_PATTERN) ?? []) {
        const normalized = word.toLowerCase();
        if (normalized.length > 1 && !STOP_WORDS.has(normalized) && !keywords.includes(normalized)) {
            keywords.push(normalized);
        }
    }
    return keywords;
};

/** Files whose stem mentions one of the subject's keywords. */
export const findSimilarFiles = (subject: string, archiveFiles: readonly string[]): string[] => {
    const keywords = extractKeywords(subject);
    if (keywords.length === 0) {
        return [];
    }
    return archiveFiles.filter((file) => {
        const stem = fileStem(path.basename(file)).toLowerCase();
        return keywords.some((keyword) => stem.includes(keyword));
    });
};

/**
 * Next version given the files already judged similar. Untagged files
 * count as the initial version.
 */
export const nextVersion = (similarFiles: readonly string[], options: VersionOptions): VersionTag => {
    const initial = initialVersionTag(options);
    if (similarFiles.length === 0) {
        return initial;
    }

    let highest: VersionTag | null = null;
    for (const file of similarFiles) {
        const tag = parseFilenameVersion(path.basename(file)) ?? initial;
        if (highest === null || compareVersions(tag, highest) > 0) {
            highest = tag;
        }
    }

    return incrementVersion(highest ?? initial, options.format);
};

export const determineVersion = (subject: string, archiveFiles: readonly string[], options: VersionOptions): VersionTag =>
    nextVersion(findSimilarFiles(subject, archiveFiles), options);
