/**
 * Naming Engine
 *
 * `{subject}[_{date}]_{version}{extension}`. Only the subject is ever
 * shortened to honour the length limit.
 */

import { DEFAULT_MAX_FILENAME_LENGTH, UNTITLED_SUBJECT } from '@/constants';
import { FilenameOptions } from './types';

const REPLACEMENTS: Record<string, string> = {
    '<': '《',
    '>': '》',
    ':': '：',
    '"': '＂',
    '|': '｜',
    '?': '？',
    '*': '＊',
    '\\': '＼',
    '/': '／',
};

// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/g;

const EMBEDDED_DATE = /\d{8}/;

// A leading dot would hide the file or folder from the archive scan.
const LEADING_DOTS = /^\.+/;

export const sanitizeSubject = (subject: string): string => {
    const replaced = Array.from(subject, (char) => REPLACEMENTS[char] ?? char)
        .join('')
        .replace(CONTROL_CHARACTERS, ' ')
        .trim()
        .replace(LEADING_DOTS, (dots) => '．'.repeat(dots.length));
    return replaced.length > 0 ? replaced : UNTITLED_SUBJECT;
};

export const hasEmbeddedDate = (subject: string): boolean => EMBEDDED_DATE.test(subject);

const codePointLength = (value: string): number => Array.from(value).length;

const normalizeExtension = (extension: string): string => {
    if (extension === '' || extension.startsWith('.')) {
        return extension;
    }
    return `.${extension}`;
};

export const buildFilename = (
    subject: string,
    date: string,
    version: string,
    extension: string,
    options: FilenameOptions = { maxLength: DEFAULT_MAX_FILENAME_LENGTH },
): string => {
    const sanitized = sanitizeSubject(subject);
    const includeDate = date !== '' && !hasEmbeddedDate(sanitized);
    const suffix = `${includeDate ? `_${date}` : ''}_${version}${normalizeExtension(extension)}`;

    const fullName = `${sanitized}${suffix}`;
    if (codePointLength(fullName) <= options.maxLength) {
        return fullName;
    }

    const keep = Math.max(1, options.maxLength - codePointLength(suffix));
    const characters = Array.from(sanitized);
    const truncated = characters.slice(0, keep).join('').trimEnd() || (characters[0] ?? UNTITLED_SUBJECT);
    return `${truncated}${suffix}`;
};
