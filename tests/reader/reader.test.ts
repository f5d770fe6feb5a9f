import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(), verbose: vi.fn() }),
}));

import * as Reader from '../../src/reader';
import { DEFAULT_SUPPORTED_EXTENSIONS } from '../../src/constants';

describe('Document Reader', () => {
    let dir: string;
    let reader: Reader.ReaderInstance;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsort-reader-'));
        reader = Reader.create({ supportedExtensions: DEFAULT_SUPPORTED_EXTENSIONS });
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('reads markdown and takes its heading as the title', async () => {
        const file = path.join(dir, 'weekly.md');
        const text = '# Weekly Plan\n\n会议时间：2024年3月15日\n';
        await fs.writeFile(file, text);

        const document = await reader.read(file);

        expect(document.name).toBe('weekly.md');
        expect(document.stem).toBe('weekly');
        expect(document.extension).toBe('.md');
        expect(document.content).toBe(text);
        expect(document.metadata).toEqual({ title: 'Weekly Plan' });
        expect(document.sizeBytes).toBe(Buffer.byteLength(text));
        expect(document.modificationTime).toBeInstanceOf(Date);
        expect(Object.isFrozen(document)).toBe(true);
    });

    it('lowercases the extension but keeps the stem', async () => {
        const file = path.join(dir, 'NOTES.TXT');
        await fs.writeFile(file, 'plain');

        const document = await reader.read(file);

        expect(document.extension).toBe('.txt');
        expect(document.stem).toBe('NOTES');
        expect(document.metadata).toEqual({});
    });

    it('flattens HTML and reads its title', async () => {
        const file = path.join(dir, 'review.html');
        await fs.writeFile(file, '<html><head><title> Q3 Review </title></head><body><p>Hello <a href="http://example.test">link</a></p><img src="a.png"></body></html>');

        const document = await reader.read(file);

        expect(document.metadata).toEqual({ title: 'Q3 Review' });
        expect(document.content).toContain('Hello link');
        expect(document.content).not.toContain('example.test');
    });

    it('accepts binary formats with empty content', async () => {
        const file = path.join(dir, 'scan.pdf');
        await fs.writeFile(file, Buffer.from([0x25, 0x50, 0x44, 0x46]));

        const document = await reader.read(file);

        expect(document.content).toBe('');
        expect(document.sizeBytes).toBe(4);
    });

    it('rejects unsupported types', async () => {
        await expect(reader.read(path.join(dir, 'tool.exe'))).rejects.toThrow('Unsupported file type: .exe');
        await expect(reader.read(path.join(dir, 'Makefile'))).rejects.toThrow('Unsupported file type: (none)');
    });

    it('wraps filesystem errors', async () => {
        const missing = path.join(dir, 'missing.txt');
        await expect(reader.read(missing)).rejects.toMatchObject({
            name: 'DocumentReadError',
            filePath: missing,
        });
    });

    it('refuses a directory', async () => {
        const folder = path.join(dir, 'folder.txt');
        await fs.mkdir(folder);
        await expect(reader.read(folder)).rejects.toThrow('Not a regular file');
    });

    it('isSupported checks the extension without case', () => {
        expect(reader.isSupported('/x/a.DOCX')).toBe(true);
        expect(reader.isSupported('/x/a.exe')).toBe(false);
    });

    it('markdownTitle finds the first level-one heading', () => {
        expect(Reader.markdownTitle('intro\n## Sub\n# Main Title ##\n')).toBe('Main Title');
        expect(Reader.markdownTitle('no heading')).toBeUndefined();
    });
});
