import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(), verbose: vi.fn() }),
}));

import {
    ConfigError,
    environmentValues,
    mergeConfig,
    parseConfigFile,
    readConfigFile,
    secureValues,
} from '../../src/config';
import { DOCSORT_DEFAULTS } from '../../src/constants';

describe('configuration', () => {
    describe('mergeConfig', () => {
        it('starts from the defaults', () => {
            const config = mergeConfig();
            expect(config.archiveRoot).toBe(DOCSORT_DEFAULTS.archiveRoot);
            expect(config.model).toBe('gpt-4o-mini');
            expect(config.versionFormat).toBe('simple');
            expect(config.maxFilenameLength).toBe(200);
        });

        it('lets later layers win and skips undefined values', () => {
            const config = mergeConfig(
                { archiveRoot: '/file', model: 'local-model' },
                { archiveRoot: '/env' },
                { archiveRoot: '/cli', model: undefined },
            );
            expect(config.archiveRoot).toBe('/cli');
            expect(config.model).toBe('local-model');
        });

        it('normalizes extensions', () => {
            expect(mergeConfig({ supportedExtensions: ['TXT', '.Md'] }).supportedExtensions).toEqual(['.txt', '.md']);
        });

        it('rejects an unknown timezone', () => {
            expect(() => mergeConfig({ timezone: 'Mars/Base' })).toThrow(ConfigError);
            expect(() => mergeConfig({ timezone: 'Mars/Base' })).toThrow('Invalid configuration: timezone: Invalid timezone: Mars/Base');
        });

        it('rejects a malformed initial version', () => {
            expect(() => mergeConfig({ initialVersion: '1.0' })).toThrow('initialVersion: initialVersion must look like v1.0 or v1.0.0');
        });
    });

    describe('parseConfigFile', () => {
        it('reads a partial file', () => {
            expect(parseConfigFile('archiveRoot: /srv/archive\nversionFormat: semantic\n', 'config.yaml')).toEqual({
                archiveRoot: '/srv/archive',
                versionFormat: 'semantic',
            });
        });

        it('treats an empty file as no settings', () => {
            expect(parseConfigFile('', 'config.yaml')).toEqual({});
        });

        it('rejects unknown keys', () => {
            expect(() => parseConfigFile('colour: blue\n', 'config.yaml')).toThrow(/^Invalid configuration in config\.yaml: /);
        });

        it('reports broken YAML', () => {
            expect(() => parseConfigFile('archiveRoot: [', 'config.yaml')).toThrow(/^Unable to parse config\.yaml: /);
        });
    });

    describe('readConfigFile', () => {
        let dir: string;

        beforeEach(async () => {
            dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docsort-config-'));
        });

        afterEach(async () => {
            await fs.rm(dir, { recursive: true, force: true });
        });

        it('returns nothing when the file is absent', async () => {
            expect(await readConfigFile(dir)).toEqual({});
        });

        it('reads config.yaml from the directory', async () => {
            await fs.writeFile(path.join(dir, 'config.yaml'), 'similarityCheck: true\n');
            expect(await readConfigFile(dir)).toEqual({ similarityCheck: true });
        });
    });

    describe('environment', () => {
        it('maps the archive root', () => {
            expect(environmentValues({ DOCSORT_ARCHIVE_ROOT: '/env/archive' })).toEqual({ archiveRoot: '/env/archive' });
            expect(environmentValues({})).toEqual({});
        });

        it('prefers the program key over the generic one', () => {
            expect(secureValues({ DOCSORT_API_KEY: 'test-secret', OPENAI_API_KEY: 'other-secret' }).apiKey).toBe('test-secret');
            expect(secureValues({ OPENAI_API_KEY: 'other-secret' }).apiKey).toBe('other-secret');
            expect(secureValues({ OPENAI_API_KEY: '' }).apiKey).toBeUndefined();
        });
    });
});
