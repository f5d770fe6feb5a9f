import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

vi.mock('../src/logging', () => ({
    getLogger: () => ({ info: vi.fn(), debug: vi.fn(), warn: vi.fn(), error: vi.fn(), verbose: vi.fn() }),
}));

import { cliValues, configure, createProgram } from '../src/arguments';

describe('arguments', () => {
    let configDirectory: string;

    beforeEach(async () => {
        configDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'docsort-args-'));
    });

    afterEach(async () => {
        await fs.rm(configDirectory, { recursive: true, force: true });
    });

    it('maps only the options that were given', () => {
        expect(cliValues({})).toEqual({});
        expect(cliValues({ inbox: '/in', rules: 'r.yaml', dryRun: true })).toEqual({
            inboxDirectory: '/in',
            rulesFile: 'r.yaml',
            dryRun: true,
        });
    });

    it('parses flags with commander', () => {
        const program = createProgram();
        program.parse(['node', 'docsort', '--watch', '--base-url', 'http://localhost:1234/v1']);
        expect(program.opts()).toEqual({ watch: true, baseUrl: 'http://localhost:1234/v1' });
    });

    it('combines command line values with run options', async () => {
        const [config, secure, options] = await configure(
            ['node', 'docsort', '--inbox', '/in', '--archive', '/arc', '--config-directory', configDirectory, '--dry-run', '--yes'],
            {},
        );

        expect(config.inboxDirectory).toBe('/in');
        expect(config.archiveRoot).toBe('/arc');
        expect(config.configDirectory).toBe(configDirectory);
        expect(config.dryRun).toBe(true);
        expect(secure.apiKey).toBeUndefined();
        expect(options).toEqual({ watch: false, yes: true, checkConfig: false });
    });

    it('layers the config file under the environment', async () => {
        await fs.writeFile(path.join(configDirectory, 'config.yaml'), 'model: local-model\narchiveRoot: /file\n');

        const [config, secure] = await configure(
            ['node', 'docsort', '--config-directory', configDirectory],
            { DOCSORT_ARCHIVE_ROOT: '/env', DOCSORT_API_KEY: 'test-secret' },
        );

        expect(config.archiveRoot).toBe('/env');
        expect(config.model).toBe('local-model');
        expect(secure.apiKey).toBe('test-secret');
    });
});
