import path from 'node:path';
import * as yaml from 'js-yaml';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import { DEFAULT_CONFIG_FILE_NAME, DOCSORT_DEFAULTS } from '@/constants';
import { Config, ConfigSchema, FileConfig, FileConfigSchema, SecureConfig } from './schema';

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

const describeIssues = (issues: { path: (string | number)[]; message: string }[]): string =>
    issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

export const configFilePath = (configDirectory: string): string =>
    path.join(configDirectory, DEFAULT_CONFIG_FILE_NAME);

export const parseConfigFile = (content: string, source: string): FileConfig => {
    let raw: unknown;
    try {
        raw = yaml.load(content) ?? {};
    } catch (error: unknown) {
        throw new ConfigError(`Unable to parse ${source}: ${error instanceof Error ? error.message : String(error)}`);
    }
    const result = FileConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration in ${source}: ${describeIssues(result.error.issues)}`);
    }
    return result.data;
};

/** Values from `<configDirectory>/config.yaml`; empty when the file is absent. */
export const readConfigFile = async (configDirectory: string): Promise<FileConfig> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const file = configFilePath(configDirectory);

    if (!await storage.exists(file)) {
        logger.debug('No configuration file at %s', file);
        return {};
    }
    logger.debug('Reading configuration from %s', file);
    return parseConfigFile(await storage.readFile(file, 'utf-8'), file);
};

export const environmentValues = (env: NodeJS.ProcessEnv): Partial<Config> => {
    const values: Partial<Config> = {};
    if (env.DOCSORT_ARCHIVE_ROOT) values.archiveRoot = env.DOCSORT_ARCHIVE_ROOT;
    return values;
};

export const secureValues = (env: NodeJS.ProcessEnv): SecureConfig => ({
    apiKey: env.DOCSORT_API_KEY || env.OPENAI_API_KEY || undefined,
});

/** Defaults, then file, then environment, then command line. */
export const mergeConfig = (...layers: Partial<Config>[]): Config => {
    const merged: Record<string, unknown> = { ...DOCSORT_DEFAULTS };
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            if (value !== undefined) {
                merged[key] = value;
            }
        }
    }
    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration: ${describeIssues(result.error.issues)}`);
    }
    return result.data;
};
