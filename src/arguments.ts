import { Command } from 'commander';
import { DOCSORT_DEFAULTS, PROGRAM_NAME, VERSION } from '@/constants';
import { getLogger } from '@/logging';
import * as Configuration from '@/config';

export interface Args {
    inbox?: string;
    archive?: string;
    configDirectory?: string;
    rules?: string;
    processedDirectory?: string;
    model?: string;
    baseUrl?: string;
    watch?: boolean;
    yes?: boolean;
    dryRun?: boolean;
    verbose?: boolean;
    debug?: boolean;
    checkConfig?: boolean;
}

export interface RunOptions {
    watch: boolean;
    yes: boolean;
    checkConfig: boolean;
}

export const createProgram = (): Command => new Command()
    .name(PROGRAM_NAME)
    .summary('File inbox documents into an archive')
    .description('Reads documents from an inbox, picks a subject, date, version and archive folder for each, and moves them into place')
    .option('--inbox <inbox>', 'inbox directory to process')
    .option('--archive <archive>', 'archive root directory')
    .option('--config-directory <configDirectory>', 'directory holding config.yaml')
    .option('--rules <rules>', 'classification rules file (YAML)')
    .option('--processed-directory <processedDirectory>', 'move originals here and copy into the archive')
    .option('--model <model>', 'model used for subject extraction and folder suggestions')
    .option('--base-url <baseUrl>', 'base URL of an OpenAI-compatible API')
    .option('--watch', 'keep running and process files as they arrive')
    .option('--yes', 'do not ask for confirmation before processing')
    .option('--dry-run', 'show what would happen without moving files')
    .option('--verbose', 'enable verbose logging')
    .option('--debug', 'enable debug logging')
    .option('--check-config', 'print the resolved configuration and exit')
    .version(VERSION);

/** CLI values that were actually given, mapped onto config keys. */
export const cliValues = (args: Args): Partial<Configuration.Config> => {
    const values: Partial<Configuration.Config> = {};
    if (args.inbox !== undefined) values.inboxDirectory = args.inbox;
    if (args.archive !== undefined) values.archiveRoot = args.archive;
    if (args.configDirectory !== undefined) values.configDirectory = args.configDirectory;
    if (args.rules !== undefined) values.rulesFile = args.rules;
    if (args.processedDirectory !== undefined) values.processedDirectory = args.processedDirectory;
    if (args.model !== undefined) values.model = args.model;
    if (args.baseUrl !== undefined) values.baseUrl = args.baseUrl;
    if (args.dryRun !== undefined) values.dryRun = args.dryRun;
    if (args.verbose !== undefined) values.verbose = args.verbose;
    if (args.debug !== undefined) values.debug = args.debug;
    return values;
};

export const configure = async (
    argv: readonly string[] = process.argv,
    env: NodeJS.ProcessEnv = process.env,
): Promise<[Configuration.Config, Configuration.SecureConfig, RunOptions]> => {
    const logger = getLogger();

    const program = createProgram();
    program.parse([...argv]);

    const args = program.opts<Args>();
    logger.debug('Command Line Options: %s', JSON.stringify(args, null, 2));

    const configDirectory = args.configDirectory ?? DOCSORT_DEFAULTS.configDirectory;
    const fileValues = await Configuration.readConfigFile(configDirectory);

    // Defaults -> File -> Environment -> CLI (highest precedence)
    const config = Configuration.mergeConfig(
        fileValues,
        Configuration.environmentValues(env),
        cliValues(args),
    );
    const secureConfig = Configuration.secureValues(env);

    logger.debug('Final configuration: %s', JSON.stringify(config, null, 2));
    return [config, secureConfig, {
        watch: args.watch ?? false,
        yes: args.yes ?? false,
        checkConfig: args.checkConfig ?? false,
    }];
};
