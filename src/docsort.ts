import 'dotenv/config';
import path from 'node:path';
import * as Arguments from '@/arguments';
import * as Configuration from '@/config';
import * as Oracle from '@/oracle';
import * as Pipeline from '@/pipeline';
import * as Rules from '@/rules';
import * as Watch from '@/watch';
import { DEFAULT_STRUCTURE_FILE, PROGRAM_NAME, VERSION } from '@/constants';
import { getLogger, setLogLevel } from '@/logging';
import { confirm } from '@/util/prompt';

export const toPipelineConfig = (config: Configuration.Config): Pipeline.PipelineConfig => ({
    archiveRoot: config.archiveRoot,
    processedDirectory: config.processedDirectory,
    structureFile: DEFAULT_STRUCTURE_FILE,
    maintainStructureFile: config.maintainStructureFile,
    dryRun: config.dryRun,
    dateFormat: config.dateFormat,
    datePriority: config.datePriority,
    timezone: config.timezone,
    versionFormat: config.versionFormat,
    initialVersion: config.initialVersion,
    maxFilenameLength: config.maxFilenameLength,
    fallbackSubject: config.fallbackSubject,
    supportedExtensions: config.supportedExtensions,
    similarityCheck: config.similarityCheck,
});

const printSummary = (summary: Pipeline.BatchSummary): void => {
    // eslint-disable-next-line no-console
    console.info('\n' + '='.repeat(60));
    // eslint-disable-next-line no-console
    console.info('SUMMARY');
    // eslint-disable-next-line no-console
    console.info('='.repeat(60));
    // eslint-disable-next-line no-console
    console.info(`Total: ${summary.total}  Success: ${summary.success}  Failed: ${summary.failed}  Skipped: ${summary.skipped}`);
    for (const result of summary.results) {
        if (result.status === 'error') {
            // eslint-disable-next-line no-console
            console.info(`FAILED   ${path.basename(result.sourcePath)}: ${result.error.message}`);
        } else {
            const label = result.status === 'planned' ? 'PLANNED' : 'FILED  ';
            // eslint-disable-next-line no-console
            console.info(`${label}  ${result.plan.originalName} -> ${result.plan.targetFolder}/${result.plan.filename}`);
        }
    }
    // eslint-disable-next-line no-console
    console.info('='.repeat(60));
};

const waitForInterrupt = (): Promise<void> => new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
});

export async function main() {

    // eslint-disable-next-line no-console
    console.info(`Starting ${PROGRAM_NAME}: ${VERSION}`);

    let config: Configuration.Config;
    let secureConfig: Configuration.SecureConfig;
    let options: Arguments.RunOptions;
    try {
        [config, secureConfig, options] = await Arguments.configure();
    } catch (error: unknown) {
        getLogger().error('Configuration error: %s', error instanceof Error ? error.message : String(error));
        process.exit(1);
    }

    if (config.verbose) {
        setLogLevel('verbose', { logFile: config.logFile });
    }
    if (config.debug) {
        setLogLevel('debug', { logFile: config.logFile });
    }
    if (!config.verbose && !config.debug && config.logFile) {
        setLogLevel('info', { logFile: config.logFile });
    }

    const logger = getLogger();

    if (options.checkConfig) {
        // eslint-disable-next-line no-console
        console.info(JSON.stringify({ ...config, apiKey: secureConfig.apiKey ? '(set)' : '(not set)' }, null, 2));
        return;
    }

    try {
        const rules = await Rules.loadRules(config.rulesFile);
        const oracle = Oracle.fromConfig({
            apiKey: secureConfig.apiKey,
            model: config.model,
            baseUrl: config.baseUrl,
            timeout: config.oracleTimeout,
        });
        if (!oracle) {
            logger.info('No API key set; classifying with local rules only');
        }

        const pipeline = Pipeline.create(toPipelineConfig(config), { rules, oracle });

        const listing = await Pipeline.listInbox(config.inboxDirectory, pipeline.isSupported);
        if (listing.files.length === 0) {
            logger.info('No files to process in %s', config.inboxDirectory);
        } else {
            logger.info('Found %d file(s) to process in %s', listing.files.length, config.inboxDirectory);
            const proceed = options.yes || config.dryRun || await confirm(`Process ${listing.files.length} file(s)?`);
            if (proceed) {
                printSummary(await Pipeline.runBatch(listing, pipeline.process));
            } else {
                logger.info('Cancelled');
            }
        }

        if (options.watch) {
            const watcher = Watch.create({
                inboxDirectory: config.inboxDirectory,
                debounceMs: config.debounceMs,
                accept: pipeline.isSupported,
                process: pipeline.process,
            });
            await watcher.start();
            await waitForInterrupt();
            logger.info('Stopping watcher');
            await watcher.stop();
        }
    } catch (error: unknown) {
        const failure = error instanceof Error ? error : new Error(String(error));
        logger.error('Exiting due to Error: %s, %s', failure.message, failure.stack);
        process.exit(1);
    }
}
