import { z } from 'zod';
import { isValidTimezone } from '@/util/dates';

const extension = z.string().trim().min(1).transform((value) => {
    const lowered = value.toLowerCase();
    return lowered.startsWith('.') ? lowered : `.${lowered}`;
});

export const ConfigSchema = z.object({
    configDirectory: z.string().min(1),
    archiveRoot: z.string().min(1),
    inboxDirectory: z.string().min(1),
    processedDirectory: z.string().min(1).optional(),
    rulesFile: z.string().min(1),
    model: z.string().trim().min(1, 'model cannot be empty'),
    baseUrl: z.string().url().optional(),
    oracleTimeout: z.number().int().positive(),
    maxFilenameLength: z.number().int().min(10),
    versionFormat: z.enum(['simple', 'semantic']),
    dateFormat: z.string().min(1),
    datePriority: z.array(z.enum(['content', 'creation', 'modification', 'current'])).min(1),
    timezone: z.string().refine(isValidTimezone, (value) => ({ message: `Invalid timezone: ${value}` })),
    initialVersion: z.string().regex(/^v\d+\.\d+(\.\d+)?$/i, 'initialVersion must look like v1.0 or v1.0.0'),
    fallbackSubject: z.string().trim().min(1),
    supportedExtensions: z.array(extension).min(1),
    similarityCheck: z.boolean(),
    maintainStructureFile: z.boolean(),
    debounceMs: z.number().int().nonnegative(),
    logFile: z.string().min(1).optional(),
    dryRun: z.boolean(),
    verbose: z.boolean(),
    debug: z.boolean(),
});

/** What a config file may set: any subset, no config directory. */
export const FileConfigSchema = ConfigSchema.omit({ configDirectory: true }).partial().strict();

export const SecureConfigSchema = z.object({
    apiKey: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type FileConfig = z.infer<typeof FileConfigSchema>;
export type SecureConfig = z.infer<typeof SecureConfigSchema>;
