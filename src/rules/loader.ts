/**
 * Rule Catalog Loader
 *
 * Reads the classification rules YAML once per run. A missing file means the
 * built-in rules; an unreadable or invalid one is logged and also falls back
 * to them, so a bad edit never stops the inbox from draining.
 */

import * as yaml from 'js-yaml';
import * as Logging from '@/logging';
import * as Storage from '@/util/storage';
import defaultRuleFile from './defaults.json';
import { RuleFileSchema, toRuleCatalog } from './schema';
import { RuleCatalog } from './types';

let builtIn: RuleCatalog | undefined;

export const getDefaultRules = (): RuleCatalog => {
    if (!builtIn) {
        const parsed = RuleFileSchema.parse(defaultRuleFile);
        builtIn = toRuleCatalog(parsed, { genericRules: [], fallbackFolders: [] });
    }
    return builtIn;
};

/**
 * Parses YAML text into a RuleCatalog. Throws on malformed YAML or a shape
 * the schema rejects.
 */
export const parseRules = (content: string): RuleCatalog => {
    const raw = yaml.load(content) ?? {};
    const result = RuleFileSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid rules file: ${issues}`);
    }
    const defaults = getDefaultRules();
    return toRuleCatalog(result.data, {
        genericRules: defaults.genericRules,
        fallbackFolders: defaults.fallbackFolders,
    });
};

export const loadRules = async (rulesFile: string | undefined): Promise<RuleCatalog> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });

    if (!rulesFile || !await storage.exists(rulesFile)) {
        logger.debug('No rules file found at %s, using built-in rules', rulesFile ?? '(none)');
        return getDefaultRules();
    }

    try {
        const content = await storage.readFile(rulesFile, 'utf-8');
        const rules = parseRules(content);
        logger.debug('Loaded %d categories from %s', rules.categories.length, rulesFile);
        return rules;
    } catch (error: unknown) {
        logger.error('Failed to load rules from %s, using built-in rules: %s', rulesFile, error instanceof Error ? error.message : String(error));
        return getDefaultRules();
    }
};
