import { z } from 'zod';
import { DEFAULT_SEMANTIC_THRESHOLD } from '@/constants';
import { Category, ClassificationStrategy, GenericRule, RuleCatalog } from './types';

const DEFAULT_PRIORITY = 100;

// Rule files written by hand use either snake_case or camelCase pattern keys.
const CategorySchema = z.object({
    keywords: z.array(z.string()).default([]),
    target_patterns: z.array(z.string()).optional(),
    targetPatterns: z.array(z.string()).optional(),
    priority: z.number().int().default(DEFAULT_PRIORITY),
});

const GenericRuleSchema = z.object({
    name: z.string(),
    keywords: z.array(z.string()).default([]),
    target_patterns: z.array(z.string()).optional(),
    targetPatterns: z.array(z.string()).optional(),
});

const StrategySchema = z.object({
    semantic_threshold: z.number().min(0).max(1).default(DEFAULT_SEMANTIC_THRESHOLD),
    allow_new_folders: z.boolean().default(true),
    force_existing: z.boolean().default(false),
});

export const RuleFileSchema = z.object({
    classification_rules: z.record(z.string(), CategorySchema).default({}),
    generic_rules: z.array(GenericRuleSchema).optional(),
    fallback_folders: z.array(z.string()).optional(),
    strategy: StrategySchema.default({}),
});

export type RuleFile = z.infer<typeof RuleFileSchema>;

const nonEmpty = (values: readonly string[]): string[] =>
    values.map((value) => value.trim()).filter((value) => value.length > 0);

export interface RuleFallbacks {
    genericRules: readonly GenericRule[];
    fallbackFolders: readonly string[];
}

/**
 * Turns a validated rule file into a frozen RuleCatalog. Sections the file
 * leaves out are taken from `fallbacks`.
 */
export const toRuleCatalog = (file: RuleFile, fallbacks: RuleFallbacks): RuleCatalog => {
    const categories: Category[] = Object.entries(file.classification_rules).map(([name, rule]) => Object.freeze({
        name,
        keywords: Object.freeze(nonEmpty(rule.keywords)),
        targetPatterns: Object.freeze(nonEmpty(rule.target_patterns ?? rule.targetPatterns ?? [])),
        priority: rule.priority,
    }));

    const genericRules: readonly GenericRule[] = file.generic_rules
        ? file.generic_rules.map((rule) => Object.freeze({
            name: rule.name,
            keywords: Object.freeze(nonEmpty(rule.keywords)),
            targetPatterns: Object.freeze(nonEmpty(rule.target_patterns ?? rule.targetPatterns ?? [])),
        }))
        : fallbacks.genericRules;

    const strategy: ClassificationStrategy = Object.freeze({
        semanticThreshold: file.strategy.semantic_threshold,
        allowNewFolders: file.strategy.allow_new_folders,
        forceExisting: file.strategy.force_existing,
    });

    return Object.freeze({
        categories: Object.freeze(categories),
        genericRules: Object.freeze([...genericRules]),
        fallbackFolders: Object.freeze(file.fallback_folders ? nonEmpty(file.fallback_folders) : [...fallbacks.fallbackFolders]),
        strategy,
    });
};
