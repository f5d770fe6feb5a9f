import { Category, CategoryScore, RuleCatalog } from './types';

const lower = (value: string): string => value.toLocaleLowerCase();

export const scoreCategory = (subject: string, category: Category): CategoryScore => {
    const haystack = lower(subject);
    const matchedKeywords = category.keywords.filter((keyword) => haystack.includes(lower(keyword)));
    const score = category.keywords.length === 0 ? 0 : matchedKeywords.length / category.keywords.length;
    return { category, score, matchedKeywords };
};

/**
 * Best category for a subject: highest score at or above the threshold,
 * then lowest priority, then declaration order. Null when none qualifies.
 */
export const bestCategory = (subject: string, rules: RuleCatalog): CategoryScore | null => {
    let best: CategoryScore | null = null;

    for (const category of rules.categories) {
        const scored = scoreCategory(subject, category);
        if (scored.matchedKeywords.length === 0 || scored.score < rules.strategy.semanticThreshold) {
            continue;
        }
        if (best === null
            || scored.score > best.score
            || (scored.score === best.score && category.priority < best.category.priority)) {
            best = scored;
        }
    }

    return best;
};
