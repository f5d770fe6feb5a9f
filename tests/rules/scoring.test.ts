import { describe, expect, it } from 'vitest';
import { bestCategory, getDefaultRules, RuleCatalog, scoreCategory } from '../../src/rules';

const catalog = (categories: RuleCatalog['categories'], semanticThreshold = 0.3): RuleCatalog => ({
    categories,
    genericRules: [],
    fallbackFolders: [],
    strategy: { semanticThreshold, allowNewFolders: true, forceExisting: false },
});

describe('category scoring', () => {
    it('scores matched keywords over total keywords', () => {
        const operations = getDefaultRules().categories[1];
        expect(operations?.name).toBe('运维管理');
        if (!operations) return;

        const scored = scoreCategory('运维部署方案', operations);

        expect(scored.matchedKeywords).toEqual(['运维', '部署']);
        expect(scored.score).toBeCloseTo(2 / 6);
    });

    it('matches keywords case-insensitively', () => {
        const scored = scoreCategory('DevOps Handbook', { name: 'x', keywords: ['devops', 'ops'], targetPatterns: [], priority: 1 });
        expect(scored.score).toBe(1);
    });

    it('gives zero for a category without keywords', () => {
        expect(scoreCategory('anything', { name: 'x', keywords: [], targetPatterns: [], priority: 1 }).score).toBe(0);
    });

    it('discards categories below the threshold', () => {
        const rules = catalog([
            { name: 'wide', keywords: ['a1', 'b2', 'c3', 'd4', 'e5'], targetPatterns: [], priority: 1 },
        ]);
        expect(bestCategory('a1 only', rules)).toBeNull();
    });

    it('picks the highest score', () => {
        const rules = catalog([
            { name: 'half', keywords: ['alpha', 'beta'], targetPatterns: [], priority: 1 },
            { name: 'full', keywords: ['alpha'], targetPatterns: [], priority: 9 },
        ]);
        expect(bestCategory('alpha report', rules)?.category.name).toBe('full');
    });

    it('breaks score ties by lowest priority value', () => {
        const rules = catalog([
            { name: 'later', keywords: ['alpha'], targetPatterns: [], priority: 5 },
            { name: 'preferred', keywords: ['alpha'], targetPatterns: [], priority: 2 },
        ]);
        expect(bestCategory('alpha', rules)?.category.name).toBe('preferred');
    });

    it('breaks full ties by declaration order', () => {
        const rules = catalog([
            { name: 'first', keywords: ['alpha'], targetPatterns: [], priority: 1 },
            { name: 'second', keywords: ['alpha'], targetPatterns: [], priority: 1 },
        ]);
        expect(bestCategory('alpha', rules)?.category.name).toBe('first');
    });

    it('selects the operations category for a deployment plan with the built-in rules', () => {
        expect(bestCategory('运维部署方案', getDefaultRules())?.category.name).toBe('运维管理');
    });
});
