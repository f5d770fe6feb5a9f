/**
 * Rule Catalog Types
 *
 * Categories are plain records kept in declaration order. Lower `priority`
 * wins a score tie.
 */

export interface Category {
    readonly name: string;
    readonly keywords: readonly string[];
    readonly targetPatterns: readonly string[];
    readonly priority: number;
}

/**
 * Broad groupings consulted only when nothing else placed a document
 * into an existing folder.
 */
export interface GenericRule {
    readonly name: string;
    readonly keywords: readonly string[];
    readonly targetPatterns: readonly string[];
}

export interface ClassificationStrategy {
    readonly semanticThreshold: number;
    readonly allowNewFolders: boolean;
    readonly forceExisting: boolean;
}

export interface RuleCatalog {
    readonly categories: readonly Category[];
    readonly genericRules: readonly GenericRule[];
    readonly fallbackFolders: readonly string[];
    readonly strategy: ClassificationStrategy;
}

export interface CategoryScore {
    category: Category;
    score: number;
    matchedKeywords: string[];
}
