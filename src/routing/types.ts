/**
 * Folder Resolution Types
 *
 * A decision either names a folder that exists in the catalog right now, or
 * carries `createNew` and the stage that was allowed to synthesize it.
 */

/** "/"-joined folder paths relative to the archive root, in walk order. */
export type FolderCatalog = readonly string[];

export type ClassificationStage =
    | 'exact'
    | 'semantic'
    | 'semantic-new'
    | 'similarity'
    | 'oracle'
    | 'forced-generic-rule'
    | 'forced-fallback'
    | 'forced-new-category'
    | 'forced-subject';

export interface ClassificationDecision {
    suggestedPath: string;
    createNew: boolean;
    reasoning: string;
    stage: ClassificationStage;
}

export interface FolderSuggestionRequest {
    subject: string;
    catalog: FolderCatalog;
    structure?: string;
}

export interface FolderSuggestion {
    suggestedPath: string;
    createNew: boolean;
    reasoning: string;
}

/**
 * Anything that can suggest a folder when local heuristics run dry.
 * Implementations may throw; the resolver treats that as no answer.
 */
export interface FolderOracle {
    suggestFolder(request: FolderSuggestionRequest): Promise<FolderSuggestion | null>;
}

export interface ResolveOptions {
    /** Markdown summary of the archive handed to the oracle. */
    structure?: string;
}
