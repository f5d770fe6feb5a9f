/**
 * A document as the engine sees it: text plus whatever metadata the reader
 * could recover. Created once per file and never mutated.
 */
export interface NormalizedDocument {
    readonly path: string;
    readonly name: string;
    readonly stem: string;
    /** Lower-case with the leading dot, or empty. */
    readonly extension: string;
    readonly sizeBytes: number;
    readonly creationTime?: Date;
    readonly modificationTime?: Date;
    readonly content: string;
    readonly metadata: Readonly<Record<string, string>>;
}

export type VersionFormat = 'simple' | 'semantic';
