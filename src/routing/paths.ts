/** "/"-joined, trimmed, no leading or trailing slash, no empty segments. */
export const normalizeFolderPath = (folder: string): string =>
    folder
        .trim()
        .replace(/\\/g, '/')
        .split('/')
        .map((segment) => segment.trim())
        .filter((segment) => segment.length > 0)
        .join('/');

export const leafName = (folder: string): string => {
    const segments = normalizeFolderPath(folder).split('/');
    return segments[segments.length - 1] ?? '';
};

export const isTopLevel = (folder: string): boolean => !normalizeFolderPath(folder).includes('/');

export const tokenize = (text: string): string[] =>
    text.toLocaleLowerCase().split(/\s+/).filter((token) => token.length > 0);

/** Catalog entry whose normalized form equals `candidate`, if any. */
export const findInCatalog = (candidate: string, catalog: readonly string[]): string | undefined => {
    const wanted = normalizeFolderPath(candidate).toLocaleLowerCase();
    if (!wanted) {
        return undefined;
    }
    return catalog.find((folder) => normalizeFolderPath(folder).toLocaleLowerCase() === wanted);
};

export const pathContains = (folder: string, pattern: string): boolean =>
    normalizeFolderPath(folder).toLocaleLowerCase().includes(pattern.toLocaleLowerCase());
