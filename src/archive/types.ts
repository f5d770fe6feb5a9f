import { FolderCatalog } from '@/routing/types';

export interface ArchiveConfig {
    root: string;
    /** File name of the markdown summary kept at the archive root. */
    structureFile: string;
    /** Top-level folder names never offered as targets. */
    excludedFolders?: readonly string[];
}

export interface FolderNode {
    path: string;
    name: string;
    depth: number;
    fileCount: number;
}

export interface ArchiveInstance {
    readonly root: string;
    scanCatalog(): Promise<FolderCatalog>;
    scanTree(): Promise<FolderNode[]>;
    listFiles(folder: string): Promise<string[]>;
    absolutePath(folder: string): string;
    ensureFolder(folder: string): Promise<string>;
    summarize(): Promise<string>;
    writeStructure(): Promise<string>;
}
