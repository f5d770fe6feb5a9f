import { VersionFormat } from '@/types';

export interface VersionTag {
    major: number;
    minor: number;
    patch?: number;
}

export interface VersionOptions {
    format: VersionFormat;
    /** Serialized tag used when no similar file exists, e.g. `v1.0`. */
    initialVersion: string;
}

export interface FilenameOptions {
    maxLength: number;
}
