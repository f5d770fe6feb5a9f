export * from './types';
export { buildFilename, hasEmbeddedDate, sanitizeSubject } from './filename';
export {
    compareVersions,
    determineVersion,
    extractKeywords,
    fileStem,
    findSimilarFiles,
    formatVersion,
    incrementVersion,
    initialVersionTag,
    nextVersion,
    parseFilenameVersion,
    parseVersion,
} from './version';
