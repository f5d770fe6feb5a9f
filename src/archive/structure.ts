import { FolderNode } from './types';

/** Markdown outline of the archive, one bullet per folder. */
export const renderStructure = (nodes: readonly FolderNode[], generatedAt?: string): string => {
    const lines = ['# Archive structure', ''];
    if (generatedAt) {
        lines.push(`Updated: ${generatedAt}`, '');
    }
    if (nodes.length === 0) {
        lines.push('(empty)');
    }
    for (const node of nodes) {
        const files = node.fileCount === 1 ? '1 file' : `${node.fileCount} files`;
        lines.push(`${'  '.repeat(node.depth)}- ${node.name}/ (${files})`);
    }
    return `${lines.join('\n')}\n`;
};
