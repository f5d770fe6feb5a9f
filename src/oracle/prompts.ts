import { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { MAX_SIMILARITY_CONTENT_LENGTH, MAX_SUBJECT_CONTENT_LENGTH } from '@/constants';
import { FolderSuggestionRequest } from '@/routing/types';
import { NormalizedDocument } from '@/types';

const SYSTEM_PROMPT = 'You help file documents into an existing archive. Answer with a single JSON object and nothing else.';

const system = (): ChatCompletionMessageParam => ({ role: 'system', content: SYSTEM_PROMPT });

export const serializeMetadata = (metadata: Readonly<Record<string, string>>): string => {
    const entries = Object.entries(metadata).filter(([, value]) => value.trim().length > 0);
    return entries.length > 0 ? JSON.stringify(Object.fromEntries(entries), null, 2) : '{}';
};

export const buildSubjectMessages = (document: NormalizedDocument): ChatCompletionMessageParam[] => {
    const content = document.content.slice(0, MAX_SUBJECT_CONTENT_LENGTH);
    return [system(), {
        role: 'user',
        content: `Extract the core subject of this document, to be used as the base of its filename.

File name: ${document.name}
File type: ${document.extension || '(none)'}

Metadata:
${serializeMetadata(document.metadata)}

Content:
${content}

Reply in the language of the document, as JSON:
{
    "subject": "short subject suitable for a filename",
    "suggested_folder": "topic folder, levels separated by /",
    "confidence": 0.85,
    "reasoning": "why"
}

Prefer broad topic folders (meeting notes, project documents, technical designs, finance reports, HR) over one folder per document.`,
    }];
};

export const buildFolderMessages = (request: FolderSuggestionRequest): ChatCompletionMessageParam[] => {
    const folders = request.catalog.length > 0
        ? request.catalog.map((folder) => `- ${folder}`).join('\n')
        : '(no folders yet)';
    const structure = request.structure?.trim() ? `Archive structure:\n${request.structure.trim()}\n\n` : '';
    const createRule = request.catalog.length > 0
        ? 'create_new must be false: suggested_path must be exactly one of the existing folders listed above.'
        : 'The archive is empty, so create_new may be true.';

    return [system(), {
        role: 'user',
        content: `Choose the archive folder for a document with the subject "${request.subject}".

${structure}Existing folders:
${folders}

Rules:
1. ${createRule}
2. Pick the closest match; never invent a new path when a listed folder fits.

Reply as JSON:
{
    "suggested_path": "full path from the list",
    "create_new": false,
    "reasoning": "why this folder"
}`,
    }];
};

export const buildSimilarityMessages = (contentA: string, contentB: string): ChatCompletionMessageParam[] => [system(), {
    role: 'user',
    content: `Decide whether these two documents are versions of the same topic, project or event.

Document 1:
${contentA.slice(0, MAX_SIMILARITY_CONTENT_LENGTH)}

Document 2:
${contentB.slice(0, MAX_SIMILARITY_CONTENT_LENGTH)}

Score topical relatedness, not textual overlap; 0.7 or more means the same topic.
Reply as JSON:
{
    "is_similar": true,
    "similarity_score": 0.8,
    "reasoning": "why"
}`,
}];
