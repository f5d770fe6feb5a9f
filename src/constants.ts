export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'docsort';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';
export const DEFAULT_TIMEZONE = 'Etc/UTC';

export const DEFAULT_VERBOSE = false;
export const DEFAULT_DRY_RUN = false;
export const DEFAULT_DEBUG = false;

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE_NAME = 'config.yaml';
export const DEFAULT_INBOX_DIRECTORY = './inbox';
export const DEFAULT_ARCHIVE_ROOT = './archive';
export const DEFAULT_RULES_FILE = 'config/classification_rules.yaml';
export const DEFAULT_STRUCTURE_FILE = 'structure.md';

// Naming
export const DEFAULT_MAX_FILENAME_LENGTH = 200;
export const DEFAULT_DATE_FORMAT = 'YYYYMMDD';
export const DEFAULT_VERSION_FORMAT = 'simple';
export const DEFAULT_INITIAL_VERSION = 'v1.0';
export const DEFAULT_FALLBACK_SUBJECT = '未分类文档';
export const UNTITLED_SUBJECT = 'untitled';

// Dates
export const DEFAULT_DATE_PRIORITY = ['content', 'creation', 'modification', 'current'] as const;
export const DATE_SCAN_WINDOW = 1000;
export const DATE_KEYWORD_BONUS = 0.3;
export const DATE_FORMAT_BACKUP_STAMP = 'YYYYMMDD_HHmmss';

// Classification
export const DEFAULT_SEMANTIC_THRESHOLD = 0.3;
export const SIMILARITY_CONTAINMENT_SCORE = 0.8;
export const SIMILARITY_TOKEN_SCORE = 0.6;
export const SIMILARITY_ACCEPT_SCORE = 0.6;

// Oracle
export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_ORACLE_TIMEOUT = 30000;
export const ORACLE_TEMPERATURE = 0.3;
export const ORACLE_MAX_TOKENS = 1000;
export const MAX_SUBJECT_CONTENT_LENGTH = 3000;
export const MAX_SIMILARITY_CONTENT_LENGTH = 2000;
export const UNTRUSTED_SUBJECT_CONFIDENCE = 0.3;

// Watch mode
export const DEFAULT_DEBOUNCE_MS = 1000;

export const DEFAULT_SUPPORTED_EXTENSIONS = [
    '.txt', '.md', '.markdown', '.csv', '.json', '.html', '.htm',
    '.doc', '.docx', '.pdf', '.ppt', '.pptx', '.xls', '.xlsx', '.rtf',
];

export const TEXT_EXTENSIONS = ['.txt', '.md', '.markdown', '.csv', '.json'];
export const HTML_EXTENSIONS = ['.html', '.htm'];

export const SKIPPED_FILE_NAMES = ['README.md'];

export const DOCSORT_DEFAULTS = {
    dryRun: DEFAULT_DRY_RUN,
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
    configDirectory: DEFAULT_CONFIG_DIR,
    inboxDirectory: DEFAULT_INBOX_DIRECTORY,
    archiveRoot: DEFAULT_ARCHIVE_ROOT,
    rulesFile: DEFAULT_RULES_FILE,
    model: DEFAULT_MODEL,
    oracleTimeout: DEFAULT_ORACLE_TIMEOUT,
    maxFilenameLength: DEFAULT_MAX_FILENAME_LENGTH,
    versionFormat: DEFAULT_VERSION_FORMAT,
    dateFormat: DEFAULT_DATE_FORMAT,
    datePriority: [...DEFAULT_DATE_PRIORITY],
    timezone: DEFAULT_TIMEZONE,
    initialVersion: DEFAULT_INITIAL_VERSION,
    fallbackSubject: DEFAULT_FALLBACK_SUBJECT,
    supportedExtensions: DEFAULT_SUPPORTED_EXTENSIONS,
    similarityCheck: false,
    maintainStructureFile: true,
    debounceMs: DEFAULT_DEBOUNCE_MS,
};
