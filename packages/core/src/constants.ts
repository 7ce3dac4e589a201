// Shared defaults for identification, rendering and the lexer cache.

/** Upper bound on the bytes handed to `file -` when sniffing content. */
export const SNIFF_BYTE_LIMIT = 20_000;

/** Markdown wrap width when neither COLUMNS nor the terminal report one. */
export const DEFAULT_COLUMNS = 77;

export const DEFAULT_PYGMENTS_STYLE = 'rrt';

/** Bumped whenever the catalog format changes so stale caches are ignored. */
export const LEXER_CATALOG_EPOCH = 2;

export const REALPATH_MAX_DEPTH = 20;

export const CACHE_DIRECTORY_NAME = 'pagerfilter';

export const SCRATCH_PREFIX = 'pagerfilter.';

export const ARTIFACT_MARKER = ':formatted:';

export const JUNIT_SNIFF_LINES = 10;

export const PYSOURCE_PLACEHOLDER = '<pysource>';

export const CSV_DELIMITER = '£';
