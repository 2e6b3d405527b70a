/**
 * Configuration constants
 */

export const CLI_VERSION = '0.4.0';
export const DEFAULT_CONFIG_FILENAME = '.memoforge.ini';
export const DEFAULT_OUTPUT_ROOT = 'output';
export const DEFAULT_IO_ROOT = 'io';
export const DEFAULT_DATA_ROOT = 'data';
export const DEFAULT_CONCURRENCY = 4;
/** Overall 0-10 score below which a run halts for human review. */
export const DEFAULT_QUALITY_THRESHOLD = 8.0;
