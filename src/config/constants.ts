/**
 * Configuration constants
 */

export const DEFAULT_CONFIG_FILENAME = '.factledger.ini';
export const DOTENV_FILENAMES = ['.env', '.env.local'];
export const VERIFIED_FILE_SUFFIX = '_verified.jsonl';
export const VERSION = '0.1.0';
