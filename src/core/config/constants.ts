export const DEFAULT_OUTPUT_DIR = './filtered_backup';

export const JSON_SUFFIX = '.json';
export const SAMPLE_FILE_SUFFIX = '.json.gz';

export const DAY_START_TIME = '00:00:00';
export const DAY_END_TIME = '23:59:59';

export const SUMMARY_RULE = '━'.repeat(50);
