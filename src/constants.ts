export const ENV_LOG_LEVEL = "MERGE_IMPORT_LOG_LEVEL";
export const ENV_DISABLE_LOG_ECHO = "MERGE_IMPORT_DISABLE_LOG_ECHO";
export const ENV_DIFF3 = "MERGE_IMPORT_DIFF3";
export const ENV_DIFF3_CONFLICT_CODES = "MERGE_IMPORT_DIFF3_CONFLICT_CODES";

export const DEFAULT_DIFF3_COMMAND = "diff3";

// diff3 exits 1 when the merged output contains conflict markers and 2 on trouble.
export const DEFAULT_CONFLICT_EXIT_CODES: readonly number[] = [1];
