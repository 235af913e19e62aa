export const MIN_TOP_K = 1;
export const MAX_TOP_K = 50;
export const DEFAULT_TOP_K = 10;

export const DESCRIPTION_CHAR_BUDGET = 1000;
export const EMBEDDING_INPUT_CHAR_LIMIT = 6000;

export const ADZUNA_MAX_RESULTS_PER_PAGE = 50;
