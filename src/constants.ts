// Max attempts for a single GraphQL call (first try included)
export const MAX_ATTEMPTS = 3;

// Base delay for exponential backoff (ms); doubles after each failed attempt
export const BASE_RETRY_DELAY_MS = 2000;

// Per-attempt timeout for a gh call (ms)
export const CALL_TIMEOUT_MS = 30_000;

// Pause between live rows of a bulk update (ms)
export const BULK_ROW_DELAY_MS = 500;

// Page sizes for project field and item value queries
export const FIELDS_PAGE_SIZE = 50;
export const ITEM_VALUES_PAGE_SIZE = 50;

// Field types that can be written through updateProjectV2ItemFieldValue
export const SUPPORTED_FIELD_TYPES = ['TEXT', 'NUMBER', 'DATE', 'SINGLE_SELECT', 'ITERATION'] as const;

// Colours accepted for single-select options
export const OPTION_COLORS = ['GRAY', 'BLUE', 'GREEN', 'YELLOW', 'ORANGE', 'RED', 'PINK', 'PURPLE'] as const;

export const DEFAULT_OPTION_COLOR = 'GRAY';

// Header cell that marks the first line of a bulk CSV file
export const CSV_HEADER_ITEM_COLUMN = 'item_id';

// Owner alias for the authenticated user
export const VIEWER_OWNER = '@me';

// Environment switch for debug output
export const DEBUG_ENV_VAR = 'PROJFIELDS_DEBUG';
