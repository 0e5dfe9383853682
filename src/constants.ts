// Status used when a row leaves the Status column empty
export const DEFAULT_STATUS = 'Todo';

// Color for labels created on the fly (hex, no leading #)
export const DEFAULT_LABEL_COLOR = 'ededed';

// CSV columns read from each row
export const CSV_COLUMNS = {
  title: 'Title',
  body: 'Body',
  labels: 'Labels',
  status: 'Status',
} as const;

// Name of the project's single-select field that receives the row status
export const STATUS_FIELD_NAME = 'status';

// Number of project fields fetched when looking up a project
export const PROJECT_FIELDS_PAGE_SIZE = 100;

// Max retry attempts for API calls
export const MAX_RETRIES = 3;

// Base delay for exponential backoff (ms)
export const BASE_RETRY_DELAY_MS = 1000;
