export const DEFAULT_PORT = 9543 as const;

export const DEFAULT_GRAPH_BASE_URL = 'https://graph.microsoft.com' as const;
export const DEFAULT_GRAPH_API_VERSION = 'v1.0' as const;
export const GRAPH_DEFAULT_SCOPE = 'https://graph.microsoft.com/.default' as const;
export const DEFAULT_GRAPH_RATE_LIMIT_PER_MINUTE = 780000 as const; // Graph's per-app ceiling
export const DEFAULT_GRAPH_REQUEST_TIMEOUT_SECONDS = 30 as const;

export const DEFAULT_SITE_PAGE_SIZE = 100 as const;
export const DEFAULT_MAX_SITE_PAGES = 10 as const;
export const DEFAULT_MAX_SITES = 200 as const;
export const DEFAULT_MAX_GROUPS_FOR_SITE_DISCOVERY = 20 as const;
export const DEFAULT_MAX_FOLDER_ITEMS = 5000 as const;
export const FOLDER_PAGE_SIZE = 200 as const;

export const DEFAULT_TRANSFER_CONCURRENCY = 1 as const;
export const DEFAULT_STEP_TIMEOUT_SECONDS = 60 as const;
export const DEFAULT_MAX_FILE_SIZE_BYTES = 209715200 as const; // 200MB

export const DEFAULT_MIME_TYPE = 'application/octet-stream' as const;
