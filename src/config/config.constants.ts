export const BOOLEAN_TRUE_VALUES = ['true', '1', 'yes', 'on'];

export const ALLOWED_POOL_OVERFLOW_MODES = ['queue', 'fail'] as const;

// Configuration defaults
export const DEFAULT_SPAMD_HOST = 'localhost';
export const DEFAULT_CONNECT_TIMEOUT = 5000;
export const DEFAULT_REQUEST_TIMEOUT = 30000;
export const DEFAULT_MAX_CONNECTIONS = 10;
export const DEFAULT_POOL_OVERFLOW = 'queue';
export const DEFAULT_CONNECT_RETRIES = 2;
export const DEFAULT_RETRY_DELAY = 100;
export const DEFAULT_IDLE_TIMEOUT = 30000;
