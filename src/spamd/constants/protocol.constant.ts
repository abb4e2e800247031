export const DEFAULT_PROTOCOL_VERSION = '1.5';
export const DEFAULT_SPAMD_PORT = 783;

export const CRLF = '\r\n';

/** Header names spamd accepts */
export const HEADER_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export const DEFAULT_MAX_HEADER_BYTES = 65536; // 64KB
export const DEFAULT_MAX_BODY_BYTES = 10485760; // 10MB
