/** Injection token for the resolved SpamdConfig */
export const SPAMD_CONFIG = Symbol('SPAMD_CONFIG');

/** Optional injection token replacing how connections are opened */
export const SPAMD_CONNECTOR = Symbol('SPAMD_CONNECTOR');
