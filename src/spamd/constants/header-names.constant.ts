/**
 * Header names defined by the SPAMC/SPAMD protocol, in the casing spamd writes them.
 */
export const SPAMD_HEADERS = {
  CONTENT_LENGTH: 'Content-length',
  COMPRESS: 'Compress',
  USER: 'User',
  MESSAGE_CLASS: 'Message-class',
  SET: 'Set',
  REMOVE: 'Remove',
  DID_SET: 'DidSet',
  DID_REMOVE: 'DidRemove',
  SPAM: 'Spam',
} as const;

/**
 * Headers that may appear at most once in a message (matched case-insensitively).
 */
export const SINGLETON_HEADERS: readonly string[] = Object.values(SPAMD_HEADERS).map((name) => name.toLowerCase());

/** Compression tokens understood by spamd's Compress header */
export const ZLIB_COMPRESSION = 'zlib';
