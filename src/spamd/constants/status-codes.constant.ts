/**
 * spamd status codes.
 *
 * spamd reports the outcome of every request with the BSD sysexits codes.
 * Anything other than EX_OK means the daemon rejected or failed the request.
 */
export enum SpamdStatus {
  EX_OK = 0,
  EX_USAGE = 64,
  EX_DATAERR = 65,
  EX_NOINPUT = 66,
  EX_NOUSER = 67,
  EX_NOHOST = 68,
  EX_UNAVAILABLE = 69,
  EX_SOFTWARE = 70,
  EX_OSERR = 71,
  EX_OSFILE = 72,
  EX_CANTCREAT = 73,
  EX_IOERR = 74,
  EX_TEMPFAIL = 75,
  EX_PROTOCOL = 76,
  EX_NOPERM = 77,
  EX_CONFIG = 78,
  EX_TIMEOUT = 79,
}

const STATUS_DESCRIPTIONS: Record<SpamdStatus, string> = {
  [SpamdStatus.EX_OK]: 'No problems',
  [SpamdStatus.EX_USAGE]: 'Command line usage error',
  [SpamdStatus.EX_DATAERR]: 'Data format error',
  [SpamdStatus.EX_NOINPUT]: 'Cannot open input',
  [SpamdStatus.EX_NOUSER]: 'Addressee unknown',
  [SpamdStatus.EX_NOHOST]: 'Host name unknown',
  [SpamdStatus.EX_UNAVAILABLE]: 'Service unavailable',
  [SpamdStatus.EX_SOFTWARE]: 'Internal software error',
  [SpamdStatus.EX_OSERR]: 'System error',
  [SpamdStatus.EX_OSFILE]: 'Critical OS file missing',
  [SpamdStatus.EX_CANTCREAT]: 'Cannot create output file',
  [SpamdStatus.EX_IOERR]: 'Input/output error',
  [SpamdStatus.EX_TEMPFAIL]: 'Temporary failure, user is invited to retry',
  [SpamdStatus.EX_PROTOCOL]: 'Remote error in protocol',
  [SpamdStatus.EX_NOPERM]: 'Permission denied',
  [SpamdStatus.EX_CONFIG]: 'Configuration error',
  [SpamdStatus.EX_TIMEOUT]: 'Read timeout',
};

function isKnownStatus(code: number): code is SpamdStatus {
  return Object.prototype.hasOwnProperty.call(STATUS_DESCRIPTIONS, code);
}

export function describeStatus(code: number): string {
  return isKnownStatus(code) ? STATUS_DESCRIPTIONS[code] : 'Unknown status';
}
