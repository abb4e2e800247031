/**
 * Commands accepted by spamd.
 */
export enum SpamdCommand {
  CHECK = 'CHECK',
  SYMBOLS = 'SYMBOLS',
  REPORT = 'REPORT',
  REPORT_IFSPAM = 'REPORT_IFSPAM',
  PROCESS = 'PROCESS',
  HEADERS = 'HEADERS',
  PING = 'PING',
  TELL = 'TELL',
}

export interface CommandTraits {
  /** The request must carry a message body */
  requiresBody: boolean;
  /** The response may carry a body */
  responseBody: boolean;
}

export function commandTraits(command: SpamdCommand): CommandTraits {
  switch (command) {
    case SpamdCommand.CHECK:
    case SpamdCommand.TELL:
      return { requiresBody: true, responseBody: false };
    case SpamdCommand.SYMBOLS:
    case SpamdCommand.REPORT:
    case SpamdCommand.REPORT_IFSPAM:
    case SpamdCommand.PROCESS:
    case SpamdCommand.HEADERS:
      return { requiresBody: true, responseBody: true };
    case SpamdCommand.PING:
      return { requiresBody: false, responseBody: false };
  }
}

const COMMANDS: readonly string[] = Object.values(SpamdCommand);

export function isSpamdCommand(value: string): value is SpamdCommand {
  return COMMANDS.includes(value);
}
