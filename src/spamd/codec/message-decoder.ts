import {
  FrameTooLargeError,
  MalformedBodyError,
  MalformedHeaderError,
  MalformedStatusLineError,
  UnexpectedEofError,
} from '../errors/spamd.errors';
import { SPAMD_HEADERS } from '../constants/header-names.constant';
import { CRLF, DEFAULT_MAX_BODY_BYTES, DEFAULT_MAX_HEADER_BYTES, HEADER_NAME_PATTERN } from '../constants/protocol.constant';
import { parseContentLength, parseToken } from '../message/header-values';
import { SpamdHeaders } from '../message/spamd-headers';
import { SpamdCommand, commandTraits, isSpamdCommand } from '../message/spamd-command';
import type { RequestProtocol, SpamdRequest } from '../message/request';
import type { SpamdResponse } from '../message/response';
import { getCompressionCodec } from './compression';
import type { CompressionCodec } from './compression';

export enum DecoderState {
  StartLine = 'start-line',
  Headers = 'headers',
  Body = 'body',
  Complete = 'complete',
}

export interface DecoderLimits {
  /** Upper bound for the start line plus the header section, terminators included */
  maxHeaderBytes?: number;
  /** Upper bound for the body, both on the wire and once decompressed */
  maxBodyBytes?: number;
}

export interface ResponseDecoderOptions extends DecoderLimits {
  /** Command the response answers. Decides whether a length-less body is read until close. */
  command?: SpamdCommand;
}

const STATUS_LINE_PATTERN = /^SPAMD\/(\d+\.\d+)[ \t]+(\S+)(?:[ \t]+(.*))?$/;
const REQUEST_LINE_PATTERN = /^([A-Z_]+)[ \t]+(SPAMC|SPAMD)\/(\d+\.\d+)$/;
const STATUS_CODE_PATTERN = /^\d+$/;
const FRAMING_HEADERS = [SPAMD_HEADERS.CONTENT_LENGTH.toLowerCase(), SPAMD_HEADERS.COMPRESS.toLowerCase()];

/**
 * Resumable decoder for one SPAMC/SPAMD frame.
 *
 * Network reads arrive in arbitrary pieces, so the decoder keeps its partial buffer
 * between calls: feed every chunk to push() and call end() when the peer closes.
 * One instance decodes exactly one frame.
 */
export abstract class FrameDecoder<T> {
  private current = DecoderState.StartLine;
  private pending: Buffer = Buffer.alloc(0);
  private headerBytes = 0;
  private readonly headerList = new SpamdHeaders();
  private declaredLength?: number;
  private compression?: CompressionCodec;
  private readonly bodyChunks: Buffer[] = [];
  private bodyLength = 0;
  private message?: T;
  private endedByPeer = false;
  private surplus = 0;
  private received = 0;
  private readonly maxHeaderBytes: number;
  private readonly maxBodyBytes: number;

  protected constructor(limits: DecoderLimits = {}) {
    this.maxHeaderBytes = limits.maxHeaderBytes ?? DEFAULT_MAX_HEADER_BYTES;
    this.maxBodyBytes = limits.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
  }

  get state(): DecoderState {
    return this.current;
  }

  /** Every byte pushed so far, surplus included */
  get bytesReceived(): number {
    return this.received;
  }

  /** Bytes received after the frame was complete */
  get surplusBytes(): number {
    return this.surplus;
  }

  /** The frame was only delimited by the peer closing the connection */
  get completedByEof(): boolean {
    return this.current === DecoderState.Complete && this.endedByPeer;
  }

  /**
   * Feeds newly received bytes.
   *
   * @returns the decoded frame once complete, otherwise undefined
   */
  push(chunk: Buffer): T | undefined {
    this.received += chunk.length;
    if (this.message !== undefined) {
      this.surplus += chunk.length;
      return this.message;
    }
    if (chunk.length === 0) return undefined;

    this.pending = this.pending.length === 0 ? chunk : Buffer.concat([this.pending, chunk]);
    return this.advance();
  }

  /**
   * Signals that the peer closed the connection.
   *
   * @throws UnexpectedEofError when the frame is not complete
   */
  end(): T {
    if (this.message !== undefined) return this.message;
    this.endedByPeer = true;

    if (this.current === DecoderState.Body && this.declaredLength === undefined) {
      return this.complete();
    }
    // spamd may answer with a bare status line and close
    if (this.current === DecoderState.Headers && this.headerList.size === 0 && this.pending.length === 0) {
      return this.complete();
    }

    throw new UnexpectedEofError(this.describeTruncation());
  }

  protected abstract parseStartLine(line: string): void;

  /** Whether a frame without Content-length carries a body terminated by connection close */
  protected abstract readsUntilClose(): boolean;

  protected abstract build(headers: SpamdHeaders, body: Buffer | undefined): T;

  private advance(): T | undefined {
    for (;;) {
      switch (this.current) {
        case DecoderState.StartLine: {
          const line = this.takeLine();
          if (line === undefined) return undefined;
          this.parseStartLine(line);
          this.current = DecoderState.Headers;
          break;
        }
        case DecoderState.Headers: {
          const line = this.takeLine();
          if (line === undefined) return undefined;
          if (line.length > 0) {
            this.addHeaderLine(line);
          } else if (this.beginBody()) {
            return this.complete();
          }
          break;
        }
        case DecoderState.Body:
          return this.readBody();
        case DecoderState.Complete:
          return this.message;
      }
    }
  }

  private takeLine(): string | undefined {
    const index = this.pending.indexOf(CRLF);
    if (index === -1) {
      this.assertHeaderSize(this.headerBytes + this.pending.length);
      return undefined;
    }

    this.headerBytes += index + CRLF.length;
    this.assertHeaderSize(this.headerBytes);

    const line = this.pending.subarray(0, index).toString('utf-8');
    this.pending = this.pending.subarray(index + CRLF.length);
    return line;
  }

  private assertHeaderSize(size: number): void {
    if (size > this.maxHeaderBytes) {
      throw new FrameTooLargeError('header', size, this.maxHeaderBytes);
    }
  }

  private addHeaderLine(line: string): void {
    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new MalformedHeaderError(`Header line "${line}" has no colon`);
    }

    const name = line.slice(0, colon).trim();
    const value = line.slice(colon + 1).trim();
    if (!HEADER_NAME_PATTERN.test(name)) {
      throw new MalformedHeaderError(`Invalid header name "${name}"`);
    }
    if (/[\r\n]/.test(value)) {
      throw new MalformedHeaderError(`Header "${name}" value contains a bare line break`);
    }
    if (FRAMING_HEADERS.includes(name.toLowerCase()) && this.headerList.has(name)) {
      throw new MalformedHeaderError(`Duplicate ${name} header`);
    }

    this.headerList.append(name, value);
  }

  /**
   * Reads the framing headers once the header section is over.
   *
   * @returns true when the frame has no body to wait for
   */
  private beginBody(): boolean {
    const rawLength = this.headerList.get(SPAMD_HEADERS.CONTENT_LENGTH);
    const rawCompress = this.headerList.get(SPAMD_HEADERS.COMPRESS);

    if (rawCompress !== undefined) {
      const token = parseToken(rawCompress);
      this.compression = token === undefined ? undefined : getCompressionCodec(token);
      if (!this.compression) {
        throw new MalformedHeaderError(`Unsupported compression "${rawCompress}"`);
      }
    }

    if (rawLength !== undefined) {
      const length = parseContentLength(rawLength);
      if (length === undefined) {
        throw new MalformedHeaderError(`Content-length "${rawLength}" is not a byte count`);
      }
      if (length > this.maxBodyBytes) {
        throw new FrameTooLargeError('body', length, this.maxBodyBytes);
      }
      this.declaredLength = length;
      if (length === 0) return true;
    } else if (!this.readsUntilClose()) {
      return true;
    }

    this.current = DecoderState.Body;
    return false;
  }

  private readBody(): T | undefined {
    if (this.declaredLength === undefined) {
      this.appendBody(this.pending);
      this.pending = Buffer.alloc(0);
      if (this.bodyLength > this.maxBodyBytes) {
        throw new FrameTooLargeError('body', this.bodyLength, this.maxBodyBytes);
      }
      return undefined;
    }

    const piece = this.pending.subarray(0, this.declaredLength - this.bodyLength);
    this.appendBody(piece);
    this.pending = this.pending.subarray(piece.length);
    return this.bodyLength === this.declaredLength ? this.complete() : undefined;
  }

  private appendBody(piece: Buffer): void {
    if (piece.length === 0) return;
    this.bodyChunks.push(piece);
    this.bodyLength += piece.length;
  }

  private complete(): T {
    this.surplus += this.pending.length;
    this.pending = Buffer.alloc(0);

    const wireBody = this.bodyLength > 0 ? Buffer.concat(this.bodyChunks, this.bodyLength) : undefined;
    const message = this.build(this.headerList, wireBody === undefined ? undefined : this.decompress(wireBody));

    this.current = DecoderState.Complete;
    this.message = message;
    return message;
  }

  private decompress(body: Buffer): Buffer {
    if (!this.compression) return body;

    try {
      return this.compression.decompress(body, this.maxBodyBytes);
    } catch (error) {
      throw new MalformedBodyError(`Could not decompress ${this.compression.token} body`, { cause: error });
    }
  }

  private describeTruncation(): string {
    switch (this.current) {
      case DecoderState.StartLine:
        return this.pending.length === 0
          ? 'Connection closed before any response bytes arrived'
          : 'Connection closed in the middle of the status line';
      case DecoderState.Headers:
        return 'Connection closed before the end of the header section';
      default:
        return `Connection closed after ${this.bodyLength} of ${this.declaredLength ?? 0} body bytes`;
    }
  }
}

/**
 * Decodes a spamd response: `SPAMD/<version> <code> <message>`, headers, body.
 */
export class ResponseDecoder extends FrameDecoder<SpamdResponse> {
  private readonly command?: SpamdCommand;
  private protocolVersion = '';
  private statusCode = 0;
  private statusMessage = '';

  constructor(options: ResponseDecoderOptions = {}) {
    super(options);
    this.command = options.command;
  }

  protected parseStartLine(line: string): void {
    const match = STATUS_LINE_PATTERN.exec(line);
    if (!match) {
      throw new MalformedStatusLineError(`Invalid status line "${line}"`);
    }

    const [, version, code, message] = match;
    const statusCode = Number(code);
    if (!STATUS_CODE_PATTERN.test(code) || !Number.isSafeInteger(statusCode)) {
      throw new MalformedStatusLineError(`Invalid status code "${code}" in status line "${line}"`);
    }

    this.protocolVersion = version;
    this.statusCode = statusCode;
    this.statusMessage = message ?? '';
  }

  protected readsUntilClose(): boolean {
    return this.command === undefined || commandTraits(this.command).responseBody;
  }

  protected build(headers: SpamdHeaders, body: Buffer | undefined): SpamdResponse {
    return Object.freeze({
      protocolVersion: this.protocolVersion,
      statusCode: this.statusCode,
      statusMessage: this.statusMessage,
      headers,
      body,
    });
  }
}

/**
 * Decodes a client request: `<COMMAND> SPAMC/<version>`, headers, body.
 * Requests are always length-delimited, so a request without Content-length has no body.
 */
export class RequestDecoder extends FrameDecoder<SpamdRequest> {
  private command = SpamdCommand.PING;
  private protocol: RequestProtocol = 'SPAMC';
  private protocolVersion = '';

  constructor(limits: DecoderLimits = {}) {
    super(limits);
  }

  protected parseStartLine(line: string): void {
    const match = REQUEST_LINE_PATTERN.exec(line);
    const command = match?.[1];
    if (!match || command === undefined || !isSpamdCommand(command)) {
      throw new MalformedStatusLineError(`Invalid request line "${line}"`);
    }

    this.command = command;
    this.protocol = match[2] === 'SPAMD' ? 'SPAMD' : 'SPAMC';
    this.protocolVersion = match[3];
  }

  protected readsUntilClose(): boolean {
    return false;
  }

  protected build(headers: SpamdHeaders, body: Buffer | undefined): SpamdRequest {
    return Object.freeze({
      command: this.command,
      protocol: this.protocol,
      protocolVersion: this.protocolVersion,
      headers,
      body: body ?? (commandTraits(this.command).requiresBody ? Buffer.alloc(0) : undefined),
      compress: headers.has(SPAMD_HEADERS.COMPRESS),
    });
  }
}

/**
 * Decodes a complete response held in memory. The end of the buffer counts as connection close.
 */
export function decodeResponse(bytes: Buffer, options: ResponseDecoderOptions = {}): SpamdResponse {
  const decoder = new ResponseDecoder(options);
  return decoder.push(bytes) ?? decoder.end();
}

/**
 * Decodes a complete request held in memory.
 */
export function decodeRequest(bytes: Buffer, limits: DecoderLimits = {}): SpamdRequest {
  const decoder = new RequestDecoder(limits);
  return decoder.push(bytes) ?? decoder.end();
}
