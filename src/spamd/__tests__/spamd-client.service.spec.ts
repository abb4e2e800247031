import { Test, TestingModule } from '@nestjs/testing';
import { SpamdClientService } from '../spamd-client.service';
import { SPAMD_CONFIG, SPAMD_CONNECTOR } from '../spamd.tokens';
import type { SpamdConfig } from '../../config/config.types';
import { newRequest } from '../message/request';
import { SpamdCommand } from '../message/spamd-command';
import { formatAddress } from '../transport/spamd-address';
import { SpamdConnection } from '../transport/spamd-connection';
import type { Connector } from '../pool/connection-pool';
import type { SpamdAddress } from '../transport/spamd-address';
import {
  CancelledError,
  ConnectionError,
  DaemonError,
  EncodeError,
  InvalidRequestError,
  MalformedHeaderError,
  MalformedStatusLineError,
  TimeoutError,
  UnexpectedEofError,
  WriteError,
  isSpamdError,
} from '../errors/spamd.errors';
import { MockSpamdServer, spamdResponse } from '../../../test/helpers/mock-spamd-server';
import { silenceNestLogger } from '../../../test/helpers/silence-logger';

const MESSAGE = 'Subject: hello\r\n\r\nHello there\r\n';

function buildConfig(address: SpamdAddress, overrides: Partial<SpamdConfig> = {}): SpamdConfig {
  return {
    address,
    protocolVersion: '1.5',
    compress: false,
    connectTimeout: 1000,
    timeout: 2000,
    keepAlive: false,
    maxConnections: 4,
    poolOverflow: 'queue',
    connectRetries: 0,
    retryDelay: 1,
    idleTimeout: 10_000,
    maxHeaderSize: 65536,
    maxBodySize: 1048576,
    ...overrides,
  };
}

describe('SpamdClientService', () => {
  let server: MockSpamdServer;
  let address: SpamdAddress;
  let label: string;
  let restoreLogger: () => void;
  let service: SpamdClientService;

  const createService = async (
    overrides: Partial<SpamdConfig> = {},
    connector?: Connector,
  ): Promise<SpamdClientService> => {
    const providers = [SpamdClientService, { provide: SPAMD_CONFIG, useValue: buildConfig(address, overrides) }];
    const module: TestingModule = await Test.createTestingModule({
      providers: connector ? [...providers, { provide: SPAMD_CONNECTOR, useValue: connector }] : providers,
    }).compile();

    return module.get<SpamdClientService>(SpamdClientService);
  };

  beforeEach(async () => {
    restoreLogger = silenceNestLogger();
    server = new MockSpamdServer();
    address = await server.start();
    label = formatAddress(address);
    service = await createService();
  });

  afterEach(async () => {
    service.onModuleDestroy();
    await server.stop();
    restoreLogger();
  });

  describe('commands', () => {
    it('should ping', async () => {
      const result = await service.ping();

      expect(result.pong).toBe(true);
      expect(result.statusCode).toBe(0);
      expect(result.statusMessage).toBe('PONG');
      expect(server.getLastRequest()?.command).toBe(SpamdCommand.PING);
    });

    it('should not send the User header with PING', async () => {
      service = await createService({ user: 'alice' });

      await service.ping();

      expect(server.getLastRequest()?.headers).toEqual({});
    });

    it('should check a message', async () => {
      service = await createService({ user: 'alice' });

      const result = await service.check(MESSAGE);

      expect(result).toMatchObject({ isSpam: false, score: 1.5, threshold: 5, statusCode: 0 });
      const request = server.getLastRequest();
      expect(request?.command).toBe(SpamdCommand.CHECK);
      expect(request?.protocol).toBe('SPAMC');
      expect(request?.headers).toEqual({ User: 'alice', 'Content-length': String(Buffer.byteLength(MESSAGE)) });
      expect(request?.body?.toString()).toBe(MESSAGE);
    });

    it('should let callers override the user', async () => {
      service = await createService({ user: 'alice' });

      await service.check(MESSAGE, { user: 'bob' });

      expect(server.getLastRequest()?.headers.User).toBe('bob');
    });

    it('should list symbols', async () => {
      const result = await service.symbols(MESSAGE);

      expect(result.symbols).toEqual(['BAYES_00', 'HTML_MESSAGE']);
      expect(result.score).toBe(1.5);
    });

    it('should return an empty symbol list for an empty body', async () => {
      server.setResponse(spamdResponse(0, 'EX_OK', { Spam: 'False ; 0.0 / 5.0', 'Content-length': '0' }));

      const result = await service.symbols(MESSAGE);

      expect(result.symbols).toEqual([]);
    });

    it('should return the report', async () => {
      const result = await service.report(MESSAGE);

      expect(result.report).toBe('Content analysis details');
    });

    it('should only return the conditional report for spam', async () => {
      const ham = await service.reportIfSpam(MESSAGE);
      expect(ham.report).toBeUndefined();

      server.setResponse(spamdResponse(0, 'EX_OK', { Spam: 'True ; 9.0 / 5.0' }, 'Spam report'));
      const spam = await service.reportIfSpam(MESSAGE);

      expect(spam.isSpam).toBe(true);
      expect(spam.report).toBe('Spam report');
    });

    it('should return the processed message', async () => {
      const result = await service.process(MESSAGE);

      expect(result.message.toString()).toBe(MESSAGE);
    });

    it('should return the rewritten headers', async () => {
      const result = await service.headersOnly(MESSAGE);

      expect(result.messageHeaders).toBe('X-Spam-Flag: NO\r\n');
      expect(server.getLastRequest()?.command).toBe(SpamdCommand.HEADERS);
    });

    it('should compress the message when asked', async () => {
      const result = await service.process(MESSAGE, { compress: true });

      const request = server.getLastRequest();
      expect(request?.compressed).toBe(true);
      expect(request?.headers.Compress).toBe('zlib');
      expect(request?.body?.toString()).toBe(MESSAGE);
      expect(result.message.toString()).toBe(MESSAGE);
    });
  });

  describe('tell', () => {
    it('should learn spam locally by default', async () => {
      const result = await service.tell(MESSAGE, 'spam');

      const request = server.getLastRequest();
      expect(request?.headers['Message-class']).toBe('spam');
      expect(request?.headers.Set).toBe('local');
      expect(result.didSet).toEqual({ local: true, remote: false });
      expect(result.didRemove).toEqual({ local: false, remote: false });
    });

    it('should learn ham on both destinations', async () => {
      const result = await service.tell(MESSAGE, 'ham', { destinations: { remote: true } });

      expect(server.getLastRequest()?.headers.Set).toBe('local, remote');
      expect(result.didSet).toEqual({ local: true, remote: true });
    });

    it('should forget a message', async () => {
      const result = await service.tell(MESSAGE, 'forget', { destinations: { local: false, remote: true } });

      const request = server.getLastRequest();
      expect(request?.headers.Remove).toBe('remote');
      expect(request?.headers['Message-class']).toBeUndefined();
      expect(result.didRemove).toEqual({ local: false, remote: true });
    });

    it('should require a destination', async () => {
      await expect(service.tell(MESSAGE, 'spam', { destinations: { local: false } })).rejects.toBeInstanceOf(
        InvalidRequestError,
      );
      expect(server.getConnectionCount()).toBe(0);
    });
  });

  describe('failures', () => {
    it('should raise DaemonError for a non-zero status', async () => {
      server.setResponse(spamdResponse(76, 'Bad header line: Content-length'));

      const error = await service.check(MESSAGE).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(DaemonError);
      expect(error instanceof DaemonError && error.statusCode).toBe(76);
      expect(error instanceof DaemonError && error.command).toBe('CHECK');
      expect(error instanceof DaemonError && error.address).toBe(label);
    });

    it('should reject a response without a Spam header', async () => {
      server.setResponse(spamdResponse(0, 'EX_OK'));

      await expect(service.check(MESSAGE)).rejects.toThrow(new MalformedHeaderError('Response has no Spam header'));
    });

    it('should reject an unparseable Spam header', async () => {
      server.setResponse(spamdResponse(0, 'EX_OK', { Spam: 'maybe' }));

      await expect(service.check(MESSAGE)).rejects.toThrow('Unparseable Spam header "maybe"');
    });

    it('should annotate protocol errors with command and address', async () => {
      server.setResponder(() => ({ kind: 'raw', bytes: Buffer.from('HTTP/1.1 200 OK\r\n\r\n') }));

      const error = await service.check(MESSAGE).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(MalformedStatusLineError);
      expect(isSpamdError(error) && error.command).toBe('CHECK');
      expect(isSpamdError(error) && error.address).toBe(label);
    });

    it('should time out a silent daemon', async () => {
      server.setResponder(() => ({ kind: 'silent' }));

      const pending = service.check(MESSAGE, { timeoutMs: 50 });

      await expect(pending).rejects.toBeInstanceOf(TimeoutError);
      await expect(pending).rejects.toThrow(`CHECK to ${label} timed out after 50ms`);
    });

    it('should cancel on the caller signal', async () => {
      server.setResponder(() => ({ kind: 'silent' }));
      const controller = new AbortController();

      const pending = service.check(MESSAGE, { signal: controller.signal });
      await server.waitForRequests(1);
      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });

    it('should never touch the wire when encoding fails', async () => {
      const request = newRequest(SpamdCommand.CHECK, { 'Content-length': '9' }, 'hello');

      await expect(service.execute(request)).rejects.toBeInstanceOf(EncodeError);
      expect(server.getConnectionCount()).toBe(0);
    });

    it('should report an unreachable daemon', async () => {
      await server.stop();
      service = await createService({ connectRetries: 1 });

      const error = await service.ping().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ConnectionError);
      expect(error instanceof ConnectionError && error.message).toBe(`Connection refused by ${label}`);
      expect(error instanceof ConnectionError && error.command).toBe('PING');
      server = new MockSpamdServer();
    });
  });

  describe('connections', () => {
    it('should open one connection per exchange without keep-alive', async () => {
      await service.ping();
      await service.ping();

      expect(server.getConnectionCount()).toBe(2);
    });

    it('should reuse a connection with keep-alive', async () => {
      server.setKeepAlive(true);
      service = await createService({ keepAlive: true });

      await service.ping();
      await service.check(MESSAGE);
      await service.ping();

      expect(server.getConnectionCount()).toBe(1);
    });

    it('should resend on a fresh connection when a kept-alive one was closed by spamd', async () => {
      service = await createService({ keepAlive: true, maxConnections: 1 });

      const results = await Promise.allSettled([service.ping(), service.ping(), service.ping()]);

      expect(results.map((result) => result.status)).toEqual(['fulfilled', 'fulfilled', 'fulfilled']);
      expect(results.map((result) => result.status === 'fulfilled' && result.value.pong)).toEqual([true, true, true]);
    });

    it('should not resend when a fresh connection is hung up on', async () => {
      server.setResponder(() => ({ kind: 'hang-up' }));
      service = await createService({ keepAlive: true });

      await expect(service.check(MESSAGE)).rejects.toBeInstanceOf(UnexpectedEofError);
      expect(server.getRequests()).toHaveLength(1);
      expect(server.getConnectionCount()).toBe(1);
    });

    it('should discard a connection whose write failed part way', async () => {
      server.setKeepAlive(true);
      const opened: SpamdConnection[] = [];
      const connector: Connector = async (target, options) => {
        const connection = await SpamdConnection.connect(target, options);
        if (opened.length === 0) {
          const send = connection.send.bind(connection);
          jest.spyOn(connection, 'send').mockImplementationOnce(async (bytes, sendOptions) => {
            await send(bytes.subarray(0, 10), sendOptions);
            connection.close();
            return send(bytes, sendOptions);
          });
        }
        opened.push(connection);
        return connection;
      };
      service = await createService({ keepAlive: true }, connector);

      const error = await service.check(MESSAGE).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(WriteError);
      expect(error instanceof WriteError && error.command).toBe('CHECK');
      expect(opened[0].state).toBe('closed');
      expect(service.poolStats()).toEqual({ idle: 0, inUse: 0, opening: 0, waiting: 0 });

      const result = await service.check(MESSAGE);

      expect(result.isSpam).toBe(false);
      expect(opened).toHaveLength(2);
      expect(opened[1]).not.toBe(opened[0]);
      expect(server.getConnectionCount()).toBe(2);
      expect(service.poolStats()?.idle).toBe(1);
    });

    it('should keep the connection after a daemon error', async () => {
      server.setKeepAlive(true);
      server.setResponse(spamdResponse(69, 'Service unavailable'));
      service = await createService({ keepAlive: true });

      await expect(service.ping()).rejects.toBeInstanceOf(DaemonError);
      server.resetResponseSettings();
      server.setKeepAlive(true);
      await service.ping();

      expect(server.getConnectionCount()).toBe(1);
    });

    it('should not mix up concurrent exchanges', async () => {
      service = await createService({ maxConnections: 2 });
      const bodies = Array.from({ length: 6 }, (_, i) => `Subject: message ${i}\r\n\r\nbody ${i}`);

      const results = await Promise.all(bodies.map((body) => service.process(body)));

      expect(results.map((result) => result.message.toString())).toEqual(bodies);
    });

    it('should talk to an address given per call', async () => {
      const unixServer = new MockSpamdServer();
      const unixAddress = await unixServer.start({ unixSocket: true });

      try {
        const result = await service.ping({ address: formatAddress(unixAddress) });

        expect(result.pong).toBe(true);
        expect(unixServer.getConnectionCount()).toBe(1);
        expect(server.getConnectionCount()).toBe(0);
      } finally {
        service.onModuleDestroy();
        await unixServer.stop();
      }
    });

    it('should expose the pool through acquireConnection and releaseConnection', async () => {
      server.setKeepAlive(true);
      service = await createService({ keepAlive: true });

      const connection = await service.acquireConnection();
      expect(connection.state).toBe('in-use');
      service.releaseConnection(connection);
      expect(connection.state).toBe('idle');

      const again = await service.acquireConnection();
      expect(again).toBe(connection);
      service.releaseConnection(again, false);
      expect(again.state).toBe('closed');
    });

    it('should close pooled connections on module destroy', async () => {
      server.setKeepAlive(true);
      service = await createService({ keepAlive: true });
      const connection = await service.acquireConnection();
      service.releaseConnection(connection);

      service.onModuleDestroy();

      expect(connection.state).toBe('closed');
    });
  });
});
