import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SpamdConnection } from '../spamd-connection';
import { formatAddress } from '../spamd-address';
import type { SpamdAddress } from '../spamd-address';
import { ResponseDecoder } from '../../codec/message-decoder';
import { encodeRequest } from '../../codec/message-encoder';
import { newRequest } from '../../message/request';
import { SpamdCommand } from '../../message/spamd-command';
import {
  CancelledError,
  ConnectionError,
  TimeoutError,
  UnexpectedEofError,
  WriteError,
} from '../../errors/spamd.errors';
import { MockSpamdServer } from '../../../../test/helpers/mock-spamd-server';

const PING = encodeRequest(newRequest(SpamdCommand.PING));

describe('SpamdConnection', () => {
  let server: MockSpamdServer;
  let address: SpamdAddress;
  let connection: SpamdConnection | undefined;

  beforeEach(async () => {
    server = new MockSpamdServer();
    address = await server.start();
  });

  afterEach(async () => {
    connection?.close();
    connection = undefined;
    await server.stop();
  });

  it('should exchange PING and PONG', async () => {
    connection = await SpamdConnection.connect(address, { timeoutMs: 1000 });
    expect(connection.state).toBe('in-use');
    expect(connection.label).toBe(formatAddress(address));

    await connection.send(PING);
    const response = await connection.receive(new ResponseDecoder({ command: SpamdCommand.PING }), { timeoutMs: 1000 });

    expect(response.statusCode).toBe(0);
    expect(response.statusMessage).toBe('PONG');
    expect(server.getLastRequest()?.command).toBe(SpamdCommand.PING);
  });

  it('should connect over a Unix socket', async () => {
    const unixServer = new MockSpamdServer();
    const unixAddress = await unixServer.start({ unixSocket: true });

    try {
      const unixConnection = await SpamdConnection.connect(unixAddress);
      await unixConnection.send(PING);
      const response = await unixConnection.receive(new ResponseDecoder({ command: SpamdCommand.PING }));
      unixConnection.close();

      expect(response.statusMessage).toBe('PONG');
    } finally {
      await unixServer.stop();
    }
  });

  it('should carry several exchanges when the daemon keeps the connection open', async () => {
    server.setKeepAlive(true);
    connection = await SpamdConnection.connect(address);
    expect(connection.exchangeCount).toBe(0);

    for (let i = 0; i < 2; i++) {
      await connection.send(PING);
      const response = await connection.receive(new ResponseDecoder({ command: SpamdCommand.PING }));
      expect(response.statusMessage).toBe('PONG');
      expect(connection.isReusable()).toBe(true);
      expect(connection.exchangeCount).toBe(i + 1);
    }

    connection.markIdle();
    expect(connection.state).toBe('idle');
    connection.markInUse();
    expect(connection.state).toBe('in-use');
    expect(server.getConnectionCount()).toBe(1);
  });

  it('should hand bytes that arrived before receive() to the decoder', async () => {
    server.setKeepAlive(true);
    connection = await SpamdConnection.connect(address);

    await connection.send(PING);
    await server.waitForRequests(1);
    await new Promise((resolve) => setTimeout(resolve, 50));
    expect(connection.isReusable()).toBe(false);

    const response = await connection.receive(new ResponseDecoder({ command: SpamdCommand.PING }));

    expect(response.statusMessage).toBe('PONG');
    expect(connection.isReusable()).toBe(true);
  });

  it('should stop being reusable once the daemon closes', async () => {
    connection = await SpamdConnection.connect(address);

    await connection.send(PING);
    await connection.receive(new ResponseDecoder({ command: SpamdCommand.PING }));
    await new Promise((resolve) => setTimeout(resolve, 50));

    expect(connection.isReusable()).toBe(false);
  });

  it('should fail with UnexpectedEOF when the daemon hangs up', async () => {
    server.setResponder(() => ({ kind: 'hang-up' }));
    connection = await SpamdConnection.connect(address);

    await connection.send(PING);

    await expect(connection.receive(new ResponseDecoder({ command: SpamdCommand.PING }))).rejects.toThrow(
      new UnexpectedEofError('Connection closed before any response bytes arrived'),
    );
    expect(connection.state).toBe('closed');
  });

  it('should time out and close when no response arrives', async () => {
    server.setResponder(() => ({ kind: 'silent' }));
    connection = await SpamdConnection.connect(address);
    await connection.send(PING);

    const receive = connection.receive(new ResponseDecoder({ command: SpamdCommand.PING }), { timeoutMs: 50 });

    await expect(receive).rejects.toBeInstanceOf(TimeoutError);
    await expect(receive).rejects.toThrow(`No complete response from ${formatAddress(address)} after 50ms`);
    expect(connection.state).toBe('closed');
  });

  it('should cancel a receive when the signal aborts', async () => {
    server.setResponder(() => ({ kind: 'silent' }));
    connection = await SpamdConnection.connect(address);
    await connection.send(PING);
    const controller = new AbortController();

    const receive = connection.receive(new ResponseDecoder({ command: SpamdCommand.PING }), {
      signal: controller.signal,
    });
    controller.abort();

    await expect(receive).rejects.toBeInstanceOf(CancelledError);
    expect(connection.state).toBe('closed');
  });

  it('should refuse to write on a closed connection', async () => {
    connection = await SpamdConnection.connect(address);
    connection.close();
    connection.close();

    await expect(connection.send(PING)).rejects.toBeInstanceOf(WriteError);
  });

  it('should report a refused connection', async () => {
    const refused = new MockSpamdServer();
    const refusedAddress = await refused.start();
    await refused.stop();

    const attempt = SpamdConnection.connect(refusedAddress);

    await expect(attempt).rejects.toBeInstanceOf(ConnectionError);
    await expect(attempt).rejects.toThrow(`Connection refused by ${formatAddress(refusedAddress)}`);
  });

  it('should report an invalid port as a connection error', async () => {
    const error = await SpamdConnection.connect({ kind: 'tcp', host: '127.0.0.1', port: 70000 }).catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error instanceof ConnectionError && error.message).toMatch(/^Could not connect to 127\.0\.0\.1:70000: /);
    expect(error instanceof ConnectionError && error.address).toBe('127.0.0.1:70000');
  });

  it('should report a missing Unix socket', async () => {
    const path = join(tmpdir(), `spamd-missing-${process.pid}.sock`);

    await expect(SpamdConnection.connect({ kind: 'unix', path })).rejects.toThrow(
      `Socket unix:${path} does not exist`,
    );
  });

  it('should not connect when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(SpamdConnection.connect(address, { signal: controller.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(server.getConnectionCount()).toBe(0);
  });
});
