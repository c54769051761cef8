import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { NodeSocketBackend } from '../src/lib/backend';
import { ReceiveError, WriteError } from '../src/lib/errors';
import { PosixPlatform } from '../src/lib/platform';
import { DatagramSocket, ServerSocket, Socket, UnixSocket } from '../src/lib/sockets';
import { rejectionOf } from './helpers';

function portOf(address: string): number {
  return Number(address.slice(address.lastIndexOf(':') + 1));
}

describe('NodeSocketBackend sockets', () => {
  let backend: NodeSocketBackend;

  beforeEach(() => {
    backend = new NodeSocketBackend({ platform: new PosixPlatform() });
  });

  afterEach(() => {
    for (const handle of backend.openHandles()) {
      backend.close(handle);
    }
  });

  async function listening(): Promise<ServerSocket> {
    const server = await ServerSocket.open(0, { backend, host: '127.0.0.1' });
    await server.bind();
    server.listen();
    return server;
  }

  describe('tcp', () => {
    it('should exchange data over 127.0.0.1', async () => {
      const server = await listening();
      const port = server.getLocalPort();
      const client = await Socket.open('127.0.0.1', port, { backend });
      await client.connect();
      const conn = await server.accept();

      expect(port).toBeGreaterThan(0);
      expect(conn.getRemoteSocketAddress()).toBe(client.getLocalSocketAddress());
      expect(client.getRemoteSocketAddress()).toBe(`127.0.0.1:${port}`);

      expect(await client.write('Hello server!')).toBe(13);
      expect((await conn.readExact(13)).toString()).toBe('Hello server!');
      expect(await conn.write('Hello client!')).toBe(13);
      expect((await client.readExact(13)).toString()).toBe('Hello client!');

      conn.close();
      client.close();
      server.close();
      expect(backend.openHandles()).toEqual([]);
    });

    it('should time out a write the peer never reads', async () => {
      const server = await listening();
      const client = await Socket.open('127.0.0.1', server.getLocalPort(), { backend });
      await client.connect();
      const conn = await server.accept();
      client.setTimeout(100);

      const error = await rejectionOf(client.write(Buffer.alloc(64 * 1024 * 1024)));
      expect(error).toBeInstanceOf(WriteError);
      expect(error.code).toBe('ETIMEDOUT');

      conn.close();
      client.close();
      server.close();
    });
  });

  describe('udp', () => {
    it('should deliver a datagram to a bound socket', async () => {
      const receiver = await DatagramSocket.open({ backend, port: 0 });
      const port = portOf(receiver.getLocalSocketAddress());
      const sender = await DatagramSocket.open({ backend });

      expect(await sender.sendTo('gtest-udp', '127.0.0.1', port)).toBe(9);
      const message = await receiver.receive();

      expect(message.data.toString()).toBe('gtest-udp');
      expect(message.data).toHaveLength(9);
      expect(message.address).toBe('127.0.0.1');
      expect(message.port).toBe(portOf(sender.getLocalSocketAddress()));

      sender.close();
      receiver.close();
    });

    it('should time out a receive after the configured delay', async () => {
      const receiver = await DatagramSocket.open({ backend, port: 0 });
      receiver.setTimeout(100);
      const started = Date.now();

      const error = await rejectionOf(receiver.receive());
      expect(error).toBeInstanceOf(ReceiveError);
      expect(error.code).toBe('ETIMEDOUT');
      expect(Date.now() - started).toBeGreaterThanOrEqual(90);
      receiver.close();
    });
  });

  describe('local sockets', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sockwell-node-'));
    });

    afterEach(async () => {
      await fs.remove(dir);
    });

    it('should bind over a file left at the path', async () => {
      const socketPath = path.join(dir, 'stale.sock');
      await fs.writeFile(socketPath, 'stale');

      const server = await UnixSocket.open(socketPath, { backend });
      await server.bind();
      server.listen();
      const client = await UnixSocket.open(socketPath, { backend });
      await client.connect();
      const conn = await server.accept();

      expect(client.getRemoteSocketAddress()).toBe(socketPath);
      await client.write('Hello Unix server!');
      expect((await conn.readExact(18)).toString()).toBe('Hello Unix server!');

      conn.close();
      client.close();
      server.close();
    });
  });
});
