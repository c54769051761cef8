import { UnixSocket, isLocalSocketSupported } from '../src/lib/sockets';
import { ConnectError, CreationError, InvalidStateError } from '../src/lib/errors';
import { PosixPlatform } from '../src/lib/platform';
import { SocketState } from '../src/lib/types/socket';
import type { LoopbackSocketBackend } from '../src/lib/backend';
import { posixBackend, rejectionOf, thrownBy } from './helpers';

const PATH = '/tmp/sockwell_test.sock';

async function listening(backend: LoopbackSocketBackend): Promise<UnixSocket> {
  const server = await UnixSocket.open(PATH, { backend });
  await server.bind();
  server.listen();
  return server;
}

describe('UnixSocket', () => {
  it('should exchange data over a local path', async () => {
    const backend = posixBackend();
    const server = await listening(backend);
    const client = await UnixSocket.open(PATH, { backend });

    await client.connect();
    const conn = await server.accept();

    expect(client.getState()).toBe(SocketState.CONNECTED);
    expect(conn.getState()).toBe(SocketState.CONNECTED);
    expect(client.getRemoteSocketAddress()).toBe(PATH);
    expect(conn.getSocketPath()).toBe(PATH);

    await client.write('Hello Unix server!');
    expect(await conn.read()).toBe('Hello Unix server!');
    await conn.write('Hello Unix client!');
    expect(await client.read()).toBe('Hello Unix client!');

    conn.close();
    client.close();
    server.close();
    expect(backend.openHandles()).toEqual([]);
  });

  it('should replace a path left behind by a closed listener', async () => {
    const backend = posixBackend();
    const first = await listening(backend);
    first.close();
    expect(backend.localPaths()).toEqual([PATH]);

    const stale = await UnixSocket.open(PATH, { backend });
    const refused = await rejectionOf(stale.connect());
    expect(refused).toBeInstanceOf(ConnectError);
    expect(refused.code).toBe('ECONNREFUSED');
    stale.close();

    const second = await listening(backend);
    const client = await UnixSocket.open(PATH, { backend });
    await client.connect();
    const conn = await second.accept();

    expect(conn.isValid()).toBe(true);
    conn.close();
    client.close();
    second.close();
  });

  it('should report a path nobody listens on', async () => {
    const client = await UnixSocket.open('/tmp/sockwell_missing.sock', { backend: posixBackend() });

    const error = await rejectionOf(client.connect());
    expect(error).toBeInstanceOf(ConnectError);
    expect(error.code).toBe('ENOENT');
    expect(error.message).toBe('connect failed: No such file or directory (ENOENT)');
    client.close();
  });

  it('should enforce the listening state order', async () => {
    const socket = await UnixSocket.open(PATH, { backend: posixBackend() });

    expect(thrownBy(() => socket.listen())).toBeInstanceOf(InvalidStateError);
    await socket.bind();
    expect(await rejectionOf(socket.accept())).toBeInstanceOf(InvalidStateError);
    expect(await rejectionOf(socket.bind())).toBeInstanceOf(InvalidStateError);
    socket.close();
  });

  it('should fail to open where local sockets are unavailable', async () => {
    const backend = posixBackend({ platform: new PosixPlatform({ supportsLocalSockets: false }) });

    expect(isLocalSocketSupported(backend)).toBe(false);
    const error = await rejectionOf(UnixSocket.open(PATH, { backend }));
    expect(error).toBeInstanceOf(CreationError);
    expect(error.code).toBe('EAFNOSUPPORT');
    expect(error.message).toBe('socket failed: Address family not supported by protocol (EAFNOSUPPORT)');
  });

  it('should report support on a platform that has local sockets', () => {
    expect(isLocalSocketSupported(posixBackend())).toBe(true);
  });

  it('should move a connection into a new object', async () => {
    const backend = posixBackend();
    const server = await listening(backend);
    const client = await UnixSocket.open(PATH, { backend });
    await client.connect();
    const conn = await server.accept();

    const moved = client.transfer();
    expect(client.isValid()).toBe(false);
    expect(moved.getSocketPath()).toBe(PATH);
    await moved.write('moved');
    expect(await conn.read()).toBe('moved');

    moved.close();
    conn.close();
    server.close();
  });
});
