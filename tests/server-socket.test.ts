import { ServerSocket, Socket } from '../src/lib/sockets';
import { NetworkInitializer } from '../src/lib/runtime';
import {
  AcceptError,
  BindError,
  ConfigurationError,
  InvalidStateError,
  ResolutionError
} from '../src/lib/errors';
import { resourceFinalizer } from '../src/lib/sockets/socket-resources';
import { SocketState } from '../src/lib/types/socket';
import { posixBackend, recordDiagnostics, rejectionOf, thrownBy, win32Backend } from './helpers';

describe('ServerSocket', () => {
  describe('open and bind', () => {
    it('should bind a dual-stack wildcard socket', async () => {
      const backend = posixBackend();
      const server = await ServerSocket.open(8080, { backend });

      expect(server.getState()).toBe(SocketState.UNBOUND);
      await server.bind();

      expect(server.getState()).toBe(SocketState.BOUND);
      expect(server.getLocalSocketAddress()).toBe(':::8080');
      expect(server.getLocalPort()).toBe(8080);
      server.close();
    });

    it('should bind IPv4 only when asked for the inet family', async () => {
      const server = await ServerSocket.open(8080, { backend: posixBackend(), family: 'inet' });
      await server.bind();

      expect(server.getLocalSocketAddress()).toBe('0.0.0.0:8080');
      server.close();
    });

    it('should bind a specific local address', async () => {
      const server = await ServerSocket.open(8081, { backend: posixBackend(), host: '127.0.0.1' });
      await server.bind();

      expect(server.getLocalSocketAddress()).toBe('127.0.0.1:8081');
      server.close();
    });

    it('should reject port 0 with EINVAL', async () => {
      const server = await ServerSocket.open(0, { backend: posixBackend() });
      const error = await rejectionOf(server.bind());

      expect(error).toBeInstanceOf(BindError);
      expect(error.code).toBe('EINVAL');
      expect(error.message).toBe('bind failed: Invalid argument (EINVAL)');
      server.close();
    });

    it('should report a port already in use', async () => {
      const backend = posixBackend();
      const first = await ServerSocket.open(8080, { backend });
      const second = await ServerSocket.open(8080, { backend });
      await first.bind();

      const error = await rejectionOf(second.bind());
      expect(error).toBeInstanceOf(BindError);
      expect(error.code).toBe('EADDRINUSE');

      first.close();
      second.close();
    });

    it('should refuse a second bind', async () => {
      const server = await ServerSocket.open(8080, { backend: posixBackend() });
      await server.bind();

      const error = await rejectionOf(server.bind());
      expect(error).toBeInstanceOf(InvalidStateError);
      server.close();
    });

    it('should release everything when the reuse option fails', async () => {
      const backend = posixBackend({ failingOptions: { SO_REUSEADDR: 'ENOPROTOOPT' } });
      const error = await rejectionOf(ServerSocket.open(8080, { backend }));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.code).toBe('ENOPROTOOPT');
      expect(backend.openHandles()).toEqual([]);
    });

    it('should use the exclusive reuse option on win32', async () => {
      const backend = win32Backend({ failingOptions: { SO_EXCLUSIVEADDRUSE: 'EINVAL' } });
      await NetworkInitializer.withNetwork(async () => {
        const error = await rejectionOf(ServerSocket.open(8080, { backend }));
        expect(error.code).toBe('EINVAL');
        expect(error.errno).toBe(10022);
      }, backend);
    });

    it('should fail to open on win32 before start-up', async () => {
      const error = await rejectionOf(ServerSocket.open(8080, { backend: win32Backend() }));

      expect(error).toBeInstanceOf(ResolutionError);
      expect(error.code).toBe('WSANOTINITIALISED');
    });
  });

  describe('listen and accept', () => {
    it('should require bind before listen and listen before accept', async () => {
      const server = await ServerSocket.open(8080, { backend: posixBackend() });

      expect(thrownBy(() => server.listen())).toBeInstanceOf(InvalidStateError);
      await server.bind();
      expect(await rejectionOf(server.accept())).toBeInstanceOf(InvalidStateError);

      server.listen();
      expect(server.getState()).toBe(SocketState.LISTENING);
      server.close();
    });

    it('should accept an IPv4 client on the dual-stack socket with a normalized peer', async () => {
      const backend = posixBackend();
      const server = await ServerSocket.open(8080, { backend });
      await server.bind();
      server.listen();

      const client = await Socket.open('127.0.0.1', 8080, { backend });
      await client.connect();
      const conn = await server.accept();

      expect(conn.getState()).toBe(SocketState.CONNECTED);
      expect(conn.getRemoteSocketAddress()).toBe('127.0.0.1:49152');
      expect(client.getLocalSocketAddress()).toBe('127.0.0.1:49152');
      expect(client.getRemoteSocketAddress()).toBe('127.0.0.1:8080');

      conn.close();
      client.close();
      server.close();
    });

    it('should accept a connection that arrives while waiting', async () => {
      const backend = posixBackend();
      const server = await ServerSocket.open(8080, { backend });
      await server.bind();
      server.listen();

      const pending = server.accept();
      const client = await Socket.open('::1', 8080, { backend });
      await client.connect();
      const conn = await pending;

      expect(conn.getRemoteSocketAddress()).toBe('::1:49152');

      conn.close();
      client.close();
      server.close();
    });

    it('should time out an accept when a timeout is set', async () => {
      const server = await ServerSocket.open(8080, { backend: posixBackend() });
      await server.bind();
      server.listen();
      server.setTimeout(20);

      const error = await rejectionOf(server.accept());
      expect(error).toBeInstanceOf(AcceptError);
      expect(error.code).toBe('ETIMEDOUT');
      expect(error.timedOut).toBe(true);
      server.close();
    });

    it('should fail at once in non-blocking mode', async () => {
      const server = await ServerSocket.open(8080, { backend: posixBackend() });
      await server.bind();
      server.listen();
      server.setNonBlocking(true);

      const error = await rejectionOf(server.accept());
      expect(error).toBeInstanceOf(AcceptError);
      expect(error.code).toBe('EAGAIN');
      expect(error.wouldBlock).toBe(true);
      server.close();
    });

    it('should settle a pending accept with EBADF when closed', async () => {
      const server = await ServerSocket.open(8080, { backend: posixBackend() });
      await server.bind();
      server.listen();
      const pending = server.accept();
      const recorder = recordDiagnostics();

      server.close();
      const error = await rejectionOf(pending);
      recorder.stop();

      expect(error).toBeInstanceOf(AcceptError);
      expect(error.code).toBe('EBADF');
    });
  });

  describe('close', () => {
    it('should report a failed shutdown and still release the handle', async () => {
      const backend = posixBackend();
      const server = await ServerSocket.open(8080, { backend });
      await server.bind();
      server.listen();
      const recorder = recordDiagnostics();

      server.close();
      recorder.stop();

      expect(recorder.cleanup).toHaveLength(1);
      expect(recorder.cleanup[0].source).toBe('server-socket');
      expect(recorder.cleanup[0].operation).toBe('shutdown');
      expect(server.isValid()).toBe(false);
      expect(server.getState()).toBe(SocketState.CLOSED);
      expect(backend.openHandles()).toEqual([]);
    });

    it('should do nothing the second time', async () => {
      const server = await ServerSocket.open(8080, { backend: posixBackend() });
      server.close();

      expect(() => server.close()).not.toThrow();
      const error = await rejectionOf(server.bind());
      expect(error).toBeInstanceOf(InvalidStateError);
      expect(error.description).toBe('Socket is closed');
    });

    it('should free the port for a new server', async () => {
      const backend = posixBackend();
      const first = await ServerSocket.open(8080, { backend });
      await first.bind();
      first.close();

      const second = await ServerSocket.open(8080, { backend });
      await second.bind();
      expect(second.getLocalPort()).toBe(8080);
      second.close();
    });
  });

  describe('ownership transfer', () => {
    it('should move the handle and leave the source invalid', async () => {
      const backend = posixBackend();
      const server = await ServerSocket.open(8080, { backend });
      await server.bind();

      const moved = server.transfer();

      expect(server.isValid()).toBe(false);
      expect(moved.isValid()).toBe(true);
      expect(moved.getState()).toBe(SocketState.BOUND);
      expect(moved.getLocalPort()).toBe(8080);
      expect(thrownBy(() => server.listen())).toBeInstanceOf(InvalidStateError);
      moved.close();
    });

    it('should close what the target held on assignment', async () => {
      const backend = posixBackend();
      const a = await ServerSocket.open(8080, { backend });
      const b = await ServerSocket.open(8081, { backend });
      await b.bind();
      const recorder = recordDiagnostics();

      a.assign(b);
      recorder.stop();

      expect(backend.openHandles()).toHaveLength(1);
      expect(a.getLocalPort()).toBe(8081);
      expect(b.isValid()).toBe(false);
      a.close();
    });

    it('should track a closed target again once it takes over a handle', async () => {
      const backend = posixBackend();
      const target = await ServerSocket.open(8080, { backend });
      target.close();
      const source = await ServerSocket.open(8081, { backend });
      const register = jest.spyOn(resourceFinalizer, 'register');

      target.assign(source);

      expect(target.isValid()).toBe(true);
      expect(register).toHaveBeenCalledWith(target, expect.anything(), target);
      register.mockRestore();
      target.close();
    });

    it('should not track a target that took over nothing', async () => {
      const backend = posixBackend();
      const target = await ServerSocket.open(8080, { backend });
      const source = await ServerSocket.open(8081, { backend });
      source.close();
      const register = jest.spyOn(resourceFinalizer, 'register');

      target.assign(source);

      expect(target.isValid()).toBe(false);
      expect(register).not.toHaveBeenCalled();
      expect(backend.openHandles()).toEqual([]);
      register.mockRestore();
    });
  });
});
