import { DatagramSocket } from '../src/lib/sockets';
import { BindError, InvalidStateError, ReceiveError, SendError } from '../src/lib/errors';
import { resourceFinalizer } from '../src/lib/sockets/socket-resources';
import { SocketState } from '../src/lib/types/socket';
import { posixBackend, rejectionOf } from './helpers';

describe('DatagramSocket', () => {
  describe('exchange', () => {
    it('should carry a datagram and its reply', async () => {
      const backend = posixBackend();
      const server = await DatagramSocket.open({ backend, port: 9000 });
      const client = await DatagramSocket.open({ backend });

      expect(server.getState()).toBe(SocketState.BOUND);
      expect(server.getLocalSocketAddress()).toBe('0.0.0.0:9000');

      expect(await client.sendTo('ping', '127.0.0.1', 9000)).toBe(4);
      const request = await server.receive();
      expect(request.data.toString()).toBe('ping');
      expect(request.address).toBe('127.0.0.1');
      expect(request.port).toBe(49152);

      await server.sendTo('pong', request.address, request.port);
      const reply = await client.receive();
      expect(reply.data.toString()).toBe('pong');
      expect(reply.address).toBe('127.0.0.1');
      expect(reply.port).toBe(9000);

      client.close();
      server.close();
      expect(backend.openHandles()).toEqual([]);
    });

    it('should send to the destination given at open', async () => {
      const backend = posixBackend();
      const server = await DatagramSocket.open({ backend, port: 9000 });
      const client = await DatagramSocket.open({ backend, host: '127.0.0.1', port: 9000 });

      await client.send('hi');
      const message = await server.receive();
      expect(message.data.toString()).toBe('hi');
      expect(message.port).toBe(49152);

      client.close();
      server.close();
    });

    it('should exchange over IPv6', async () => {
      const backend = posixBackend();
      const server = await DatagramSocket.open({ backend, port: 9000, family: 'inet6' });
      const client = await DatagramSocket.open({ backend });

      await client.sendTo('six', '::1', 9000);
      const message = await server.receive();

      expect(server.getLocalSocketAddress()).toBe(':::9000');
      expect(message.address).toBe('::1');
      expect(message.port).toBe(49152);

      client.close();
      server.close();
    });

    it('should truncate a datagram longer than the buffer', async () => {
      const backend = posixBackend();
      const server = await DatagramSocket.open({ backend, port: 9000 });
      const client = await DatagramSocket.open({ backend });
      await client.sendTo('abcdefgh', '127.0.0.1', 9000);

      const buffer = Buffer.alloc(4);
      const receipt = await server.recvFrom(buffer);

      expect(receipt.bytes).toBe(4);
      expect(buffer.toString()).toBe('abcd');
      expect(receipt.address).toBe('127.0.0.1');

      client.close();
      server.close();
    });

    it('should require a destination for send', async () => {
      const socket = await DatagramSocket.open({ backend: posixBackend() });

      const error = await rejectionOf(socket.send('nowhere'));
      expect(error).toBeInstanceOf(InvalidStateError);
      expect(error.description).toBe('Socket has no default destination');
      socket.close();
    });
  });

  describe('send failures', () => {
    it('should reject an oversized datagram', async () => {
      const socket = await DatagramSocket.open({ backend: posixBackend() });

      const error = await rejectionOf(socket.sendTo(Buffer.alloc(65508), '127.0.0.1', 9000));
      expect(error).toBeInstanceOf(SendError);
      expect(error.code).toBe('EMSGSIZE');
      expect(error.message).toBe('send failed: Message too long (EMSGSIZE)');
      socket.close();
    });

    it('should need SO_BROADCAST for the broadcast address', async () => {
      const socket = await DatagramSocket.open({ backend: posixBackend() });

      const error = await rejectionOf(socket.sendTo('all', '255.255.255.255', 9000));
      expect(error).toBeInstanceOf(SendError);
      expect(error.code).toBe('EACCES');

      socket.setOption('socket', 'SO_BROADCAST', 1);
      expect(await socket.sendTo('all', '255.255.255.255', 9000)).toBe(3);
      socket.close();
    });
  });

  describe('receive', () => {
    it('should need a handle before receiving', async () => {
      const socket = await DatagramSocket.open({ backend: posixBackend() });

      const error = await rejectionOf(socket.receive());
      expect(error).toBeInstanceOf(InvalidStateError);
      expect(error.description).toBe('Socket has no handle');
      socket.close();
    });

    it('should time out a receive', async () => {
      const server = await DatagramSocket.open({ backend: posixBackend(), port: 9000 });
      server.setTimeout(20);

      const error = await rejectionOf(server.receive());
      expect(error).toBeInstanceOf(ReceiveError);
      expect(error.code).toBe('ETIMEDOUT');
      expect(error.timedOut).toBe(true);
      server.close();
    });

    it('should fail at once in non-blocking mode', async () => {
      const server = await DatagramSocket.open({ backend: posixBackend(), port: 9000 });
      server.setNonBlocking(true);

      const error = await rejectionOf(server.receive());
      expect(error.code).toBe('EAGAIN');
      expect(error.wouldBlock).toBe(true);
      server.close();
    });
  });

  describe('bind and options', () => {
    it('should refuse a second bind', async () => {
      const server = await DatagramSocket.open({ backend: posixBackend(), port: 9000 });

      const error = await rejectionOf(server.bind(9001));
      expect(error).toBeInstanceOf(BindError);
      expect(error.code).toBe('EINVAL');
      server.close();
    });

    it('should refuse to bind once a send has bound the socket', async () => {
      const socket = await DatagramSocket.open({ backend: posixBackend() });
      await socket.sendTo('x', '127.0.0.1', 9000);

      const error = await rejectionOf(socket.bind(9005));
      expect(error.code).toBe('EINVAL');
      socket.close();
    });

    it('should keep options set before the handle exists', async () => {
      const backend = posixBackend();
      const socket = await DatagramSocket.open({ backend });

      socket.setOption('socket', 'SO_BROADCAST', 1);
      expect(socket.getOption('socket', 'SO_BROADCAST')).toBe(1);
      expect(socket.getOption('socket', 'SO_RCVBUF')).toBe(212992);

      await socket.sendTo('x', '127.0.0.1', 9000);
      expect(backend.getOption(backend.openHandles()[0], 'socket', 'SO_BROADCAST')).toBe(1);
      expect(socket.getOption('socket', 'SO_BROADCAST')).toBe(1);
      socket.close();
    });

    it('should resize the receive buffer', async () => {
      const socket = await DatagramSocket.open({ backend: posixBackend(), bufferSize: 128 });

      expect(socket.getBufferSize()).toBe(128);
      socket.setBufferSize(1024);
      expect(socket.getBufferSize()).toBe(1024);
      socket.close();
    });
  });

  describe('close and transfer', () => {
    it('should close idempotently and refuse further use', async () => {
      const socket = await DatagramSocket.open({ backend: posixBackend(), port: 9000 });
      socket.close();

      expect(() => socket.close()).not.toThrow();
      expect(socket.getState()).toBe(SocketState.CLOSED);
      const error = await rejectionOf(socket.sendTo('x', '127.0.0.1', 9000));
      expect(error).toBeInstanceOf(InvalidStateError);
      expect(error.description).toBe('Socket is closed');
    });

    it('should move the bound handle into a new object', async () => {
      const socket = await DatagramSocket.open({ backend: posixBackend(), port: 9000 });

      const moved = socket.transfer();
      expect(socket.isValid()).toBe(false);
      expect(moved.getState()).toBe(SocketState.BOUND);
      expect(moved.getLocalSocketAddress()).toBe('0.0.0.0:9000');
      moved.close();
    });

    it('should track a closed target again once it takes over a handle', async () => {
      const backend = posixBackend();
      const target = await DatagramSocket.open({ backend });
      target.close();
      const source = await DatagramSocket.open({ backend, port: 9000 });
      const register = jest.spyOn(resourceFinalizer, 'register');

      target.assign(source);

      expect(target.getLocalSocketAddress()).toBe('0.0.0.0:9000');
      expect(register).toHaveBeenCalledWith(target, expect.anything(), target);
      register.mockRestore();
      target.close();
    });
  });
});
