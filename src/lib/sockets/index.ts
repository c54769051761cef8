export { Socket } from './socket';
export { ServerSocket } from './server-socket';
export { DatagramSocket } from './datagram-socket';
export { UnixSocket, isLocalSocketSupported } from './unix-socket';
export { StreamSocket, captureEndpoint } from './stream-socket';
export { SocketResources } from './socket-resources';
export type {
  DatagramMessage,
  DatagramReceipt,
  DatagramSocketOptions,
  ServerSocketOptions,
  SocketOptions,
  UnixSocketOptions
} from './types';
