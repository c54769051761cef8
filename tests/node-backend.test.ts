// Mock name resolution
jest.mock('dns', () => {
  const actual = jest.requireActual<typeof import('dns')>('dns');
  return {
    ...actual,
    promises: {
      ...actual.promises,
      lookup: jest.fn()
    }
  };
});

// Mock interface enumeration
jest.mock('os', () => ({
  ...jest.requireActual<typeof import('os')>('os'),
  networkInterfaces: jest.fn(() => ({}))
}));

import * as dns from 'dns';
import * as os from 'os';
import { NodeSocketBackend } from '../src/lib/backend';
import { ResolutionError, SystemError } from '../src/lib/errors';
import { getHostAddr } from '../src/lib/interfaces';
import { PosixPlatform } from '../src/lib/platform';
import { formatIp } from '../src/lib/resolver/address-codec';
import { ServerSocket, Socket } from '../src/lib/sockets';
import { rejectionOf } from './helpers';

// Typed against the { all: true } overload the backend calls
const mockLookup = dns.promises.lookup as unknown as jest.MockedFunction<
  (hostname: string, options: dns.LookupAllOptions) => Promise<dns.LookupAddress[]>
>;
const mockNetworkInterfaces = jest.mocked(os.networkInterfaces);

const LOOPBACK_V4: os.NetworkInterfaceInfo = {
  address: '127.0.0.1',
  netmask: '255.0.0.0',
  family: 'IPv4',
  mac: '00:00:00:00:00:00',
  internal: true,
  cidr: '127.0.0.1/8'
};

const LOOPBACK_V6: os.NetworkInterfaceInfo = {
  address: '::1',
  netmask: 'ffff:ffff:ffff:ffff:ffff:ffff:ffff:ffff',
  family: 'IPv6',
  mac: '00:00:00:00:00:00',
  internal: true,
  cidr: '::1/128',
  scopeid: 0
};

describe('NodeSocketBackend', () => {
  let backend: NodeSocketBackend;

  beforeEach(() => {
    jest.clearAllMocks();
    backend = new NodeSocketBackend({ platform: new PosixPlatform() });
  });

  describe('resolve', () => {
    it('should keep the resolver order of a name lookup', async () => {
      mockLookup.mockResolvedValue([
        { address: '::1', family: 6 },
        { address: '127.0.0.1', family: 4 }
      ]);

      const candidates = await backend.resolve('example.test', '8080', {
        family: 'unspec',
        kind: 'stream',
        protocol: 'tcp',
        passive: false
      });

      expect(mockLookup).toHaveBeenCalledWith('example.test', { all: true, family: 0, verbatim: true });
      expect(candidates.map(candidate => formatIp(candidate.address))).toEqual(['::1', '127.0.0.1']);
      expect(candidates.map(candidate => candidate.address.port)).toEqual([8080, 8080]);
      expect(candidates.map(candidate => candidate.protocol)).toEqual(['tcp', 'tcp']);
    });

    it('should ask the resolver for one family only', async () => {
      mockLookup.mockResolvedValue([{ address: '192.0.2.7', family: 4 }]);

      const candidates = await backend.resolve('example.test', '53', {
        family: 'inet',
        kind: 'dgram',
        protocol: 'default',
        passive: false
      });

      expect(mockLookup).toHaveBeenCalledWith('example.test', { all: true, family: 4, verbatim: true });
      expect(candidates).toHaveLength(1);
      expect(candidates[0].protocol).toBe('udp');
    });

    it('should not look up numeric hosts and should map service names', async () => {
      const candidates = await backend.resolve('127.0.0.1', 'http', {
        family: 'unspec',
        kind: 'stream',
        protocol: 'tcp',
        passive: false
      });

      expect(mockLookup).not.toHaveBeenCalled();
      expect(candidates[0].address.port).toBe(80);
    });

    it('should translate a failed lookup', async () => {
      mockLookup.mockRejectedValue(Object.assign(new Error('getaddrinfo ENOTFOUND nowhere.test'), { code: 'ENOTFOUND' }));

      await expect(
        backend.resolve('nowhere.test', '80', { family: 'unspec', kind: 'stream', protocol: 'tcp', passive: false })
      ).rejects.toBeInstanceOf(SystemError);

      const error = await rejectionOf(Socket.open('nowhere.test', 80, { backend }));
      expect(error).toBeInstanceOf(ResolutionError);
      expect(error.code).toBe('ENOTFOUND');
      expect(error.message).toBe('resolve failed: Name or service not known (ENOTFOUND)');
    });
  });

  describe('networkInterfaces', () => {
    it('should flatten the interface table', () => {
      mockNetworkInterfaces.mockReturnValue({
        lo: [
          { address: '127.0.0.1', netmask: '255.0.0.0', family: 'IPv4', mac: '00:00:00:00:00:00', internal: true, cidr: '127.0.0.1/8' }
        ],
        eth0: [
          { address: '192.0.2.10', netmask: '255.255.255.0', family: 'IPv4', mac: '02:00:00:00:00:01', internal: false, cidr: '192.0.2.10/24' },
          {
            address: 'fe80::1',
            netmask: 'ffff:ffff:ffff:ffff::',
            family: 'IPv6',
            mac: '02:00:00:00:00:01',
            internal: false,
            cidr: 'fe80::1/64',
            scopeid: 2
          }
        ]
      });

      expect(getHostAddr(backend)).toEqual([
        'lo IPv4 Address 127.0.0.1',
        'eth0 IPv4 Address 192.0.2.10',
        'eth0 IPv6 Address fe80::1'
      ]);
    });

    it('should return nothing when no interface is up', () => {
      mockNetworkInterfaces.mockReturnValue({});

      expect(backend.networkInterfaces()).toEqual([]);
    });
  });

  describe('socket creation', () => {
    it('should select the IPv4 wildcard on a host without IPv6', async () => {
      mockNetworkInterfaces.mockReturnValue({ lo: [LOOPBACK_V4] });

      expect(() => backend.create('inet6', 'stream', 'tcp')).toThrow(SystemError);
      const server = await ServerSocket.open(0, { backend });
      const [handle] = backend.openHandles();

      expect(backend.openHandles()).toHaveLength(1);
      expect(() => backend.getOption(handle, 'ipv6', 'IPV6_V6ONLY')).toThrow(SystemError);
      expect(mockNetworkInterfaces).toHaveBeenCalledTimes(1);
      server.close();
    });

    it('should select the dual-stack wildcard when IPv6 is present', async () => {
      mockNetworkInterfaces.mockReturnValue({ lo: [LOOPBACK_V4, LOOPBACK_V6] });

      const server = await ServerSocket.open(0, { backend });
      const [handle] = backend.openHandles();

      expect(backend.getOption(handle, 'ipv6', 'IPV6_V6ONLY')).toBe(0);
      server.close();
      expect(backend.openHandles()).toEqual([]);
    });
  });
});
