import {
  CandidateAddressList,
  formatIp,
  resolveCandidates,
  selectClientCandidate,
  selectServerCandidate
} from '../src/lib/resolver';
import { ConfigurationError, CreationError, ResolutionError } from '../src/lib/errors';
import type { ResolveHints } from '../src/lib/types/socket';
import { posixBackend, rejectionOf, thrownBy, win32Backend } from './helpers';

const STREAM_PASSIVE: ResolveHints = { family: 'unspec', kind: 'stream', protocol: 'tcp', passive: true };
const STREAM_ACTIVE: ResolveHints = { family: 'unspec', kind: 'stream', protocol: 'tcp', passive: false };

describe('Address resolution', () => {
  describe('resolveCandidates', () => {
    it('should resolve the wildcard addresses of both families for a server', async () => {
      const list = await resolveCandidates(posixBackend(), null, '8080', STREAM_PASSIVE);

      expect(list.length).toBe(2);
      expect([...list].map(candidate => formatIp(candidate.address))).toEqual(['0.0.0.0', '::']);
      expect([...list].map(candidate => candidate.address.port)).toEqual([8080, 8080]);
      expect(list.at(0)?.protocol).toBe('tcp');
    });

    it('should resolve the loopback addresses for an active null host', async () => {
      const list = await resolveCandidates(posixBackend(), null, '80', STREAM_ACTIVE);
      expect([...list].map(candidate => formatIp(candidate.address))).toEqual(['::1', '127.0.0.1']);
    });

    it('should keep the resolver order of a host name', async () => {
      const list = await resolveCandidates(posixBackend(), 'localhost', '80', STREAM_ACTIVE);
      expect([...list].map(candidate => candidate.family)).toEqual(['inet6', 'inet']);
    });

    it('should filter by the family hint', async () => {
      const list = await resolveCandidates(posixBackend(), 'localhost', '80', { ...STREAM_ACTIVE, family: 'inet' });
      expect([...list].map(candidate => formatIp(candidate.address))).toEqual(['127.0.0.1']);
    });

    it('should map service names to ports', async () => {
      const list = await resolveCandidates(posixBackend(), '127.0.0.1', 'http', STREAM_ACTIVE);
      expect(list.at(0)?.address.port).toBe(80);
    });

    it('should fill in the protocol for the socket kind', async () => {
      const list = await resolveCandidates(posixBackend(), '127.0.0.1', '53', {
        family: 'unspec',
        kind: 'dgram',
        protocol: 'default',
        passive: false
      });
      expect(list.at(0)?.protocol).toBe('udp');
    });

    it('should fail with EAI_SERVICE for an unknown service', async () => {
      const error = await rejectionOf(resolveCandidates(posixBackend(), null, 'no-such-service', STREAM_PASSIVE));

      expect(error).toBeInstanceOf(ResolutionError);
      expect(error.code).toBe('EAI_SERVICE');
      expect(error.message).toBe('resolve failed: Servname not supported for ai_socktype (EAI_SERVICE)');
    });

    it('should fail with EAI_SERVICE for a port above 65535', async () => {
      const error = await rejectionOf(resolveCandidates(posixBackend(), null, '65536', STREAM_PASSIVE));
      expect(error.code).toBe('EAI_SERVICE');
    });

    it('should fail with ENOTFOUND for an unknown host', async () => {
      const error = await rejectionOf(resolveCandidates(posixBackend(), 'nowhere.test', '80', STREAM_ACTIVE));

      expect(error).toBeInstanceOf(ResolutionError);
      expect(error.code).toBe('ENOTFOUND');
      expect(error.errno).toBe(-2);
    });

    it('should fail with EAI_ADDRFAMILY for a literal of the wrong family', async () => {
      const error = await rejectionOf(
        resolveCandidates(posixBackend(), '127.0.0.1', '80', { ...STREAM_ACTIVE, family: 'inet6' })
      );
      expect(error.code).toBe('EAI_ADDRFAMILY');
    });

    it('should refuse host names when only numeric hosts are allowed', async () => {
      const error = await rejectionOf(
        resolveCandidates(posixBackend(), 'localhost', '80', { ...STREAM_ACTIVE, numericHost: true })
      );
      expect(error.code).toBe('EAI_NONAME');
    });

    it('should require start-up on win32', async () => {
      const backend = win32Backend();
      const error = await rejectionOf(resolveCandidates(backend, null, '80', STREAM_PASSIVE));

      expect(error.code).toBe('WSANOTINITIALISED');
      expect(error.errno).toBe(10093);

      await backend.startup();
      const list = await resolveCandidates(backend, null, '80', STREAM_PASSIVE);
      expect(list.length).toBe(2);
    });
  });

  describe('selectServerCandidate', () => {
    it('should prefer the IPv6 candidate and make it dual-stack', async () => {
      const backend = posixBackend();
      const list = await resolveCandidates(backend, null, '8080', STREAM_PASSIVE);
      const selection = selectServerCandidate(backend, list);

      expect(selection.index).toBe(1);
      expect(backend.getOption(selection.handle, 'ipv6', 'IPV6_V6ONLY')).toBe(0);
    });

    it('should fall back to IPv4 when IPv6 sockets cannot be created', async () => {
      const backend = posixBackend({ unavailableFamilies: ['inet6'] });
      const list = await resolveCandidates(backend, null, '8080', STREAM_PASSIVE);

      expect(selectServerCandidate(backend, list).index).toBe(0);
    });

    it('should fail with the last creation error when nothing can be created', async () => {
      const backend = posixBackend({ unavailableFamilies: ['inet', 'inet6'] });
      const list = await resolveCandidates(backend, null, '8080', STREAM_PASSIVE);
      const error = thrownBy(() => selectServerCandidate(backend, list));

      expect(error).toBeInstanceOf(CreationError);
      expect(error.code).toBe('EAFNOSUPPORT');
      expect(error.operation).toBe('socket');
    });

    it('should fail with EAFNOSUPPORT for an empty list', () => {
      const error = thrownBy(() => selectServerCandidate(posixBackend(), new CandidateAddressList([])));
      expect(error.code).toBe('EAFNOSUPPORT');
    });

    it('should close the handle when dual-stack cannot be enabled', async () => {
      const backend = posixBackend({ failingOptions: { IPV6_V6ONLY: 'EINVAL' } });
      const list = await resolveCandidates(backend, null, '8080', STREAM_PASSIVE);
      const error = thrownBy(() => selectServerCandidate(backend, list));

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error.code).toBe('EINVAL');
      expect(error.operation).toBe('setsockopt');
      expect(backend.openHandles()).toEqual([]);
    });
  });

  describe('selectClientCandidate', () => {
    it('should take the first candidate that creates', async () => {
      const backend = posixBackend({ unavailableFamilies: ['inet6'] });
      const list = await resolveCandidates(backend, 'localhost', '80', STREAM_ACTIVE);

      expect(selectClientCandidate(backend, list).index).toBe(1);
    });

    it('should start from the given index', async () => {
      const backend = posixBackend();
      const list = await resolveCandidates(backend, 'localhost', '80', STREAM_ACTIVE);

      expect(selectClientCandidate(backend, list).index).toBe(0);
      expect(selectClientCandidate(backend, list, 1).index).toBe(1);
    });
  });

  describe('CandidateAddressList', () => {
    it('should be empty once released', async () => {
      const list = await resolveCandidates(posixBackend(), null, '80', STREAM_PASSIVE);
      list.release();
      list.release();

      expect(list.released).toBe(true);
      expect(list.length).toBe(0);
      expect(list.at(0)).toBeNull();
      expect([...list]).toEqual([]);
    });
  });
});
