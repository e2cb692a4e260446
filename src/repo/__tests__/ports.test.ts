import net from 'node:net';
import { describe, expect, it } from 'vitest';
import { PortAllocator, isPortAvailable, portIndex } from '../ports.js';

const POOL = { base: 9100, pool_size: 15, host: '127.0.0.1' };

describe('portIndex', () => {
  it('reads the first eight alphanumeric characters as base 36', () => {
    expect(portIndex('abc12345', 15)).toBe(8);
    expect(portIndex('deadbeef', 15)).toBe(9);
    expect(portIndex('ABC12345', 15)).toBe(8);
  });

  it('skips punctuation', () => {
    expect(portIndex('a-b_c', 15)).toBe(3);
  });

  it('hashes IDs without alphanumeric characters', () => {
    const index = portIndex('----', 15);
    expect(index).toBe(portIndex('----', 15));
    expect(index).toBeGreaterThanOrEqual(0);
    expect(index).toBeLessThan(15);
  });
});

describe('PortAllocator', () => {
  it('maps a run ID to the same port every time', () => {
    const allocator = new PortAllocator(POOL, async () => true);
    expect(allocator.deterministicPort('abc12345')).toBe(9108);
    expect(allocator.deterministicPort('deadbeef')).toBe(9109);
  });

  it('scans forward and wraps around the pool', async () => {
    const probed: number[] = [];
    const busy = new Set([9109, 9110, 9111, 9112, 9113, 9114]);
    const allocator = new PortAllocator(POOL, async (port) => {
      probed.push(port);
      return !busy.has(port);
    });

    expect(await allocator.findAvailablePort('deadbeef')).toBe(9100);
    expect(probed).toEqual([9109, 9110, 9111, 9112, 9113, 9114, 9100]);
  });

  it('fails when the whole pool is taken', async () => {
    const allocator = new PortAllocator(POOL, async () => false);
    await expect(allocator.findAvailablePort('abc12345')).rejects.toThrow('No available ports in the allocated range');
  });

  it('knows which ports belong to the pool', () => {
    const allocator = new PortAllocator(POOL);
    expect(allocator.isInPool(9100)).toBe(true);
    expect(allocator.isInPool(9114)).toBe(true);
    expect(allocator.isInPool(9115)).toBe(false);
  });
});

describe('isPortAvailable', () => {
  it('reports a port held by another listener as busy', async () => {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }

    expect(await isPortAvailable(address.port)).toBe(false);

    await new Promise<void>((resolve) => server.close(() => resolve()));
    expect(await isPortAvailable(address.port)).toBe(true);
  });
});
