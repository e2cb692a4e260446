import net from 'node:net';
import { createHash } from 'node:crypto';
import { PortsConfig } from '../config/schema.js';

export type PortProbe = (port: number, host: string) => Promise<boolean>;

/**
 * True when a TCP listener can bind the port right now. Nothing is held
 * afterwards, so the port can be taken between the probe and its use.
 */
export function isPortAvailable(port: number, host = '127.0.0.1'): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.once('error', () => resolve(false));
    server.once('listening', () => {
      server.close(() => resolve(true));
    });
    server.listen({ port, host, exclusive: true });
  });
}

function hashIndex(runId: string, poolSize: number): number {
  const digest = createHash('sha256').update(runId).digest();
  return digest.readUInt32BE(0) % poolSize;
}

/**
 * Pool index for a run: the alphanumeric characters among the first eight of
 * the run ID, read as base 36. IDs with no usable prefix fall back to a hash.
 */
export function portIndex(runId: string, poolSize: number): number {
  const idChars = Array.from(runId)
    .slice(0, 8)
    .filter((c) => /^[0-9a-z]$/i.test(c))
    .join('');
  if (idChars.length === 0) {
    return hashIndex(runId, poolSize);
  }
  const value = Number.parseInt(idChars, 36);
  if (!Number.isSafeInteger(value)) {
    return hashIndex(runId, poolSize);
  }
  return value % poolSize;
}

export class PortAllocator {
  private readonly basePort: number;
  private readonly poolSize: number;
  private readonly host: string;
  private readonly probe: PortProbe;

  constructor(config: PortsConfig, probe: PortProbe = isPortAvailable) {
    this.basePort = config.base;
    this.poolSize = config.pool_size;
    this.host = config.host;
    this.probe = probe;
  }

  /** Same run ID, same port, in every process. */
  deterministicPort(runId: string): number {
    return this.basePort + portIndex(runId, this.poolSize);
  }

  /**
   * Scan the pool from the run's own slot, wrapping, and return the first
   * port that binds.
   */
  async findAvailablePort(runId: string, maxAttempts = this.poolSize): Promise<number> {
    const baseIndex = portIndex(runId, this.poolSize);
    for (let offset = 0; offset < maxAttempts; offset++) {
      const port = this.basePort + ((baseIndex + offset) % this.poolSize);
      if (await this.probe(port, this.host)) {
        return port;
      }
    }
    throw new Error('No available ports in the allocated range');
  }

  isInPool(port: number): boolean {
    return port >= this.basePort && port < this.basePort + this.poolSize;
  }
}
