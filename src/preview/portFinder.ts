import * as net from 'net';
import { ResourceError, describeError } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('ports');

const MAX_PORT = 65535;

/**
 * Preferred port, the next `scanCount - 1` ports, then an ephemeral one.
 * A preferred port of 0 goes straight to ephemeral.
 */
export function candidatePorts(preferredPort: number, scanCount: number): number[] {
  if (preferredPort === 0) return [0];
  const ports: number[] = [];
  for (let offset = 0; offset < Math.max(scanCount, 1); offset++) {
    const port = preferredPort + offset;
    if (port > MAX_PORT) break;
    ports.push(port);
  }
  ports.push(0);
  return ports;
}

function isPortUnavailable(error: unknown): boolean {
  return (
    error instanceof Error && 'code' in error && (error.code === 'EADDRINUSE' || error.code === 'EACCES')
  );
}

function listen(server: net.Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error) => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

export interface BoundServer<S extends net.Server> {
  server: S;
  port: number;
}

/**
 * Binds a fresh server per candidate port instead of probing first, so no
 * other process can take the port between the check and the bind.
 */
export async function listenOnFreePort<S extends net.Server>(
  createServer: () => S,
  host: string,
  preferredPort: number,
  scanCount: number
): Promise<BoundServer<S>> {
  for (const port of candidatePorts(preferredPort, scanCount)) {
    const server = createServer();
    try {
      await listen(server, port, host);
    } catch (error) {
      if (isPortUnavailable(error) && port !== 0) {
        log.debug(`Port ${port} unavailable, trying the next one`);
        continue;
      }
      throw new ResourceError(`Cannot bind preview server on ${host}:${port}: ${describeError(error)}`, error);
    }

    const address = server.address();
    if (address && typeof address === 'object') {
      if (port !== preferredPort) {
        log.info(`Port ${preferredPort} busy, using ${address.port}`);
      }
      return { server, port: address.port };
    }
    server.close();
    throw new ResourceError(`Preview server on ${host}:${port} reported no address`);
  }

  throw new ResourceError(`No free port available on ${host}`);
}
