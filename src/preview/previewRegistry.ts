/**
 * Preview Server Registry
 *
 * One preview server per output directory. Every operation runs through a
 * sequential queue, so concurrent starts for a directory end up sharing
 * a single listener.
 */

import * as path from 'path';
import { config } from '../config';
import { createLogger } from '../logger';
import { PreviewServer, PreviewServerOptions, PreviewStatus } from './previewServer';

const log = createLogger('preview-registry');

interface RegistryTask {
  label: string;
  execute: () => Promise<void>;
}

export interface RunningPreview {
  directory: string;
  port: number;
  url: string;
}

function defaultServerOptions(): PreviewServerOptions {
  return {
    host: config.preview.host,
    preferredPort: config.preview.port,
    portScan: config.preview.portScan,
  };
}

export class PreviewServerRegistry {
  private readonly servers = new Map<string, PreviewServer>();
  private readonly defaults: PreviewServerOptions;
  private queue: RegistryTask[] = [];
  private processing = false;

  constructor(defaults: Partial<PreviewServerOptions> = {}) {
    this.defaults = { ...defaultServerOptions(), ...defaults };
  }

  /**
   * Idempotent: a directory that already has a running server gets its
   * existing URL back.
   */
  start(directory: string, preferredPort?: number): Promise<RunningPreview> {
    const key = path.resolve(directory);
    return this.enqueue(`start ${key}`, async () => {
      let server = this.servers.get(key);
      if (!server) {
        server = new PreviewServer(key, {
          ...this.defaults,
          ...(preferredPort !== undefined && { preferredPort }),
        });
        this.servers.set(key, server);
      }

      try {
        await server.start();
      } catch (error) {
        this.servers.delete(key);
        throw error;
      }

      const status = server.status();
      if (!status.running || status.port === undefined || !status.url) {
        throw new Error(`Preview server for ${key} did not report a running state`);
      }
      return { directory: key, port: status.port, url: status.url };
    });
  }

  /** Returns false when nothing was running for `directory`. */
  stop(directory: string): Promise<boolean> {
    const key = path.resolve(directory);
    return this.enqueue(`stop ${key}`, async () => {
      const server = this.servers.get(key);
      if (!server) return false;
      this.servers.delete(key);
      await server.stop();
      return true;
    });
  }

  stopAll(): Promise<void> {
    return this.enqueue('stop all', async () => {
      const servers = Array.from(this.servers.values());
      this.servers.clear();
      await Promise.all(servers.map((server) => server.stop()));
    });
  }

  status(directory: string): PreviewStatus {
    const key = path.resolve(directory);
    const server = this.servers.get(key);
    return server ? server.status() : { running: false, directory: key };
  }

  list(): PreviewStatus[] {
    return Array.from(this.servers.values()).map((server) => server.status());
  }

  private enqueue<T>(label: string, work: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        label,
        execute: () => work().then(resolve, reject),
      });
      this.kick();
    });
  }

  private kick(): void {
    if (this.processing) return;
    this.processing = true;
    void this.processLoop();
  }

  private async processLoop(): Promise<void> {
    try {
      let task = this.queue.shift();
      while (task) {
        log.debug(`Running ${task.label}`);
        await task.execute();
        task = this.queue.shift();
      }
    } finally {
      this.processing = false;
      if (this.queue.length > 0) {
        this.kick();
      }
    }
  }
}

// Process-wide instance
export const previewServers = new PreviewServerRegistry();
