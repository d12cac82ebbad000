import * as fs from 'fs';
import * as http from 'http';
import * as path from 'path';
import { describeError } from '../errors';
import { createLogger } from '../logger';
import { listenOnFreePort } from './portFinder';
import { escapeHtml } from '../jobs/artifactWriter';
import { listPrototypes } from './prototypeFiles';

const log = createLogger('preview');

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.mjs': 'text/javascript; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.ico': 'image/x-icon',
  '.txt': 'text/plain; charset=utf-8',
};

export const CORS_HEADERS: Record<string, string> = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, HEAD, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
};

export type ServedPath =
  | { kind: 'ok'; path: string }
  | { kind: 'forbidden' }
  | { kind: 'bad-request' };

/**
 * Maps a request URL onto a file inside `root`. Anything that decodes to a
 * location outside `root` is forbidden.
 */
export function resolveServedPath(root: string, requestUrl: string): ServedPath {
  let pathname: string;
  try {
    pathname = decodeURIComponent(new URL(requestUrl, 'http://preview.local').pathname);
  } catch (error) {
    log.debug(`Undecodable request path ${requestUrl}: ${describeError(error)}`);
    return { kind: 'bad-request' };
  }
  if (pathname.includes('\0')) return { kind: 'bad-request' };

  const rootPath = path.resolve(root);
  const resolved = path.resolve(rootPath, `.${pathname}`);
  const relative = path.relative(rootPath, resolved);

  if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    return { kind: 'forbidden' };
  }
  return { kind: 'ok', path: resolved };
}

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

async function statOrNull(filePath: string): Promise<fs.Stats | null> {
  try {
    return await fs.promises.stat(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
      return null;
    }
    throw error;
  }
}

function sendText(res: http.ServerResponse, status: number, body: string): void {
  res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8', 'Content-Length': Buffer.byteLength(body) });
  res.end(body);
}

export interface PreviewServerOptions {
  host: string;
  preferredPort: number;
  portScan: number;
}

export interface PreviewStatus {
  running: boolean;
  directory: string;
  port?: number;
  url?: string;
}

/**
 * Static file server over one output directory, with permissive CORS so
 * previews can be embedded anywhere.
 */
export class PreviewServer {
  readonly directory: string;
  private readonly options: PreviewServerOptions;
  private server: http.Server | null = null;
  private port: number | null = null;

  constructor(directory: string, options: PreviewServerOptions) {
    this.directory = path.resolve(directory);
    this.options = options;
  }

  get url(): string | null {
    return this.port === null ? null : this.formatUrl(this.port);
  }

  private formatUrl(port: number): string {
    const host = this.options.host === '0.0.0.0' || this.options.host === '::' ? 'localhost' : this.options.host;
    return `http://${host}:${port}`;
  }

  async start(): Promise<string> {
    const current = this.url;
    if (this.server && current) return current;

    await fs.promises.mkdir(this.directory, { recursive: true });

    const { server, port } = await listenOnFreePort(
      () => http.createServer((req, res) => this.onRequest(req, res)),
      this.options.host,
      this.options.preferredPort,
      this.options.portScan
    );
    this.server = server;
    this.port = port;

    const url = this.formatUrl(port);
    log.info(`🌐 Serving ${this.directory} at ${url}`);
    return url;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    this.server = null;
    this.port = null;

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
    log.info(`Stopped preview server for ${this.directory}`);
  }

  status(): PreviewStatus {
    const url = this.url;
    if (!this.server || this.port === null || !url) {
      return { running: false, directory: this.directory };
    }
    return { running: true, directory: this.directory, port: this.port, url };
  }

  private onRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    this.handle(req, res).catch((error) => {
      log.error(`Request ${req.method} ${req.url} failed: ${describeError(error)}`);
      if (!res.headersSent) {
        sendText(res, 500, 'Internal Server Error');
      } else {
        res.destroy();
      }
    });
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      sendText(res, 405, 'Method Not Allowed');
      return;
    }

    const target = resolveServedPath(this.directory, req.url ?? '/');
    if (target.kind === 'bad-request') {
      sendText(res, 400, 'Bad Request');
      return;
    }
    if (target.kind === 'forbidden') {
      log.warn(`Rejected path outside preview root: ${req.url}`);
      sendText(res, 403, 'Forbidden');
      return;
    }

    const stat = await statOrNull(target.path);
    if (!stat) {
      sendText(res, 404, 'Not Found');
      return;
    }

    if (stat.isDirectory()) {
      const indexPath = path.join(target.path, 'index.html');
      const indexStat = await statOrNull(indexPath);
      if (indexStat && indexStat.isFile()) {
        this.sendFile(req, res, indexPath, indexStat.size);
      } else {
        await this.sendListing(req, res, target.path);
      }
      return;
    }

    this.sendFile(req, res, target.path, stat.size);
  }

  private sendFile(req: http.IncomingMessage, res: http.ServerResponse, filePath: string, size: number): void {
    res.writeHead(200, {
      'Content-Type': contentTypeFor(filePath),
      'Content-Length': size,
      'Cache-Control': 'no-cache',
    });
    if (req.method === 'HEAD') {
      res.end();
      return;
    }

    const stream = fs.createReadStream(filePath);
    stream.on('error', (error) => {
      log.error(`Failed reading ${filePath}: ${describeError(error)}`);
      res.destroy(error);
    });
    stream.pipe(res);
  }

  private async sendListing(req: http.IncomingMessage, res: http.ServerResponse, directory: string): Promise<void> {
    const files = await listPrototypes(directory);
    const prefix = path.relative(this.directory, directory).split(path.sep).filter(Boolean);
    const items = files
      .map((file) => {
        const href = '/' + [...prefix, file.filename].map(encodeURIComponent).join('/');
        return `<li><a href="${escapeHtml(href)}">${escapeHtml(file.filename)}</a> (${file.sizeBytes} bytes)</li>`;
      })
      .join('\n');
    const body = `<!DOCTYPE html>\n<html lang="en">\n<head><meta charset="UTF-8"><title>Prototypes</title></head>\n<body>\n<h1>Prototypes</h1>\n<ul>\n${items}\n</ul>\n</body>\n</html>\n`;

    res.writeHead(200, {
      'Content-Type': 'text/html; charset=utf-8',
      'Content-Length': Buffer.byteLength(body),
      'Cache-Control': 'no-cache',
    });
    if (req.method === 'HEAD') {
      res.end();
    } else {
      res.end(body);
    }
  }
}
