import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import puppeteer, { Browser } from 'puppeteer-core';
import { config } from '../config';
import { describeError } from '../errors';
import { createLogger } from '../logger';
import { withTimeout } from '../utils/withTimeout';

const log = createLogger('renderer');

/**
 * Turns a composed HTML document into a PNG screenshot. The validation
 * stage only asks for a capture when `isAvailable()` resolves true.
 */
export interface Renderer {
  isAvailable(): Promise<boolean>;
  capture(documentHtml: string): Promise<Buffer>;
}

export interface BrowserRendererOptions {
  enabled: boolean;
  executablePath: string;
  timeoutMs: number;
  viewport: { width: number; height: number };
  /** Parent of the per-capture temp directories. */
  workRoot: string;
}

const WELL_KNOWN_BROWSER_PATHS = [
  '/usr/bin/chromium',
  '/usr/bin/chromium-browser',
  '/usr/bin/google-chrome',
  '/usr/bin/google-chrome-stable',
  '/snap/bin/chromium',
  '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
  '/Applications/Chromium.app/Contents/MacOS/Chromium',
  'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
  'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
];

/**
 * The configured executable wins; otherwise the first well-known install
 * location that exists. `null` means rendering is not possible here.
 */
export function resolveBrowserExecutable(
  configured: string,
  candidates: readonly string[] = WELL_KNOWN_BROWSER_PATHS
): string | null {
  const explicit = configured.trim() || String(process.env.PUPPETEER_EXECUTABLE_PATH || '').trim();
  if (explicit) {
    return fs.existsSync(explicit) ? explicit : null;
  }
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? null;
}

function defaultOptions(): BrowserRendererOptions {
  return {
    enabled: config.render.enabled,
    executablePath: config.render.executablePath,
    timeoutMs: config.render.timeoutMs,
    viewport: config.render.viewport,
    workRoot: os.tmpdir(),
  };
}

interface CaptureSession {
  launch?: Promise<Browser>;
  abandoned: boolean;
}

/** The launched browser, or undefined when the launch failed (puppeteer already killed it). */
async function settledBrowser(launch: Promise<Browser>): Promise<Browser | undefined> {
  try {
    return await launch;
  } catch (error) {
    log.debug(`Browser launch did not complete: ${describeError(error)}`);
    return undefined;
  }
}

async function closeBrowser(browser: Browser): Promise<void> {
  try {
    await browser.close();
  } catch (error) {
    log.warn(`Browser did not close cleanly, killing it: ${describeError(error)}`);
    browser.process()?.kill('SIGKILL');
  }
}

/**
 * Headless Chrome through puppeteer-core. Chrome runs out of process, so a
 * capture is awaited like any other I/O and bounded by `timeoutMs`.
 */
export class BrowserRenderer implements Renderer {
  private readonly options: BrowserRendererOptions;
  private executable: string | null | undefined;

  constructor(options: Partial<BrowserRendererOptions> = {}) {
    this.options = { ...defaultOptions(), ...options };
  }

  async isAvailable(): Promise<boolean> {
    if (!this.options.enabled) return false;
    if (this.executable === undefined) {
      this.executable = resolveBrowserExecutable(this.options.executablePath);
      if (this.executable) {
        log.info(`🖥️ Rendering with ${this.executable}`);
      } else {
        log.warn('No Chrome/Chromium executable found; validation will use text-only review');
      }
    }
    return this.executable !== null;
  }

  async capture(documentHtml: string): Promise<Buffer> {
    const available = await this.isAvailable();
    const executable = this.executable;
    if (!available || !executable) {
      throw new Error('Rendering is not available');
    }

    const workDir = await fs.promises.mkdtemp(path.join(this.options.workRoot, 'prototype-render-'));
    const session: CaptureSession = { abandoned: false };

    try {
      return await withTimeout(
        this.captureIn(workDir, documentHtml, executable, session),
        this.options.timeoutMs,
        'Render'
      );
    } finally {
      session.abandoned = true;
      // a pending launch is bounded by the same timeout; wait so no browser outlives the capture
      const browser = session.launch ? await settledBrowser(session.launch) : undefined;
      if (browser) {
        await closeBrowser(browser);
      }
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }

  private async captureIn(
    workDir: string,
    documentHtml: string,
    executablePath: string,
    session: CaptureSession
  ): Promise<Buffer> {
    const documentPath = path.join(workDir, 'index.html');
    await fs.promises.writeFile(documentPath, documentHtml, 'utf8');

    if (session.abandoned) {
      throw new Error('Render abandoned before launch');
    }

    session.launch = puppeteer.launch({
      executablePath,
      headless: true,
      timeout: this.options.timeoutMs,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
    const browser = await session.launch;
    if (session.abandoned) {
      throw new Error('Render abandoned');
    }

    const page = await browser.newPage();
    await page.setViewport(this.options.viewport);
    await page.goto(pathToFileURL(documentPath).href, {
      waitUntil: 'networkidle0',
      timeout: this.options.timeoutMs,
    });

    const screenshot = await page.screenshot({ type: 'png', fullPage: true });
    log.debug(`Captured ${screenshot.length} bytes`);
    return Buffer.from(screenshot);
  }
}
