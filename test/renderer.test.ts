import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { BrowserRenderer, resolveBrowserExecutable } from '../src/render/browserRenderer';
import { sleep } from '../src/utils/withTimeout';
import { makeTempDir } from './helpers';

function writeFakeBrowser(dir: string, script: string): string {
  const executable = path.join(dir, 'fake-chrome');
  fs.writeFileSync(executable, `#!/bin/sh\n${script}\n`, { mode: 0o755 });
  return executable;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

async function waitForExit(pid: number, limitMs: number): Promise<boolean> {
  const deadline = Date.now() + limitMs;
  while (Date.now() < deadline) {
    if (!isAlive(pid)) return true;
    await sleep(50);
  }
  return !isAlive(pid);
}

const posixOnly = { skip: process.platform === 'win32' };

describe('resolveBrowserExecutable', () => {
  let saved: string | undefined;

  beforeEach(() => {
    saved = process.env.PUPPETEER_EXECUTABLE_PATH;
    delete process.env.PUPPETEER_EXECUTABLE_PATH;
  });

  afterEach(() => {
    if (saved !== undefined) process.env.PUPPETEER_EXECUTABLE_PATH = saved;
  });

  it('uses the configured path when it exists', () => {
    const fake = path.join(makeTempDir('browser'), 'chrome');
    fs.writeFileSync(fake, '');
    assert.strictEqual(resolveBrowserExecutable(fake, []), fake);
  });

  it('does not fall back when the configured path is missing', () => {
    const fake = path.join(makeTempDir('browser'), 'chrome');
    fs.writeFileSync(fake, '');
    assert.strictEqual(resolveBrowserExecutable('/nonexistent/chrome', [fake]), null);
  });

  it('picks the first existing candidate', () => {
    const fake = path.join(makeTempDir('browser'), 'chromium');
    fs.writeFileSync(fake, '');
    assert.strictEqual(resolveBrowserExecutable('', ['/nonexistent/chrome', fake]), fake);
  });
});

describe('BrowserRenderer', () => {
  it('is unavailable when rendering is disabled', async () => {
    const renderer = new BrowserRenderer({ enabled: false });

    assert.strictEqual(await renderer.isAvailable(), false);
    await assert.rejects(renderer.capture('<html></html>'), { message: 'Rendering is not available' });
  });

  it('removes its work directory when the browser fails to start', posixOnly, async () => {
    const workRoot = makeTempDir('render-root');
    const renderer = new BrowserRenderer({
      enabled: true,
      executablePath: writeFakeBrowser(makeTempDir('browser'), 'exit 1'),
      timeoutMs: 5000,
      workRoot,
    });

    await assert.rejects(renderer.capture('<html><body>x</body></html>'));
    assert.deepStrictEqual(fs.readdirSync(workRoot), []);
  });

  it('leaves no browser process behind when the render times out', posixOnly, async () => {
    const binDir = makeTempDir('browser');
    const pidFile = path.join(binDir, 'pid');
    const workRoot = makeTempDir('render-root');
    const renderer = new BrowserRenderer({
      enabled: true,
      // never prints the DevTools endpoint, so the launch hangs
      executablePath: writeFakeBrowser(binDir, `echo $$ > "${pidFile}"\nexec sleep 30`),
      timeoutMs: 500,
      workRoot,
    });

    await assert.rejects(renderer.capture('<html><body>x</body></html>'));

    const pid = Number(fs.readFileSync(pidFile, 'utf8').trim());
    assert.ok(pid > 0);
    assert.strictEqual(await waitForExit(pid, 3000), true);
    assert.deepStrictEqual(fs.readdirSync(workRoot), []);
  });
});
