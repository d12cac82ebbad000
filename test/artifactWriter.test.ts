import { after, describe, it } from 'node:test';
import assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import axios from 'axios';
import {
  composePrototypeDocument,
  parsePrototypeDocument,
  titleFromRequirements,
  writePrototypeFile,
} from '../src/jobs/artifactWriter';
import { PrototypeFinalizer } from '../src/jobs/finalizer';
import { createRunState } from '../src/jobs/runManager';
import { FinalizationError } from '../src/errors';
import { PreviewServerRegistry } from '../src/preview/previewRegistry';
import { listPrototypes } from '../src/preview/prototypeFiles';
import { SAMPLE_ARTIFACT, makeTempDir } from './helpers';

describe('composePrototypeDocument', () => {
  it('round-trips every field byte for byte', () => {
    const artifact = {
      markup: '<main>\n  <h1>Pricing</h1>\n</main>',
      style: 'main { display: grid; }\n',
      behavior: '',
    };
    assert.deepStrictEqual(parsePrototypeDocument(composePrototypeDocument(artifact, 'Pricing')), artifact);
  });

  it('inlines style and behavior into one document', () => {
    const document = composePrototypeDocument(SAMPLE_ARTIFACT, 'Hero');
    assert.ok(document.startsWith('<!DOCTYPE html>\n'));
    assert.ok(document.includes('<style data-artifact="style">\n.hero { color: #222; }\n</style>'));
    assert.ok(document.includes(`<script data-artifact="behavior">\n${SAMPLE_ARTIFACT.behavior}\n</script>`));
  });

  it('escapes the title', () => {
    const document = composePrototypeDocument(SAMPLE_ARTIFACT, 'A <b> & "c"');
    assert.ok(document.includes('<title>A &lt;b&gt; &amp; &quot;c&quot;</title>'));
  });

  it('does not parse foreign documents', () => {
    assert.strictEqual(parsePrototypeDocument('<html><body></body></html>'), null);
  });
});

describe('titleFromRequirements', () => {
  it('uses the first non-empty line', () => {
    assert.strictEqual(titleFromRequirements('\n  Build a pricing page\nwith three tiers'), 'Build a pricing page');
  });

  it('cuts long lines to 60 characters', () => {
    assert.strictEqual(titleFromRequirements('a'.repeat(80)), `${'a'.repeat(57)}...`);
  });

  it('never splits a character made of a surrogate pair', () => {
    const title = titleFromRequirements(`${'a'.repeat(56)}🎉🎉 and more text to cut`);
    assert.strictEqual(title, `${'a'.repeat(56)}🎉...`);
  });

  it('falls back for empty text', () => {
    assert.strictEqual(titleFromRequirements('   '), 'Prototype');
  });
});

describe('writePrototypeFile', () => {
  it('never overwrites an existing file', async () => {
    const dir = makeTempDir('prototype-writer');

    const first = await writePrototypeFile(dir, SAMPLE_ARTIFACT, 'First', 'prototype-fixed.html');
    const second = await writePrototypeFile(dir, { ...SAMPLE_ARTIFACT, markup: '<div>second</div>' }, 'Second', 'prototype-fixed.html');

    assert.strictEqual(first.filename, 'prototype-fixed.html');
    assert.strictEqual(second.filename, 'prototype-fixed-1.html');
    assert.strictEqual(fs.readFileSync(first.outputFile, 'utf8'), composePrototypeDocument(SAMPLE_ARTIFACT, 'First'));
    assert.strictEqual(path.dirname(second.outputFile), dir);
  });

  it('refuses empty markup', async () => {
    const dir = makeTempDir('prototype-writer');
    await assert.rejects(
      writePrototypeFile(dir, { markup: ' ', style: 'a{}', behavior: '' }, 'Empty'),
      FinalizationError
    );
    assert.deepStrictEqual(await listPrototypes(dir), []);
  });
});

describe('PrototypeFinalizer', () => {
  const registry = new PreviewServerRegistry({ host: '127.0.0.1', preferredPort: 0, portScan: 1 });

  after(async () => {
    await registry.stopAll();
  });

  it('publishes the artifact and serves it from the preview server', async () => {
    const dir = makeTempDir('prototype-finalizer');
    const finalizer = new PrototypeFinalizer({ outputDir: dir, preferredPort: 0, registry });
    const state = createRunState('A hero banner', 3, null);
    state.artifact = { ...SAMPLE_ARTIFACT };
    state.iterationCount = 1;

    const result = await finalizer.finalize(state);

    assert.match(result.previewUrl, /^http:\/\/127\.0\.0\.1:\d+\/prototype-[a-z0-9]+-[a-z0-9]+\.html$/);
    const response = await axios.get<string>(result.previewUrl, { responseType: 'text' });
    assert.strictEqual(response.status, 200);
    assert.strictEqual(response.data, composePrototypeDocument(SAMPLE_ARTIFACT, 'A hero banner'));
  });

  it('fails descriptively when there is no markup', async () => {
    const dir = makeTempDir('prototype-finalizer');
    const finalizer = new PrototypeFinalizer({ outputDir: dir, preferredPort: 0, registry });
    const state = createRunState('A hero banner', 3, null);
    state.iterationCount = 3;

    await assert.rejects(finalizer.finalize(state), {
      name: 'FinalizationError',
      message: 'No markup was produced after 3 iteration(s); there is nothing to publish',
    });
    assert.deepStrictEqual(await listPrototypes(dir), []);
  });
});
