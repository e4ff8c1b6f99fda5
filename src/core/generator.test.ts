import assert from 'node:assert/strict';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import test from 'node:test';
import { defaultConfig } from './config.js';
import { DocumentGenerator } from './generator.js';
import type { FileOpener } from './opener.js';
import type { Renderer, RenderOptions } from './renderer.js';
import type { GeneratorConfig } from '../types/index.js';
import { MissingIdentifierError, RenderError } from '../types/index.js';

const AT = new Date(2024, 2, 2, 14, 5, 9);
const PDF_BYTES = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

class FakeRenderer implements Renderer {
  readonly calls: { markup: string; options?: RenderOptions }[] = [];

  constructor(private readonly failure?: Error) {}

  async render(markup: string, options?: RenderOptions): Promise<Uint8Array> {
    this.calls.push({ markup, options });
    if (this.failure) throw this.failure;
    return PDF_BYTES;
  }
}

class FakeOpener implements FileOpener {
  readonly opened: string[] = [];

  constructor(private readonly failure?: Error) {}

  async open(filePath: string): Promise<void> {
    if (this.failure) throw this.failure;
    this.opened.push(filePath);
  }
}

async function makeWorkspace(): Promise<GeneratorConfig> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'recordprint-generator-'));
  const config = defaultConfig(root);
  await fs.mkdir(config.dataDir, { recursive: true });
  await fs.mkdir(config.templatesDir, { recursive: true });

  await fs.writeFile(
    path.join(config.dataDir, 'invoices.csv'),
    'invoice_id,item_name,qty,price\nINV-1001,Paper,2,4.50\nINV-1001,Stapler,1,12.00\nINV-1002,Toner,3,39.90\n'
  );
  await fs.writeFile(
    path.join(config.dataDir, 'products.csv'),
    'product_id,name,unit\nP-001,Paper,pack\nP-002,Stapler,pcs\n'
  );
  await fs.writeFile(
    path.join(config.templatesDir, 'invoice_simple.html'),
    '<p>{{identifier}}|{{#each records}}{{item_name}},{{/each}}|{{generatedAt}}</p>'
  );
  await fs.writeFile(
    path.join(config.templatesDir, 'product_catalog.html'),
    '<ul>{{#each records}}<li>{{name}}</li>{{/each}}</ul>'
  );
  return config;
}

function makeGenerator(config: GeneratorConfig, renderer: Renderer, opener: FileOpener, warnings: string[] = []) {
  return new DocumentGenerator(config, {
    renderer,
    opener,
    clock: () => AT,
    log: () => {},
    warn: (line) => warnings.push(line),
    platform: 'linux',
    homeDir: config.rootDir,
  });
}

async function listOutput(config: GeneratorConfig): Promise<string[]> {
  return fs.readdir(config.outputDir).catch(() => []);
}

test('generate renders the selected invoice and writes a named PDF', async () => {
  const config = await makeWorkspace();
  const renderer = new FakeRenderer();
  const opener = new FakeOpener();

  const result = await makeGenerator(config, renderer, opener).generate({
    data: 'invoices.csv',
    identifier: 'INV-1001',
  });

  assert.equal(result.fileName, 'invoice_INV-1001_20240302_140509.pdf');
  assert.equal(result.outputPath, path.join(config.outputDir, result.fileName));
  assert.equal(result.template, 'invoice_simple.html');
  assert.equal(result.identifier, 'INV-1001');
  assert.equal(result.recordCount, 2);

  assert.equal(renderer.calls.length, 1);
  assert.equal(renderer.calls[0]?.markup, '<p>INV-1001|Paper,Stapler,|2024-03-02 14:05:09</p>');
  assert.equal(renderer.calls[0]?.options?.stylesheets?.length, 1);

  assert.deepEqual([...await fs.readFile(result.outputPath)], [...PDF_BYTES]);
  assert.deepEqual(opener.opened, [result.outputPath]);
});

test('generate renders catalogs from the whole dataset without an identifier', async () => {
  const config = await makeWorkspace();
  const renderer = new FakeRenderer();

  const result = await makeGenerator(config, renderer, new FakeOpener()).generate({ data: 'products' });

  assert.equal(result.fileName, 'products_product_catalog_20240302_140509.pdf');
  assert.equal(result.identifier, undefined);
  assert.equal(result.recordCount, 2);
  assert.equal(renderer.calls[0]?.markup, '<ul><li>Paper</li><li>Stapler</li></ul>');
});

test('generate renders the whole catalog when an identifier is also given', async () => {
  const config = await makeWorkspace();
  const renderer = new FakeRenderer();

  const result = await makeGenerator(config, renderer, new FakeOpener()).generate({
    data: 'products',
    identifier: 'P-001',
  });

  assert.equal(result.fileName, 'products_product_catalog_20240302_140509.pdf');
  assert.equal(result.identifier, undefined);
  assert.equal(result.recordCount, 2);
  assert.equal(renderer.calls[0]?.markup, '<ul><li>Paper</li><li>Stapler</li></ul>');
});

test('generate uses the default data file when none is given', async () => {
  const config = await makeWorkspace();

  const result = await makeGenerator(config, new FakeRenderer(), new FakeOpener()).generate({ identifier: 'INV-1002' });

  assert.equal(result.dataset, 'invoices.csv');
  assert.equal(result.fileName, 'invoice_INV-1002_20240302_140509.pdf');
});

test('generate aborts without output when the identifier is missing', async () => {
  const config = await makeWorkspace();
  const renderer = new FakeRenderer();

  await assert.rejects(
    makeGenerator(config, renderer, new FakeOpener()).generate({ data: 'invoices.csv' }),
    (error) => {
      return error instanceof MissingIdentifierError
        && error.validIdentifiers.join(',') === 'INV-1001,INV-1002';
    }
  );
  assert.equal(renderer.calls.length, 0);
  assert.deepEqual(await listOutput(config), []);
});

test('generate leaves no file behind when rendering fails', async () => {
  const config = await makeWorkspace();
  const opener = new FakeOpener();

  await assert.rejects(
    makeGenerator(config, new FakeRenderer(new RenderError('boom')), opener).generate({
      data: 'invoices.csv',
      identifier: 'INV-1001',
    }),
    RenderError
  );
  assert.deepEqual(await listOutput(config), []);
  assert.deepEqual(opener.opened, []);
});

test('generate passes identical markup to the renderer for identical input', async () => {
  const config = await makeWorkspace();
  const renderer = new FakeRenderer();
  const warnings: string[] = [];
  const generator = makeGenerator(config, renderer, new FakeOpener(), warnings);

  const first = await generator.generate({ data: 'invoices.csv', identifier: 'INV-1001' });
  const second = await generator.generate({ data: 'invoices.csv', identifier: 'INV-1001' });

  assert.equal(renderer.calls[0]?.markup, renderer.calls[1]?.markup);
  assert.equal(first.fileName, 'invoice_INV-1001_20240302_140509.pdf');
  assert.equal(second.fileName, 'invoice_INV-1001_20240302_140509_2.pdf');
  assert.deepEqual(warnings, [
    'invoice_INV-1001_20240302_140509.pdf already exists, written as invoice_INV-1001_20240302_140509_2.pdf',
  ]);
});

test('generate skips the viewer when open is disabled', async () => {
  const config = await makeWorkspace();
  const opener = new FakeOpener();

  await makeGenerator({ ...config, open: false }, new FakeRenderer(), opener).generate({
    data: 'invoices.csv',
    identifier: 'INV-1001',
  });
  assert.deepEqual(opener.opened, []);
});

test('generate keeps the PDF and warns when the viewer cannot be opened', async () => {
  const config = await makeWorkspace();
  const warnings: string[] = [];

  const result = await makeGenerator(config, new FakeRenderer(), new FakeOpener(new Error('no viewer')), warnings)
    .generate({ data: 'invoices.csv', identifier: 'INV-1001' });

  assert.deepEqual(await listOutput(config), [result.fileName]);
  assert.deepEqual(warnings, ['Could not open the PDF automatically: no viewer']);
});

test('describe lists files, candidates and identifiers', async () => {
  const config = await makeWorkspace();
  const generator = makeGenerator(config, new FakeRenderer(), new FakeOpener());

  const overview = await generator.describe();
  assert.deepEqual(overview.dataFiles.map(f => path.basename(f)), ['invoices.csv', 'products.csv']);
  assert.deepEqual(overview.templates.map(t => t.name), ['invoice_simple.html', 'product_catalog.html']);
  assert.equal(overview.dataset, undefined);

  const detail = await generator.describe('invoices');
  assert.equal(detail.dataset?.recordCount, 3);
  assert.equal(detail.dataset?.identifierField, 'invoice_id');
  assert.deepEqual(detail.dataset?.identifiers, ['INV-1001', 'INV-1002']);
  assert.deepEqual(detail.dataset?.candidates.map(t => t.name), ['invoice_simple.html']);
});
