import assert from 'node:assert/strict';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import test from 'node:test';
import {
  detectTemplateCandidates,
  listTemplates,
  resolveTemplate,
  templateRequiresIdentifier,
  toTemplateRef,
} from './template.js';
import type { DataRecord, Dataset } from '../types/index.js';
import { NotFoundError } from '../types/index.js';

async function makeTemplatesDir(names: string[]): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'recordprint-templates-'));
  for (const name of names) {
    await fs.writeFile(path.join(dir, name), '<p>{{identifier}}</p>', 'utf-8');
  }
  return dir;
}

function dataset(name: string, records: DataRecord[]): Dataset {
  return { name, path: `/data/${name}`, format: 'csv', fields: Object.keys(records[0] ?? {}), records };
}

const ALL = ['invoice_simple.html', 'order_detailed.html', 'product_catalog.html'].map(name =>
  toTemplateRef(path.join('/templates', name))
);

test('listTemplates returns sorted HTML templates', async () => {
  const dir = await makeTemplatesDir(['b.htm', 'a.html', 'readme.md']);

  const templates = await listTemplates(dir);
  assert.deepEqual(templates.map(t => t.name), ['a.html', 'b.htm']);
  assert.deepEqual(templates[1], { name: 'b.htm', stem: 'b', path: path.join(dir, 'b.htm') });
});

test('listTemplates fails for a missing directory', async () => {
  await assert.rejects(listTemplates('/nowhere/templates'), NotFoundError);
});

test('resolveTemplate accepts a name, stem, index, substring or path', async () => {
  const dir = await makeTemplatesDir(['invoice_simple.html', 'product_catalog.html']);

  assert.equal((await resolveTemplate('product_catalog.html', dir)).stem, 'product_catalog');
  assert.equal((await resolveTemplate('invoice_simple', dir)).stem, 'invoice_simple');
  assert.equal((await resolveTemplate('2', dir)).stem, 'product_catalog');
  assert.equal((await resolveTemplate('CATALOG', dir)).stem, 'product_catalog');

  const direct = path.join(dir, 'invoice_simple.html');
  assert.deepEqual(await resolveTemplate(direct, '/unused'), toTemplateRef(direct));
});

test('resolveTemplate fails fast with "Template not found"', async () => {
  const dir = await makeTemplatesDir(['invoice_simple.html']);

  await assert.rejects(resolveTemplate('nope', dir), (error) => {
    return error instanceof NotFoundError
      && error.message === 'Template not found: nope'
      && error.reason === 'Available: invoice_simple.html';
  });
});

test('detectTemplateCandidates uses the data file name first', () => {
  const candidates = detectTemplateCandidates(dataset('my_invoices.csv', [{ a: '1' }]), ALL);
  assert.deepEqual(candidates.map(t => t.stem), ['invoice_simple']);

  const orders = detectTemplateCandidates(dataset('orders.json', [{ a: '1' }]), ALL);
  assert.deepEqual(orders.map(t => t.stem), ['order_detailed']);
});

test('detectTemplateCandidates falls back to the record shape', () => {
  const catalog = detectTemplateCandidates(
    dataset('export.csv', [{ product_id: 'P1', name: 'Paper', unit: 'pack' }]),
    ALL
  );
  assert.deepEqual(catalog.map(t => t.stem), ['product_catalog']);

  const order = detectTemplateCandidates(dataset('export.json', [{ id: 1, items: [] }]), ALL);
  assert.deepEqual(order.map(t => t.stem), ['order_detailed']);

  const both = detectTemplateCandidates(
    dataset('export.csv', [{ item_name: 'Paper', qty: '1', price: '2', items: [] }]),
    ALL
  );
  assert.deepEqual(both.map(t => t.stem), ['invoice_simple', 'order_detailed']);
});

test('detectTemplateCandidates returns every template when nothing matches', () => {
  const candidates = detectTemplateCandidates(dataset('misc.csv', [{ a: '1' }]), ALL);
  assert.equal(candidates, ALL);
});

test('templateRequiresIdentifier is false only for catalog templates', () => {
  const invoice = toTemplateRef('/templates/invoice_simple.html');
  const catalog = toTemplateRef('/templates/product_catalog.html');
  assert.equal(templateRequiresIdentifier(invoice, ['product_catalog']), true);
  assert.equal(templateRequiresIdentifier(catalog, ['Product_Catalog']), false);
});
