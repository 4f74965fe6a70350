import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DomainError } from '@tether/core';
import { DEFAULT_DATA_DIR, appConfigResource, createDataFileTemplate, mimeTypeFor } from '../resources.js';
import { makeCtx } from './helpers.js';

describe('mimeTypeFor', () => {
  it('maps known extensions', () => {
    expect(mimeTypeFor('notes.txt')).toBe('text/plain');
    expect(mimeTypeFor('data.JSON')).toBe('application/json');
    expect(mimeTypeFor('archive.tar.gz')).toBe('application/octet-stream');
    expect(mimeTypeFor('README')).toBe('application/octet-stream');
  });
});

describe('config://app', () => {
  it('describes the application', async () => {
    const content = await appConfigResource.handler(makeCtx());
    expect(content.uri).toBe('config://app');
    expect(content.mimeType).toBe('application/json');
    expect(JSON.parse(content.text ?? '')).toEqual({
      appName: 'Tether Demo',
      version: '0.1.0',
      environment: process.env['NODE_ENV'] ?? 'development',
      features: { tools: true, resources: true, prompts: true },
    });
  });
});

describe('file:///data/{filename}', () => {
  let dataDir: string;

  beforeAll(() => {
    dataDir = mkdtempSync(join(tmpdir(), 'tether-demo-'));
    writeFileSync(join(dataDir, 'hello.txt'), 'hello there');
    writeFileSync(join(dataDir, 'list.json'), '[1,2]');
    writeFileSync(join(dataDir, 'raw.dat'), 'raw');
    mkdirSync(join(dataDir, 'nested'));
  });

  afterAll(() => {
    rmSync(dataDir, { recursive: true, force: true });
  });

  it('reads a text file', async () => {
    const template = createDataFileTemplate(dataDir);
    const content = await template.handler('file:///data/hello.txt', { filename: 'hello.txt' }, makeCtx());
    expect(content).toEqual({ uri: 'file:///data/hello.txt', mimeType: 'text/plain', text: 'hello there' });
  });

  it('picks the MIME type from the extension', async () => {
    const template = createDataFileTemplate(dataDir);
    const json = await template.handler('file:///data/list.json', { filename: 'list.json' }, makeCtx());
    const raw = await template.handler('file:///data/raw.dat', { filename: 'raw.dat' }, makeCtx());
    expect(json.mimeType).toBe('application/json');
    expect(raw.mimeType).toBe('application/octet-stream');
  });

  it('refuses paths outside the data directory', async () => {
    const template = createDataFileTemplate(dataDir);
    for (const filename of ['../secret.txt', '..', '/etc/hosts']) {
      await expect(template.handler(`file:///data/${filename}`, { filename }, makeCtx())).rejects.toMatchObject({
        name: 'DomainError',
        code: 'FORBIDDEN',
      });
    }
  });

  it('reports a missing file as not found', async () => {
    const template = createDataFileTemplate(dataDir);
    const reading = template.handler('file:///data/gone.txt', { filename: 'gone.txt' }, makeCtx());
    await expect(reading).rejects.toBeInstanceOf(DomainError);
    await expect(reading).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: 'File not found: gone.txt',
      details: { filename: 'gone.txt' },
    });
  });

  it('reports a directory as not found', async () => {
    const template = createDataFileTemplate(dataDir);
    await expect(
      template.handler('file:///data/nested', { filename: 'nested' }, makeCtx())
    ).rejects.toMatchObject({ code: 'NOT_FOUND' });
  });

  it('serves the bundled data directory by default', async () => {
    const template = createDataFileTemplate();
    const content = await template.handler('file:///data/notes.txt', { filename: 'notes.txt' }, makeCtx());
    expect(DEFAULT_DATA_DIR.endsWith('data/') || DEFAULT_DATA_DIR.endsWith('data\\')).toBe(true);
    expect(content.text).toBe('Tether demo notes\nRead me with resources/read file:///data/notes.txt\n');
  });
});
