/**
 * Preview Server Tests
 */

import * as fs from 'fs';
import type { Server } from 'http';
import * as path from 'path';
import express, { type Express } from 'express';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ArchiveError, silentLogger } from '@mailshelf/archive-core';
import { createApp } from '../src/app';
import { createErrorHandler } from '../src/middleware/error-handler';
import { startServer } from '../src/serve';
import { makeTempDir } from './helpers';

function listen(app: Express): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => resolve(server));
  });
}

function baseUrl(server: Server): string {
  const address = server.address();
  if (typeof address !== 'object' || address === null) throw new Error('Server has no TCP address');
  return `http://127.0.0.1:${address.port}`;
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe('createApp', () => {
  let archiveDir: string;
  let server: Server;
  let url: string;

  beforeAll(async () => {
    archiveDir = makeTempDir();
    fs.mkdirSync(path.join(archiveDir, 'emails'));
    fs.writeFileSync(path.join(archiveDir, 'index.html'), '<h1>index</h1>');
    fs.writeFileSync(path.join(archiveDir, 'emails', '1.html'), '<h1>first</h1>');
    server = await listen(createApp(archiveDir));
    url = baseUrl(server);
  });

  afterAll(async () => {
    await close(server);
    fs.rmSync(archiveDir, { recursive: true, force: true });
  });

  it('should serve the index at the root', async () => {
    const res = await fetch(`${url}/`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('<h1>index</h1>');
  });

  it('should serve email pages', async () => {
    const res = await fetch(`${url}/emails/1.html`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('<h1>first</h1>');
  });

  it('should answer unknown paths with a JSON 404', async () => {
    const res = await fetch(`${url}/emails/99.html`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found: /emails/99.html' });
  });

  it('should not accept writes', async () => {
    const res = await fetch(`${url}/index.html`, { method: 'POST', body: 'x' });
    expect(res.status).toBe(404);
  });
});

describe('createErrorHandler', () => {
  let server: Server;
  let url: string;

  beforeAll(async () => {
    const app = express();
    app.get('/boom', () => {
      throw new Error('secret detail');
    });
    app.get('/bad', () => {
      throw Object.assign(new Error('Bad range'), { status: 416 });
    });
    app.use(createErrorHandler(silentLogger));
    server = await listen(app);
    url = baseUrl(server);
  });

  afterAll(async () => {
    await close(server);
  });

  it('should hide internal errors', async () => {
    const res = await fetch(`${url}/boom`);
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: 'Internal server error' });
  });

  it('should pass client errors through', async () => {
    const res = await fetch(`${url}/bad`);
    expect(res.status).toBe(416);
    expect(await res.json()).toEqual({ error: 'Bad range' });
  });
});

describe('startServer', () => {
  it('should refuse a directory without an archive', async () => {
    const dir = makeTempDir();
    await expect(startServer(dir, 0, silentLogger)).rejects.toBeInstanceOf(ArchiveError);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should listen on the requested port', async () => {
    const dir = makeTempDir();
    fs.writeFileSync(path.join(dir, 'index.html'), 'ok');

    const server = await startServer(dir, 0, silentLogger);
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    const res = await fetch(`http://127.0.0.1:${port}/`);

    expect(await res.text()).toBe('ok');
    await close(server);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
