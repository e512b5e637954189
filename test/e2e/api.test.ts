import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import path from 'path';
import type { Server } from 'http';
import { z } from 'zod';
import type { AppConfig } from '../../src/server/config';
import { createApp } from '../../src/server/app';
import { startServer, stopServer } from '../../src/server/index';
import { baseUrlOf, cleanupTempDir, closeServer, listen, makeTempDir, testConfig } from '../helpers/testEnv';

describe('HTTP API', () => {
  let tmpDir: string;
  let config: AppConfig;
  let server: Server;
  let base: string;

  const call = (method: string, url: string, body?: unknown, headers: Record<string, string> = {}) =>
    fetch(base + url, {
      method,
      headers: body === undefined ? headers : { 'Content-Type': 'application/json', ...headers },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

  beforeEach(async () => {
    tmpDir = makeTempDir();
    config = testConfig(tmpDir);
    server = await startServer(config);
    base = baseUrlOf(server);
  });

  afterEach(async () => {
    await stopServer(server);
    cleanupTempDir(tmpDir);
  });

  describe('tasks', () => {
    it('creates a task with defaults', async () => {
      const res = await call('POST', '/tasks/', { title: 'Write report' });
      expect(res.status).toBe(201);
      expect(await res.json()).toMatchObject({
        id: 1,
        title: 'Write report',
        description: null,
        status: 'pending',
        priority: 'medium',
        start_date: null,
        end_date: null,
        created_at: expect.any(String),
      });
    });

    it('stamps start_date when moved to in_progress', async () => {
      await call('POST', '/tasks/', { title: 'Write report' });
      const before = Date.now();
      const res = await call('PATCH', '/tasks/1', { status: 'in_progress' });
      expect(res.status).toBe(200);
      const task = z.object({ start_date: z.string(), end_date: z.null() }).parse(await res.json());
      expect(Date.parse(task.start_date)).toBeGreaterThanOrEqual(before);
    });

    it('returns the task unchanged for an empty PATCH', async () => {
      const created = await (await call('POST', '/tasks/', { title: 'Stable' })).json();
      const res = await call('PATCH', '/tasks/1', {});
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual(created);
    });

    it('deletes with 204 and then reports 404', async () => {
      await call('POST', '/tasks/', { title: 'Gone' });
      const first = await call('DELETE', '/tasks/1');
      expect(first.status).toBe(204);
      expect(await first.text()).toBe('');

      const second = await call('DELETE', '/tasks/1', undefined, { 'X-Request-ID': 'req-123' });
      expect(second.status).toBe(404);
      expect(await second.json()).toEqual({ detail: 'Task not found', request_id: 'req-123' });
    });

    it('rejects an oversized page with a 422 error list', async () => {
      const res = await call('GET', '/tasks/?size=101');
      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({
        success: false,
        message: 'Validation error',
        errors: [{ field: 'size', message: 'Number must be less than or equal to 100', type: 'too_big' }],
        path: '/tasks/',
      });
    });

    it('answers 422 for an unrepresentable due_date', async () => {
      const res = await call('POST', '/tasks/', { title: 'x', due_date: '2024-01-01T00:00:00+99:99' });
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({
        errors: [{ field: 'due_date', message: 'Invalid datetime', type: 'invalid_date' }],
      });
    });

    it('handles huge page numbers without a server error', async () => {
      await call('POST', '/tasks/', { title: 'Only' });
      const tooBig = await call('GET', '/tasks/?page=10000000000000000000');
      expect(tooBig.status).toBe(422);

      const last = await call('GET', `/tasks/?page=${Number.MAX_SAFE_INTEGER}`);
      expect(last.status).toBe(200);
      expect(await last.json()).toMatchObject({ items: [], total: 1, pages: 1, has_next: false, has_prev: true });
    });

    it('rejects a non-numeric id', async () => {
      const res = await call('GET', '/tasks/abc');
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({
        errors: [{ field: 'task_id', message: 'Expected number, received nan', type: 'invalid_type' }],
        path: '/tasks/abc',
      });
    });

    it('rejects malformed JSON as json_invalid', async () => {
      const res = await fetch(base + '/tasks/', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"title": ',
      });
      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({
        success: false,
        message: 'Validation error',
        errors: [{ field: 'body', message: 'JSON decode error', type: 'json_invalid' }],
        path: '/tasks/',
      });
    });
  });

  describe('characters and jutsu', () => {
    it('paginates twelve characters into three pages of five', async () => {
      for (let i = 1; i <= 12; i++) {
        const res = await call('POST', '/characters/', { name: `Character ${i}`, village: 'Konoha' });
        expect(res.status).toBe(201);
      }
      const res = await call('GET', '/characters/?page=2&size=5');
      expect(res.status).toBe(200);
      const page = await res.json();
      expect(page).toMatchObject({ total: 12, page: 2, size: 5, pages: 3, has_next: true, has_prev: true });
      const { items } = z.object({ items: z.array(z.object({ name: z.string() })) }).parse(page);
      expect(items.map((c) => c.name)).toEqual(['Character 6', 'Character 7', 'Character 8', 'Character 9', 'Character 10']);
    });

    it('returns 404 with the request id for an unknown character', async () => {
      const res = await call('GET', '/characters/999', undefined, { 'X-Request-ID': 'req-123' });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ detail: 'Character not found', request_id: 'req-123' });
    });

    it('refuses a jutsu for a missing character', async () => {
      const res = await call('POST', '/jutsus/', { name: 'Chidori', type: 'Ninjutsu', character_id: 999 });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ detail: 'Character not found', request_id: null });
    });

    it('adds a jutsu under a character and orphans it when the character is deleted', async () => {
      await call('POST', '/characters/', { name: 'Naruto', village: 'Konoha' });
      const added = await call('POST', '/characters/1/jutsus', { name: 'Rasengan', type: 'Ninjutsu', chakra_cost: 20 });
      expect(added.status).toBe(201);
      expect(await added.json()).toMatchObject({ id: 1, name: 'Rasengan', chakra_cost: 20, character_id: 1 });

      const owned = await call('GET', '/jutsus/?character_id=1');
      expect(await owned.json()).toMatchObject({ total: 1, items: [{ id: 1, character_id: 1 }] });

      expect((await call('DELETE', '/characters/1')).status).toBe(204);
      const jutsu = await call('GET', '/jutsus/1');
      expect(await jutsu.json()).toMatchObject({ id: 1, name: 'Rasengan', character_id: null });
    });

    it('validates character bodies', async () => {
      const res = await call('POST', '/characters/', { name: 'Nameless' });
      expect(res.status).toBe(422);
      expect(await res.json()).toMatchObject({
        errors: [{ field: 'village', message: 'Required', type: 'invalid_type' }],
      });
    });
  });

  describe('service endpoints', () => {
    it('describes the application at the root', async () => {
      const res = await call('GET', '/');
      expect(await res.json()).toEqual({ app_name: 'Test API', version: '1.0.0' });
    });

    it('reports liveness with system metrics', async () => {
      const percent = z.number().min(0).max(100);
      const health = z
        .object({ status: z.literal('running'), system: z.object({ cpu_usage: percent, memory_usage: percent }) })
        .safeParse(await (await call('GET', '/health')).json());
      expect(health.success).toBe(true);
    });

    it('reports a healthy database', async () => {
      const res = await call('GET', '/health/db');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'healthy', database: 'connected' });
    });

    it('answers unknown routes with a 404 body', async () => {
      const res = await call('GET', '/nowhere');
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ detail: 'Not Found', request_id: null });
    });

    it('echoes the request origin for CORS and answers preflight', async () => {
      const res = await call('GET', '/', undefined, { Origin: 'http://client.test' });
      expect(res.headers.get('access-control-allow-origin')).toBe('http://client.test');
      expect(res.headers.get('access-control-allow-credentials')).toBe('true');

      const preflight = await call('OPTIONS', '/tasks/', undefined, {
        Origin: 'http://client.test',
        'Access-Control-Request-Method': 'PATCH',
      });
      expect(preflight.status).toBe(204);
      expect(preflight.headers.get('access-control-allow-methods')).toBe('GET,POST,PUT,PATCH,DELETE,OPTIONS');
      expect(preflight.headers.get('access-control-max-age')).toBe('600');
    });
  });
});

describe('HTTP API with an origin list', () => {
  let tmpDir: string;
  let server: Server;
  let base: string;

  beforeEach(async () => {
    tmpDir = makeTempDir();
    server = await startServer(testConfig(tmpDir, { corsOrigins: ['http://allowed.test'] }));
    base = baseUrlOf(server);
  });

  afterEach(async () => {
    await stopServer(server);
    cleanupTempDir(tmpDir);
  });

  it('allows listed origins only', async () => {
    const allowed = await fetch(base + '/', { headers: { Origin: 'http://allowed.test' } });
    expect(allowed.headers.get('access-control-allow-origin')).toBe('http://allowed.test');

    const other = await fetch(base + '/', { headers: { Origin: 'http://other.test' } });
    expect(other.status).toBe(200);
    expect(other.headers.get('access-control-allow-origin')).toBeNull();
  });
});

describe('HTTP API under a prefix', () => {
  let tmpDir: string;
  let server: Server;
  let base: string;

  beforeEach(async () => {
    tmpDir = makeTempDir();
    server = await startServer(testConfig(tmpDir, { apiPrefix: '/api/v1' }));
    base = baseUrlOf(server);
  });

  afterEach(async () => {
    await stopServer(server);
    cleanupTempDir(tmpDir);
  });

  it('serves resources only below the prefix', async () => {
    expect((await fetch(base + '/api/v1/tasks/')).status).toBe(200);
    expect((await fetch(base + '/tasks/')).status).toBe(404);
    expect((await fetch(base + '/health')).status).toBe(200);
  });
});

describe('HTTP API with an unreachable database', () => {
  let tmpDir: string;
  let server: Server;

  beforeEach(async () => {
    tmpDir = makeTempDir();
    const blocker = path.join(tmpDir, 'blocker');
    fs.writeFileSync(blocker, 'x');
    server = await listen(createApp(testConfig(tmpDir, { databaseUrl: path.join(blocker, 'app.db') })));
  });

  afterEach(async () => {
    await closeServer(server);
    cleanupTempDir(tmpDir);
  });

  it('reports the database as disconnected without error details', async () => {
    const res = await fetch(baseUrlOf(server) + '/health/db');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'unhealthy', database: 'disconnected' });
  });

  it('maps session failures on resource routes to a generic 500', async () => {
    const res = await fetch(baseUrlOf(server) + '/tasks/', { headers: { 'X-Request-ID': 'req-500' } });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ detail: 'An unexpected error occurred.', request_id: 'req-500' });
  });
});
