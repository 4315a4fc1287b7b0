import assert from 'node:assert/strict';
import type { Server } from 'node:http';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { after, before, describe, it } from 'node:test';
import jwt from 'jsonwebtoken';
import { createApp } from '../src/app.js';
import { MemoryRunHistory } from './support/memory-run-history.js';

const secret = 'test-secret';
const fixturesDir = fileURLToPath(new URL('./fixtures/', import.meta.url));
const defaultSourcePath = path.join(fixturesDir, 'shopping_sample.csv');

function token(permissions: string[]): string {
  return jwt.sign({ sub: 'analyst', permissions }, secret, { expiresIn: '5m' });
}

describe('runs API', () => {
  const history = new MemoryRunHistory();
  const enqueued: string[] = [];
  let server: Server;
  let baseUrl: string;

  before(async () => {
    const app = createApp({
      queue: {
        enqueue: async (sourcePath) => {
          enqueued.push(sourcePath);
          return history.create(sourcePath);
        },
      },
      history,
      dataDir: fixturesDir,
      defaultSourcePath,
      databaseTime: async () => '2026-01-01T00:00:00.000Z',
      jwtSecret: secret,
      accessLog: null,
    });
    server = app.listen(0);
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));
    const address = server.address();
    assert.ok(address !== null && typeof address === 'object');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  function post(body: unknown, authorization?: string): Promise<Response> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (authorization) headers.authorization = authorization;
    return fetch(`${baseUrl}/api/v1/runs`, { method: 'POST', headers, body: JSON.stringify(body) });
  }

  it('reports health without a token', async () => {
    const response = await fetch(`${baseUrl}/api/v1/health`);
    assert.equal(response.status, 200);
    assert.deepEqual(await response.json(), { status: 'ok', time: '2026-01-01T00:00:00.000Z' });
  });

  it('requires a bearer token', async () => {
    const response = await post({});
    assert.equal(response.status, 401);
    assert.deepEqual(await response.json(), { message: 'unauthorized' });
  });

  it('rejects a token signed with another secret', async () => {
    const forged = jwt.sign({ sub: 'analyst', permissions: ['*'] }, 'other-secret');
    const response = await post({}, `Bearer ${forged}`);
    assert.equal(response.status, 401);
    assert.deepEqual(await response.json(), { message: 'invalid token' });
  });

  it('requires the etl:run permission', async () => {
    const response = await post({}, `Bearer ${token(['reports:read'])}`);
    assert.equal(response.status, 403);
    assert.deepEqual(await response.json(), { message: 'forbidden' });
  });

  it('queues a run on the default source', async () => {
    const response = await post({}, `Bearer ${token(['etl:run'])}`);
    assert.equal(response.status, 202);
    const body: unknown = await response.json();
    assert.ok(typeof body === 'object' && body !== null && 'runId' in body);
    assert.equal(typeof body.runId, 'string');
    assert.deepEqual({ ...body, runId: null }, { status: 'queued', runId: null, source: 'shopping_sample.csv' });
    assert.equal(enqueued.at(-1), defaultSourcePath);
  });

  it('queues a named file from the data directory', async () => {
    const response = await post({ source: 'shopping_sample.csv' }, `Bearer ${token(['*'])}`);
    assert.equal(response.status, 202);
    assert.equal(enqueued.at(-1), path.join(fixturesDir, 'shopping_sample.csv'));
  });

  it('refuses paths outside the data directory', async () => {
    const response = await post({ source: '../secrets.csv' }, `Bearer ${token(['etl:run'])}`);
    assert.equal(response.status, 400);
    const body: unknown = await response.json();
    assert.ok(typeof body === 'object' && body !== null && 'message' in body);
    assert.equal(body.message, 'validation_failed');
  });

  it('refuses a file that does not exist', async () => {
    const response = await post({ source: 'missing.csv' }, `Bearer ${token(['etl:run'])}`);
    assert.equal(response.status, 400);
    assert.deepEqual(await response.json(), { message: 'source file missing.csv not found' });
  });

  it('returns a run by id', async () => {
    const id = await history.create(defaultSourcePath);
    const response = await fetch(`${baseUrl}/api/v1/runs/${id}`, {
      headers: { authorization: `Bearer ${token(['etl:run'])}` },
    });
    assert.equal(response.status, 200);
    const body: unknown = await response.json();
    assert.ok(typeof body === 'object' && body !== null && 'id' in body && 'status' in body);
    assert.equal(body.id, id);
    assert.equal(body.status, 'queued');
  });

  it('answers 404 for an unknown run and 400 for a malformed id', async () => {
    const headers = { authorization: `Bearer ${token(['etl:run'])}` };
    const unknown = await fetch(`${baseUrl}/api/v1/runs/00000000-0000-4000-8000-000000000000`, { headers });
    assert.equal(unknown.status, 404);
    assert.deepEqual(await unknown.json(), { message: 'run not found' });

    const malformed = await fetch(`${baseUrl}/api/v1/runs/42`, { headers });
    assert.equal(malformed.status, 400);
  });
});
