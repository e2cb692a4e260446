import fs from 'node:fs';
import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createTriggerApp } from '../../src/trigger/server.js';
import { FakeIssues, MemoryLogger, makeTempDir } from '../helpers/fakes.js';

describe('trigger server', () => {
  let agentsDir: string;
  let server: Server;
  let baseUrl: string;
  let launched: string[][];
  let failLaunch: boolean;

  beforeEach(async () => {
    agentsDir = makeTempDir('adw-server-');
    launched = [];
    failLaunch = false;
    const app = createTriggerApp({
      issues: new FakeIssues(),
      agentsDir,
      logger: new MemoryLogger(),
      launch: (command, issueNumber, runId) => {
        if (failLaunch) {
          throw new Error('spawn failed');
        }
        launched.push([command, issueNumber, runId]);
      }
    });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    fs.rmSync(agentsDir, { recursive: true, force: true });
  });

  function postWebhook(event: string, payload: unknown): Promise<Response> {
    return fetch(`${baseUrl}/gh-webhook`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-GitHub-Event': event },
      body: JSON.stringify(payload)
    });
  }

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'healthy', service: 'adw_webhook' });
  });

  it('launches the workflow a comment asks for', async () => {
    const res = await postWebhook('issue_comment', {
      action: 'created',
      issue: { number: 3 },
      comment: { body: 'adw_ship_iso adw-abc12345' }
    });

    expect(await res.json()).toEqual({ status: 'triggered', workflow: 'adw_ship_iso', run_id: 'abc12345', issue_number: 3 });
    expect(launched).toEqual([['ship', '3', 'abc12345']]);
  });

  it('answers with an error body when handling throws', async () => {
    failLaunch = true;

    const res = await postWebhook('issue_comment', {
      action: 'created',
      issue: { number: 3 },
      comment: { body: 'adw_plan_iso' }
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'error', message: 'spawn failed' });
  });
});
