import { spawn } from 'node:child_process';
import express from 'express';
import type { Express } from 'express';
import { Logger } from '../store/run-logger.js';
import { PipelineLauncher, TriggerDeps, handleWebhook } from './router.js';

export function createTriggerApp(deps: TriggerDeps): Express {
  const app = express();
  app.use(express.json({ limit: '5mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', service: 'adw_webhook' });
  });

  // GitHub gives webhooks ten seconds, so the pipeline is only launched here.
  app.post('/gh-webhook', async (req, res) => {
    const event = req.header('X-GitHub-Event') ?? '';
    try {
      res.json(await handleWebhook(deps, event, req.body));
    } catch (err) {
      const message = (err as Error).message;
      deps.logger.error(`Exception in webhook handler: ${message}`);
      res.json({ status: 'error', message });
    }
  });

  return app;
}

export interface CliLauncherOptions {
  /** Arguments appended to every launch (e.g. --repo, --config) */
  forward: string[];
  env: Record<string, string>;
  cwd: string;
  logger: Logger;
}

/**
 * Launch this CLI detached, so the pipeline outlives the request (and the
 * server).
 */
export function cliLauncher(options: CliLauncherOptions): PipelineLauncher {
  return (command, issueNumber, runId) => {
    const child = spawn(
      process.execPath,
      [...process.execArgv, process.argv[1], command, issueNumber, runId, ...options.forward],
      { cwd: options.cwd, env: options.env, detached: true, stdio: 'ignore' }
    );
    child.on('error', (err) => {
      options.logger.error(`Failed to launch ${command}: ${err.message}`);
    });
    child.unref();
  };
}
