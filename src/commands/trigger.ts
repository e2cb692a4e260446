import path from 'node:path';
import { AgentInvoker } from '../agent/invoker.js';
import { buildSafeEnv } from '../agent/env.js';
import { loadConfig } from '../config/load.js';
import { AdwConfig } from '../config/schema.js';
import { consoleLogger } from '../store/run-logger.js';
import { getAdwPaths } from '../store/runs-root.js';
import { cliLauncher, createTriggerApp } from '../trigger/server.js';
import { RepoOptions, createIssueRepository, forwardedArgs, resolveGithubRepo } from './workflow.js';

export interface TriggerOptions extends RepoOptions {
  port?: string;
}

/** The safe agent environment plus the settings a launched pipeline reads. */
export function pipelineEnv(config: AdwConfig, parentEnv: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env = buildSafeEnv(config.env, parentEnv);
  const extra: Record<string, string | undefined> = {
    GITHUB_REPO_URL: config.github.repo_url,
    SONARQUBE_URL: config.env.sonarqube_url,
    SONARQUBE_TOKEN: config.env.sonarqube_token,
    SONARQUBE_PROJECT_KEY: config.env.sonarqube_project_key
  };
  for (const [name, value] of Object.entries(extra)) {
    if (value) {
      env[name] = value;
    }
  }
  return env;
}

/**
 * Serve the GitHub webhook endpoint until the process is stopped.
 */
export async function triggerCommand(options: TriggerOptions): Promise<void> {
  const repoRoot = path.resolve(options.repo ?? '.');
  const config = loadConfig({ repoRoot, configPath: options.config });
  const paths = getAdwPaths(repoRoot, config);
  const issues = createIssueRepository(config, await resolveGithubRepo(config, paths.repo_root));
  const port = options.port ? Number.parseInt(options.port, 10) : config.trigger.port;

  const app = createTriggerApp({
    issues,
    agentsDir: paths.agents_dir,
    logger: consoleLogger,
    launch: cliLauncher({
      forward: forwardedArgs({ repo: repoRoot, config: options.config }),
      env: pipelineEnv(config),
      cwd: paths.repo_root,
      logger: consoleLogger
    }),
    classifier: config.trigger.agent_classification
      ? new AgentInvoker({
        agent: config.agent,
        env: config.env,
        agentsDir: paths.agents_dir,
        repoRoot: paths.repo_root
      })
      : null
  });

  await new Promise<void>((resolve, reject) => {
    const server = app.listen(port, () => {
      console.log(`Starting ADW Webhook Trigger on port ${port}`);
      console.log(`Webhook endpoint: http://localhost:${port}/gh-webhook`);
      console.log(`Health check: http://localhost:${port}/health`);
    });
    server.on('error', reject);
    server.on('close', resolve);
  });
}
