import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import yaml from 'yaml';
import { AdwConfig, adwConfigSchema } from './schema.js';

const CONFIG_CANDIDATES = ['adw.config.json', 'adw.config.yaml', 'adw.config.yml'];

export interface LoadConfigOptions {
  repoRoot: string;
  configPath?: string;
  /** Defaults to process.env; values from <repoRoot>/.env fill in what is unset. */
  env?: NodeJS.ProcessEnv;
}

export function resolveConfigPath(repoPath: string, configPath?: string): string | null {
  if (configPath) {
    return path.resolve(configPath);
  }
  for (const candidate of CONFIG_CANDIDATES) {
    const full = path.resolve(repoPath, candidate);
    if (fs.existsSync(full)) {
      return full;
    }
  }
  return null;
}

function readConfigFile(configPath: string): unknown {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Config not found: ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, 'utf-8');
  if (configPath.endsWith('.yaml') || configPath.endsWith('.yml')) {
    return yaml.parse(raw) ?? {};
  }
  return JSON.parse(raw) as unknown;
}

/**
 * Merge <repoRoot>/.env under the given environment. Variables already set win.
 */
export function loadEnvironment(repoRoot: string, env: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const dotenvPath = path.join(repoRoot, '.env');
  if (!fs.existsSync(dotenvPath)) {
    return { ...env };
  }
  const fromFile = dotenv.parse(fs.readFileSync(dotenvPath));
  return { ...fromFile, ...env };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

/**
 * Build the configuration object once at start-up. Components receive it
 * explicitly; nothing below this reads process.env.
 */
export function loadConfig(options: LoadConfigOptions): AdwConfig {
  const configPath = resolveConfigPath(options.repoRoot, options.configPath);
  const fileConfig = configPath ? readConfigFile(configPath) : {};
  const config = adwConfigSchema.parse(fileConfig);
  const env = loadEnvironment(options.repoRoot, options.env);

  config.env = {
    ...config.env,
    anthropic_api_key: nonEmpty(env.ANTHROPIC_API_KEY) ?? config.env.anthropic_api_key,
    claude_code_path: nonEmpty(env.CLAUDE_CODE_PATH) ?? config.env.claude_code_path,
    github_pat: nonEmpty(env.GITHUB_PAT) ?? config.env.github_pat,
    sonarqube_url: nonEmpty(env.SONARQUBE_URL) ?? config.env.sonarqube_url,
    sonarqube_token: nonEmpty(env.SONARQUBE_TOKEN) ?? config.env.sonarqube_token,
    sonarqube_project_key: nonEmpty(env.SONARQUBE_PROJECT_KEY) ?? config.env.sonarqube_project_key
  };

  if (config.env.claude_code_path) {
    config.agent.bin = config.env.claude_code_path;
  }
  const repoUrl = nonEmpty(env.GITHUB_REPO_URL);
  if (repoUrl) {
    config.github.repo_url = repoUrl;
  }
  const triggerPort = nonEmpty(env.ADW_TRIGGER_PORT);
  if (triggerPort) {
    const parsed = Number.parseInt(triggerPort, 10);
    if (Number.isNaN(parsed)) {
      throw new Error(`ADW_TRIGGER_PORT must be a number, got: ${triggerPort}`);
    }
    config.trigger.port = parsed;
  }

  return config;
}
