import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, loadEnvironment, resolveConfigPath } from '../load.js';
import { adwConfigSchema } from '../schema.js';

describe('loadConfig', () => {
  let repoRoot: string;

  beforeEach(() => {
    repoRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'adw-config-'));
  });

  afterEach(() => {
    fs.rmSync(repoRoot, { recursive: true, force: true });
  });

  it('uses defaults without a config file', () => {
    const config = loadConfig({ repoRoot, env: {} });

    expect(config.paths).toEqual({ agents_dir: 'agents', trees_dir: 'trees' });
    expect(config.ports).toEqual({ base: 9100, pool_size: 15, host: '127.0.0.1' });
    expect(config.agent.bin).toBe('claude');
    expect(config.agent.retry_delays).toEqual([1, 3, 5]);
    expect(config.test.command).toBe('npm test');
    expect(config.trigger.port).toBe(8001);
    expect(config.env.anthropic_api_key).toBeUndefined();
  });

  it('reads the first config file it finds', () => {
    fs.writeFileSync(path.join(repoRoot, 'adw.config.yaml'), 'ports:\n  base: 9500\ntest:\n  command: pnpm test\n');

    const config = loadConfig({ repoRoot, env: {} });

    expect(resolveConfigPath(repoRoot)).toBe(path.join(repoRoot, 'adw.config.yaml'));
    expect(config.ports.base).toBe(9500);
    expect(config.ports.pool_size).toBe(15);
    expect(config.test.command).toBe('pnpm test');
  });

  it('rejects an explicit path that does not exist', () => {
    const missing = path.join(repoRoot, 'nope.json');
    expect(() => loadConfig({ repoRoot, configPath: missing, env: {} })).toThrow(`Config not found: ${missing}`);
  });

  it('rejects values outside their range', () => {
    fs.writeFileSync(path.join(repoRoot, 'adw.config.json'), JSON.stringify({ ports: { base: 80 } }));
    expect(() => loadConfig({ repoRoot, env: {} })).toThrow();
  });

  it('keeps the whole port pool below 65536', () => {
    expect(adwConfigSchema.parse({ ports: { base: 65521, pool_size: 15 } }).ports.base).toBe(65521);

    const result = adwConfigSchema.safeParse({ ports: { base: 65530, pool_size: 15 } });
    expect(result.success).toBe(false);
    expect(result.error?.issues.map((i) => [i.path.join('.'), i.message])).toEqual([
      ['ports.pool_size', 'ports.base + ports.pool_size - 1 must not exceed 65535']
    ]);
  });

  it('takes secrets and overrides from the environment', () => {
    const config = loadConfig({
      repoRoot,
      env: {
        ANTHROPIC_API_KEY: 'test-secret',
        CLAUDE_CODE_PATH: '/opt/bin/claude',
        GITHUB_REPO_URL: 'https://github.com/acme/widgets',
        ADW_TRIGGER_PORT: '8100',
        GITHUB_PAT: '  '
      }
    });

    expect(config.env.anthropic_api_key).toBe('test-secret');
    expect(config.agent.bin).toBe('/opt/bin/claude');
    expect(config.github.repo_url).toBe('https://github.com/acme/widgets');
    expect(config.trigger.port).toBe(8100);
    expect(config.env.github_pat).toBeUndefined();
  });

  it('rejects a non-numeric trigger port', () => {
    expect(() => loadConfig({ repoRoot, env: { ADW_TRIGGER_PORT: 'eighty' } })).toThrow(
      'ADW_TRIGGER_PORT must be a number, got: eighty'
    );
  });

  it('fills unset variables from .env', () => {
    fs.writeFileSync(path.join(repoRoot, '.env'), 'ANTHROPIC_API_KEY=from-file\nGITHUB_PAT=file-pat\n');

    const env = loadEnvironment(repoRoot, { GITHUB_PAT: 'test-pat' });

    expect(env.ANTHROPIC_API_KEY).toBe('from-file');
    expect(env.GITHUB_PAT).toBe('test-pat');
  });
});
