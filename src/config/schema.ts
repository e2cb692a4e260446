import { z } from 'zod';

const pathsSchema = z.object({
  /** Per-run state, transcripts and logs (relative to the repo root unless absolute) */
  agents_dir: z.string().default('agents'),
  /** Worktree checkouts, one directory per run */
  trees_dir: z.string().default('trees')
});

const portsSchema = z.object({
  base: z.number().int().min(1024).max(65535).default(9100),
  pool_size: z.number().int().positive().default(15),
  host: z.string().default('127.0.0.1')
}).refine((ports) => ports.base + ports.pool_size - 1 <= 65535, {
  message: 'ports.base + ports.pool_size - 1 must not exceed 65535',
  path: ['pool_size']
});

const agentSchema = z.object({
  bin: z.string().default('claude'),
  timeout_ms: z.number().int().positive().default(300000),
  max_retries: z.number().int().positive().default(3),
  /** Seed delays in seconds; later attempts extend the last entry by retry_increment */
  retry_delays: z.array(z.number().nonnegative()).nonempty().default([1, 3, 5]),
  retry_increment: z.number().nonnegative().default(2),
  skip_permissions: z.boolean().default(true)
});

const githubSchema = z.object({
  repo_url: z.string().optional()
});

const preflightSchema = z.object({
  min_disk_gb: z.number().nonnegative().default(1),
  fail_on_warning: z.boolean().default(false)
});

const testSchema = z.object({
  command: z.string().default('npm test'),
  e2e_command: z.string().optional(),
  max_resolve_attempts: z.number().int().nonnegative().default(4)
});

const coverageSchema = z.object({
  include: z.array(z.string()).default(['src/**']),
  exclude: z.array(z.string()).default(['tests/**', '**/__tests__/**'])
});

const triggerSchema = z.object({
  port: z.number().int().positive().default(8001),
  agent_classification: z.boolean().default(false)
});

const envSchema = z.object({
  anthropic_api_key: z.string().optional(),
  claude_code_path: z.string().optional(),
  github_pat: z.string().optional(),
  sonarqube_url: z.string().optional(),
  sonarqube_token: z.string().optional(),
  sonarqube_project_key: z.string().optional()
});

export const adwConfigSchema = z.object({
  paths: pathsSchema.default({}),
  ports: portsSchema.default({}),
  agent: agentSchema.default({}),
  github: githubSchema.default({}),
  preflight: preflightSchema.default({}),
  test: testSchema.default({}),
  coverage: coverageSchema.default({}),
  trigger: triggerSchema.default({}),
  env: envSchema.default({})
});

export type AdwConfig = z.infer<typeof adwConfigSchema>;
export type AgentConfig = z.infer<typeof agentSchema>;
export type PortsConfig = z.infer<typeof portsSchema>;
export type CoverageConfig = z.infer<typeof coverageSchema>;
export type EnvConfig = z.infer<typeof envSchema>;
