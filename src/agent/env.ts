import { EnvConfig } from '../config/schema.js';

/** Variables passed through from the parent process when present. */
const PASSTHROUGH_VARS = [
  'HOME',
  'USER',
  'PATH',
  'SHELL',
  'TERM',
  'LANG',
  'LC_ALL',
  'TMPDIR',
  'NODE_PATH',
  'CLAUDE_BASH_MAINTAIN_PROJECT_WORKING_DIR'
] as const;

/**
 * Environment for the agent and other child processes: credentials from the
 * configuration plus the allow-listed variables above, nothing else.
 */
export function buildSafeEnv(
  env: EnvConfig,
  parentEnv: NodeJS.ProcessEnv = process.env
): Record<string, string> {
  const safe: Record<string, string> = {};

  for (const name of PASSTHROUGH_VARS) {
    const value = parentEnv[name];
    if (value !== undefined) {
      safe[name] = value;
    }
  }

  if (env.anthropic_api_key) {
    safe.ANTHROPIC_API_KEY = env.anthropic_api_key;
  }
  if (env.claude_code_path) {
    safe.CLAUDE_CODE_PATH = env.claude_code_path;
  }
  if (env.github_pat) {
    safe.GITHUB_PAT = env.github_pat;
    safe.GH_TOKEN = env.github_pat;
  }

  return safe;
}
