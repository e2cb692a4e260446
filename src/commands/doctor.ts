import path from 'node:path';
import { loadConfig, resolveConfigPath } from '../config/load.js';
import { AdwConfig } from '../config/schema.js';
import { getAdwPaths } from '../store/runs-root.js';
import { CHECK_NAMES, CheckOutcome, formatCheckLine, isBlocking, runChecks } from './preflight.js';

export interface DoctorOptions {
  config?: string;
  repo?: string;
}

export interface DoctorResult {
  repoPath: string;
  checks: CheckOutcome[];
  allPassed: boolean;
}

export async function runDoctorChecks(config: AdwConfig, repoPath: string): Promise<DoctorResult> {
  const paths = getAdwPaths(repoPath, config);
  const checks = await runChecks(CHECK_NAMES, { config, paths });
  const allPassed = !checks.some((c) => isBlocking(c.result, config.preflight.fail_on_warning));
  return { repoPath: paths.repo_root, checks, allPassed };
}

export async function doctorCommand(options: DoctorOptions): Promise<void> {
  const repoPath = path.resolve(options.repo || '.');
  const configPath = resolveConfigPath(repoPath, options.config);

  console.log('Doctor Check');
  console.log('============\n');

  let config: AdwConfig;
  try {
    config = loadConfig({ repoRoot: repoPath, configPath: options.config });
    console.log(`Config: ${configPath ?? '(defaults)'}`);
    console.log(`Repo: ${repoPath}\n`);
  } catch (err) {
    console.log(`Config: FAIL - ${(err as Error).message}`);
    process.exitCode = 1;
    return;
  }

  const result = await runDoctorChecks(config, repoPath);

  console.log('Checks\n------');
  for (const check of result.checks) {
    console.log(formatCheckLine(check));
  }
  console.log('');

  if (result.allPassed) {
    console.log('All checks passed.');
  } else {
    const failed = result.checks.filter((c) => !c.result.success).length;
    console.log(`${failed} check(s) failed.`);
    process.exitCode = 1;
  }
}
