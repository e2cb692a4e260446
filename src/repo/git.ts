import { execa } from 'execa';

export interface GitResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export async function git(
  args: string[],
  cwd: string
): Promise<{ stdout: string; stderr: string }>
{
  const result = await execa('git', args, { cwd });
  return { stdout: result.stdout, stderr: result.stderr };
}

export async function gitOptional(
  args: string[],
  cwd: string
): Promise<{ stdout: string; stderr: string } | null>
{
  try {
    return await git(args, cwd);
  } catch {
    return null;
  }
}

/**
 * Run git without throwing; callers inspect exitCode and stderr.
 */
export async function gitResult(args: string[], cwd: string): Promise<GitResult> {
  const result = await execa('git', args, { cwd, reject: false });
  return {
    exitCode: result.exitCode ?? 1,
    stdout: result.stdout,
    stderr: result.stderr
  };
}
