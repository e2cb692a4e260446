import { execa } from 'execa';
import { z } from 'zod';
import { Issue, IssueComment, PullRequestRef } from '../types/schemas.js';

/** Prefix on every comment this tool posts; the trigger ignores such comments. */
export const ADW_BOT_IDENTIFIER = '[ADW-AGENTS]';

/**
 * What the pipelines need from an issue tracker.
 */
export interface IssueRepository {
  fetchIssue(issueNumber: string): Promise<Issue>;
  postComment(issueNumber: string, body: string): Promise<void>;
  findPullRequest(branch: string): Promise<PullRequestRef | null>;
  mergePullRequest(branch: string): Promise<void>;
}

export function formatIssueMessage(
  runId: string,
  agentName: string,
  message: string,
  sessionId?: string
): string {
  const session = sessionId ? `_${sessionId}` : '';
  return `${ADW_BOT_IDENTIFIER} ${runId}_${agentName}${session}: ${message}`;
}

/**
 * `owner/repo` from a GitHub remote URL (https or ssh).
 */
export function extractRepoPath(url: string): string {
  const trimmed = url.trim();
  const github = /github\.com[:/]([^/]+\/[^/]+?)(?:\.git)?\/?$/.exec(trimmed);
  if (github) {
    return github[1];
  }
  const generic = /([^/:]+\/[^/]+?)(?:\.git)?\/?$/.exec(trimmed);
  if (generic) {
    return generic[1];
  }
  throw new Error(`Cannot extract repository path from URL: ${url}`);
}

/**
 * Latest comment mentioning `keyword` that this tool did not write.
 */
export function findKeywordComment(keyword: string, issue: Issue): IssueComment | null {
  const sorted = [...issue.comments].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  for (const comment of sorted) {
    if (comment.body.includes(ADW_BOT_IDENTIFIER)) {
      continue;
    }
    if (comment.body.includes(keyword)) {
      return comment;
    }
  }
  return null;
}

const ghUserSchema = z.object({ login: z.string() }).passthrough();

const ghIssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  body: z.string().nullable().default(''),
  state: z.string(),
  author: ghUserSchema.nullable().default(null),
  labels: z.array(z.object({ name: z.string() }).passthrough()).default([]),
  comments: z.array(z.object({
    id: z.string().default(''),
    author: ghUserSchema.nullable().default(null),
    body: z.string().default(''),
    createdAt: z.string().default('')
  }).passthrough()).default([]),
  url: z.string().default(''),
  createdAt: z.string().default(''),
  updatedAt: z.string().default('')
});

const ghPullRequestsSchema = z.array(z.object({
  number: z.number().int(),
  url: z.string()
}));

const ISSUE_FIELDS = 'number,title,body,state,author,labels,comments,createdAt,updatedAt,url';

export function parseGhIssue(raw: unknown): Issue {
  const data = ghIssueSchema.parse(raw);
  return {
    number: data.number,
    title: data.title,
    body: data.body ?? '',
    state: data.state,
    author: data.author?.login ?? '',
    labels: data.labels.map((l) => l.name),
    comments: data.comments.map((c) => ({
      id: c.id,
      author: c.author?.login ?? '',
      body: c.body,
      createdAt: c.createdAt
    })),
    url: data.url,
    createdAt: data.createdAt,
    updatedAt: data.updatedAt
  };
}

export interface GhIssueRepositoryOptions {
  /** `owner/repo` */
  repoPath: string;
  githubPat?: string;
  bin?: string;
}

/**
 * IssueRepository backed by the GitHub CLI (`gh`).
 */
export class GhIssueRepository implements IssueRepository {
  private readonly repoPath: string;
  private readonly githubPat?: string;
  private readonly bin: string;

  constructor(options: GhIssueRepositoryOptions) {
    this.repoPath = options.repoPath;
    this.githubPat = options.githubPat;
    this.bin = options.bin ?? 'gh';
  }

  private async gh(args: string[]): Promise<string> {
    const result = await execa(this.bin, args, {
      env: this.githubPat ? { GH_TOKEN: this.githubPat } : undefined,
      reject: false
    });
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${result.exitCode ?? 'unknown'}`;
      throw new Error(`gh ${args[0]} ${args[1]} failed: ${detail}`);
    }
    return result.stdout;
  }

  async fetchIssue(issueNumber: string): Promise<Issue> {
    const stdout = await this.gh([
      'issue', 'view', issueNumber,
      '-R', this.repoPath,
      '--json', ISSUE_FIELDS
    ]);
    return parseGhIssue(JSON.parse(stdout) as unknown);
  }

  async postComment(issueNumber: string, body: string): Promise<void> {
    await this.gh(['issue', 'comment', issueNumber, '-R', this.repoPath, '--body', body]);
  }

  async findPullRequest(branch: string): Promise<PullRequestRef | null> {
    const stdout = await this.gh([
      'pr', 'list',
      '-R', this.repoPath,
      '--head', branch,
      '--state', 'open',
      '--json', 'number,url'
    ]);
    const prs = ghPullRequestsSchema.parse(JSON.parse(stdout) as unknown);
    return prs[0] ?? null;
  }

  async mergePullRequest(branch: string): Promise<void> {
    await this.gh(['pr', 'merge', branch, '-R', this.repoPath, '--squash', '--delete-branch']);
  }
}
