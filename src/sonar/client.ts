import { z } from 'zod';
import picomatch from 'picomatch';
import { CoverageConfig } from '../config/schema.js';

export type FetchLike = (input: string, init?: { headers?: Record<string, string> }) => Promise<{
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
}>;

const measureSchema = z.object({
  metric: z.string(),
  value: z.string().optional()
});

const componentResponseSchema = z.object({
  component: z.object({
    key: z.string(),
    measures: z.array(measureSchema).default([])
  })
});

const componentTreeResponseSchema = z.object({
  components: z.array(z.object({
    key: z.string(),
    path: z.string().optional(),
    measures: z.array(measureSchema).default([])
  })).default([])
});

export interface ProjectMetrics {
  coverage: number;
  uncovered_lines: number;
}

export interface UncoveredFile {
  path: string;
  coverage: number;
  uncovered_lines: number;
}

export interface CoverageSummary {
  project_key: string;
  total_uncovered_files: number;
  files: UncoveredFile[];
}

export interface SonarQubeOptions {
  url: string;
  token?: string;
  projectKey: string;
  fetch?: FetchLike;
}

function measureValue(measures: Array<z.infer<typeof measureSchema>>, metric: string): number {
  const raw = measures.find((m) => m.metric === metric)?.value;
  const parsed = raw === undefined ? Number.NaN : Number.parseFloat(raw);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/**
 * Read-only client for the SonarQube measures API.
 */
export class SonarQubeClient {
  private readonly baseUrl: string;
  private readonly token?: string;
  private readonly projectKey: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: SonarQubeOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
    this.token = options.token;
    this.projectKey = options.projectKey;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async get(pathname: string, params: Record<string, string>): Promise<unknown> {
    const query = new URLSearchParams(params).toString();
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    const response = await this.fetchImpl(`${this.baseUrl}${pathname}?${query}`, { headers });
    if (!response.ok) {
      throw new Error(`SonarQube ${pathname} returned HTTP ${response.status}`);
    }
    return response.json();
  }

  async getProjectMetrics(): Promise<ProjectMetrics> {
    const body = componentResponseSchema.parse(await this.get('/api/measures/component', {
      component: this.projectKey,
      metricKeys: 'coverage,uncovered_lines'
    }));
    return {
      coverage: measureValue(body.component.measures, 'coverage'),
      uncovered_lines: measureValue(body.component.measures, 'uncovered_lines')
    };
  }

  /** Files with at least one uncovered line, most uncovered first. */
  async getUncoveredFiles(): Promise<UncoveredFile[]> {
    const body = componentTreeResponseSchema.parse(await this.get('/api/measures/component_tree', {
      component: this.projectKey,
      metricKeys: 'coverage,uncovered_lines',
      qualifiers: 'FIL',
      ps: '500'
    }));
    return body.components
      .map((c) => ({
        path: c.path ?? c.key.replace(`${this.projectKey}:`, ''),
        coverage: measureValue(c.measures, 'coverage'),
        uncovered_lines: measureValue(c.measures, 'uncovered_lines')
      }))
      .filter((f) => f.uncovered_lines > 0)
      .sort((a, b) => b.uncovered_lines - a.uncovered_lines);
  }

  async getUncoveredFilesSummary(): Promise<CoverageSummary> {
    const files = await this.getUncoveredFiles();
    return {
      project_key: this.projectKey,
      total_uncovered_files: files.length,
      files
    };
  }
}

/**
 * Keep files matching an include glob and no exclude glob.
 */
export function filterCoverageSummary(summary: CoverageSummary, coverage: CoverageConfig): CoverageSummary {
  const isIncluded = picomatch(coverage.include);
  const isExcluded = coverage.exclude.length > 0 ? picomatch(coverage.exclude) : () => false;
  const files = summary.files.filter((f) => isIncluded(f.path) && !isExcluded(f.path));
  return { ...summary, total_uncovered_files: files.length, files };
}
