import fs from 'node:fs';
import path from 'node:path';
import { writeFileSync } from 'atomically';
import {
  WorkflowStateData,
  WorkflowStateUpdate,
  workflowStateSchema
} from '../types/schemas.js';

/**
 * Persistent record of one workflow run, stored at `<agentsDir>/<runId>/state.json`.
 *
 * Pipelines for a single run execute one after another, so there is no
 * locking; different runs never share a file.
 */
export class WorkflowState {
  private data: WorkflowStateData;
  private readonly statePath: string;

  private constructor(data: WorkflowStateData, agentsDir: string) {
    this.data = data;
    this.statePath = path.join(agentsDir, data.run_id, 'state.json');
  }

  static create(runId: string, agentsDir: string): WorkflowState {
    return new WorkflowState(workflowStateSchema.parse({ run_id: runId }), agentsDir);
  }

  /**
   * Returns null when no state has been saved for this run.
   * A file that exists but does not parse is an error.
   */
  static load(runId: string, agentsDir: string): WorkflowState | null {
    const target = path.join(agentsDir, runId, 'state.json');
    if (!fs.existsSync(target)) {
      return null;
    }
    const raw = fs.readFileSync(target, 'utf-8');
    const parsed = workflowStateSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid state file ${target}: ${parsed.error.message}`);
    }
    if (parsed.data.run_id !== runId) {
      throw new Error(`State file ${target} belongs to run ${parsed.data.run_id}`);
    }
    return new WorkflowState(parsed.data, agentsDir);
  }

  get runId(): string {
    return this.data.run_id;
  }

  get path(): string {
    return this.statePath;
  }

  get<K extends keyof WorkflowStateData>(key: K): WorkflowStateData[K] {
    return this.data[key];
  }

  get history(): readonly string[] {
    return this.data.history;
  }

  update(fields: WorkflowStateUpdate): void {
    const defined = Object.fromEntries(
      Object.entries(fields).filter(([, value]) => value !== undefined)
    );
    this.data = workflowStateSchema.parse({ ...this.data, ...defined, run_id: this.data.run_id });
  }

  /** Duplicates are kept: a phase that ran twice shows up twice. */
  appendHistory(name: string): void {
    this.data = { ...this.data, history: [...this.data.history, name] };
  }

  /**
   * Write the state atomically (temp file + rename) so readers never see a
   * partial file. The label names the step in failure messages.
   */
  save(label = 'unknown step'): void {
    try {
      fs.mkdirSync(path.dirname(this.statePath), { recursive: true });
      writeFileSync(this.statePath, `${JSON.stringify(this.data, null, 2)}\n`);
    } catch (err) {
      throw new Error(`Failed to save state for ${this.data.run_id} (${label}): ${(err as Error).message}`, {
        cause: err
      });
    }
  }

  toJSON(): WorkflowStateData {
    return { ...this.data, history: [...this.data.history] };
  }
}
