import { execa } from 'execa';
import { WorkflowError } from '../errors.js';
import { Logger } from '../store/run-logger.js';
import { makeRunId } from '../store/run-utils.js';

export type PhaseName = 'plan' | 'build' | 'test' | 'review' | 'document' | 'ship';

export interface CompositePhase {
  name: PhaseName;
  /** A failed advisory phase is reported and the chain continues. */
  advisory: boolean;
}

function phase(name: PhaseName, advisory = false): CompositePhase {
  return { name, advisory };
}

export const COMPOSITE_PHASES = {
  'plan-build': [phase('plan'), phase('build')],
  'plan-build-test': [phase('plan'), phase('build'), phase('test', true)],
  'plan-build-review': [phase('plan'), phase('build'), phase('review')],
  'plan-build-document': [phase('plan'), phase('build'), phase('document', true)],
  'plan-build-test-review': [phase('plan'), phase('build'), phase('test', true), phase('review')],
  sdlc: [
    phase('plan'),
    phase('build'),
    phase('test', true),
    phase('review'),
    phase('document', true),
    phase('ship')
  ]
} as const satisfies Record<string, readonly CompositePhase[]>;

export type CompositeName = keyof typeof COMPOSITE_PHASES;

export function isCompositeName(name: string): name is CompositeName {
  return Object.prototype.hasOwnProperty.call(COMPOSITE_PHASES, name);
}

/** Runs one phase to completion and resolves with its exit code. */
export type PhaseRunner = (args: string[]) => Promise<number>;

/**
 * Re-invoke this CLI for a phase, inheriting the terminal.
 */
export const cliPhaseRunner: PhaseRunner = async (args) => {
  const result = await execa(process.execPath, [...process.execArgv, process.argv[1], ...args], {
    stdio: 'inherit',
    reject: false
  });
  return typeof result.exitCode === 'number' ? result.exitCode : 1;
};

export interface CompositeOptions {
  issueNumber: string;
  runId?: string;
  /** Extra arguments forwarded to every phase (e.g. --repo, --config). */
  forward?: string[];
  /** Extra arguments for the test phase. */
  testArgs?: string[];
  runner?: PhaseRunner;
  logger: Logger;
}

export interface PhaseOutcome {
  name: PhaseName;
  exitCode: number;
  advisory: boolean;
}

export interface CompositeResult {
  runId: string;
  phases: PhaseOutcome[];
}

/**
 * Run the phases of a composite workflow one after another against a
 * single run ID. The first failing required phase stops the chain.
 */
export async function runComposite(name: CompositeName, options: CompositeOptions): Promise<CompositeResult> {
  const { logger } = options;
  const runner = options.runner ?? cliPhaseRunner;
  const runId = options.runId ?? makeRunId();
  const forward = options.forward ?? [];
  logger.info(`Using ADW ID: ${runId}`);

  const phases: PhaseOutcome[] = [];
  for (const step of COMPOSITE_PHASES[name]) {
    const args = [step.name, options.issueNumber, runId, ...forward];
    if (step.name === 'test' && options.testArgs) {
      args.push(...options.testArgs);
    }
    logger.info(`\n=== ISOLATED ${step.name.toUpperCase()} PHASE ===`);
    const exitCode = await runner(args);
    phases.push({ name: step.name, exitCode, advisory: step.advisory });

    if (exitCode === 0) {
      continue;
    }
    if (step.advisory) {
      logger.warn(`⚠️ ${step.name} phase failed with exit code ${exitCode}; continuing`);
      continue;
    }
    throw new WorkflowError({
      message: `Isolated ${step.name} phase failed with exit code ${exitCode}`,
      issueNumber: options.issueNumber,
      runId,
      // the phase reported its own failure on the issue
      shouldComment: false,
      exitCode
    });
  }

  logger.info('\n=== ISOLATED WORKFLOW COMPLETED ===');
  logger.info(`ADW ID: ${runId}`);
  return { runId, phases };
}
