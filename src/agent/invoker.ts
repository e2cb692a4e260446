import fs from 'node:fs';
import path from 'node:path';
import { execa } from 'execa';
import { AgentConfig, EnvConfig } from '../config/schema.js';
import { Logger, consoleLogger } from '../store/run-logger.js';
import { getAgentDir } from '../store/runs-root.js';
import { WorkflowState } from '../store/workflow-state.js';
import {
  AgentPromptRequest,
  AgentPromptResponse,
  AgentTemplateRequest
} from '../types/schemas.js';
import { buildSafeEnv } from './env.js';
import { resolveModel } from './models.js';
import {
  assistantText,
  parseTranscriptFile,
  truncateOutput,
  writeTranscriptJson
} from './output.js';
import { Sleeper, withRetry } from './retry.js';

/**
 * Anything that can run a slash command for a run and report the outcome.
 * Pipelines depend on this, not on the subprocess details.
 */
export interface AgentRunner {
  executeTemplate(request: AgentTemplateRequest): Promise<AgentPromptResponse>;
}

export interface AgentInvokerOptions {
  agent: AgentConfig;
  env: EnvConfig;
  agentsDir: string;
  /** Working directory when a request names none */
  repoRoot: string;
  parentEnv?: NodeJS.ProcessEnv;
  sleep?: Sleeper;
  logger?: Logger;
}

const ERROR_DURING_EXECUTION_MESSAGE =
  'Error during execution: Agent encountered an error and did not return a result';

export function formatTimeout(ms: number): string {
  if (ms >= 60000 && ms % 60000 === 0) {
    return `${ms / 60000} minutes`;
  }
  return ms >= 1000 ? `${Math.ceil(ms / 1000)} seconds` : `${ms} ms`;
}

/**
 * Runs the coding agent CLI in headless stream-json mode.
 *
 * Each request writes its transcript to `<agentsDir>/<runId>/<agentName>/raw_output.jsonl`
 * (plus a `.json` array copy) and its prompt to `.../prompts/<command>.txt`.
 */
export class AgentInvoker implements AgentRunner {
  private readonly options: AgentInvokerOptions;
  private readonly childEnv: Record<string, string>;
  private readonly logger: Logger;

  constructor(options: AgentInvokerOptions) {
    this.options = options;
    this.childEnv = buildSafeEnv(options.env, options.parentEnv ?? process.env);
    this.logger = options.logger ?? consoleLogger;
  }

  get bin(): string {
    return this.options.agent.bin;
  }

  /** Returns an error message when the CLI is missing, null otherwise. */
  async checkInstalled(): Promise<string | null> {
    const notInstalled = `Error: Agent CLI is not installed. Expected at: ${this.bin}`;
    try {
      const result = await execa(this.bin, ['--version'], {
        env: this.childEnv,
        extendEnv: false,
        timeout: 10000,
        reject: false
      });
      return result.exitCode === 0 ? null : notInstalled;
    } catch {
      return notInstalled;
    }
  }

  /**
   * Save the prompt under `prompts/<command>.txt` when it starts with a slash command.
   */
  savePrompt(prompt: string, runId: string, agentName: string): string | null {
    const match = /^(\/\w+)/.exec(prompt);
    if (!match) {
      return null;
    }
    const commandName = match[1].slice(1);
    const promptDir = path.join(getAgentDir(this.options.agentsDir, runId, agentName), 'prompts');
    fs.mkdirSync(promptDir, { recursive: true });
    const promptFile = path.join(promptDir, `${commandName}.txt`);
    fs.writeFileSync(promptFile, prompt);
    return promptFile;
  }

  buildArgs(request: AgentPromptRequest): string[] {
    const args = [
      '-p', request.prompt,
      '--model', request.model,
      '--output-format', 'stream-json',
      '--verbose'
    ];
    if (request.workingDir) {
      const mcpConfig = path.join(request.workingDir, '.mcp.json');
      if (fs.existsSync(mcpConfig)) {
        args.push('--mcp-config', mcpConfig);
      }
    }
    if (request.dangerouslySkipPermissions) {
      args.push('--dangerously-skip-permissions');
    }
    return args;
  }

  /**
   * One attempt, classified. Never throws.
   */
  async prompt(request: AgentPromptRequest): Promise<AgentPromptResponse> {
    const installError = await this.checkInstalled();
    if (installError) {
      return { output: installError, success: false, retryCode: 'none' };
    }

    this.savePrompt(request.prompt, request.runId, request.agentName);

    let fd: number | null = null;
    try {
      fs.mkdirSync(path.dirname(request.outputFile), { recursive: true });
      fd = fs.openSync(request.outputFile, 'w');

      const result = await execa(this.bin, this.buildArgs(request), {
        cwd: request.workingDir ?? this.options.repoRoot,
        env: this.childEnv,
        extendEnv: false,
        stdin: 'ignore',
        stdout: fd,
        stderr: 'pipe',
        timeout: this.options.agent.timeout_ms,
        reject: false
      });

      if (result.timedOut) {
        return {
          output: `Error: Agent command timed out after ${formatTimeout(this.options.agent.timeout_ms)}`,
          success: false,
          retryCode: 'timeout_error'
        };
      }
      if (typeof result.exitCode !== 'number') {
        return {
          output: `Error executing agent: ${result.stderr || 'process failed to start'}`,
          success: false,
          retryCode: 'execution_error'
        };
      }
      if (result.exitCode === 0) {
        return this.readSuccessfulRun(request.outputFile);
      }
      return this.readFailedRun(request.outputFile, result.exitCode, result.stderr ?? '');
    } catch (err) {
      return {
        output: `Error executing agent: ${(err as Error).message}`,
        success: false,
        retryCode: 'execution_error'
      };
    } finally {
      if (fd !== null) {
        fs.closeSync(fd);
      }
    }
  }

  private readSuccessfulRun(outputFile: string): AgentPromptResponse {
    const { messages, result } = parseTranscriptFile(outputFile);
    writeTranscriptJson(outputFile, messages);

    if (result) {
      if (result.subtype === 'error_during_execution') {
        return {
          output: ERROR_DURING_EXECUTION_MESSAGE,
          success: false,
          sessionId: result.session_id,
          retryCode: 'error_during_execution'
        };
      }
      const isError = result.is_error ?? false;
      let text = result.result ?? '';
      if (isError && text.length > 1000) {
        text = truncateOutput(text, 800);
      }
      return { output: text, success: !isError, sessionId: result.session_id, retryCode: 'none' };
    }

    let message = 'No result message found in agent output';
    for (const record of messages.slice(-5).reverse()) {
      const text = assistantText(record);
      if (text) {
        message = `Agent finished without a result message. Last output: ${text.slice(0, 500)}`;
        break;
      }
    }
    return { output: truncateOutput(message, 800), success: false, retryCode: 'none' };
  }

  private readFailedRun(outputFile: string, exitCode: number, stderr: string): AgentPromptResponse {
    const stderrMsg = stderr.trim();
    let stdoutMsg = '';
    let errorFromTranscript: string | null = null;

    const { messages, result } = parseTranscriptFile(outputFile);
    if (result?.is_error) {
      errorFromTranscript = result.result ?? 'Unknown error';
    } else {
      for (const record of messages.slice(-5).reverse()) {
        const text = assistantText(record);
        if (text && /error|failed/i.test(text)) {
          errorFromTranscript = text.slice(0, 500);
          break;
        }
      }
    }

    if (!errorFromTranscript && fs.existsSync(outputFile)) {
      const lines = fs.readFileSync(outputFile, 'utf-8').split('\n').filter((l) => l.trim());
      const lastLine = lines[lines.length - 1];
      if (lastLine) {
        stdoutMsg = lastLine.trim().slice(0, 200);
      }
    }

    let message: string;
    if (errorFromTranscript) {
      message = `Agent error: ${errorFromTranscript}`;
    } else if (stdoutMsg && !stderrMsg) {
      message = `Agent error: ${stdoutMsg}`;
    } else if (stderrMsg && !stdoutMsg) {
      message = `Agent error: ${stderrMsg}`;
    } else if (stdoutMsg && stderrMsg) {
      message = `Agent error: ${stderrMsg}\nStdout: ${stdoutMsg}`;
    } else {
      message = `Agent error: Command failed with exit code ${exitCode}`;
    }

    return { output: truncateOutput(message, 800), success: false, retryCode: 'claude_code_error' };
  }

  async promptWithRetry(request: AgentPromptRequest): Promise<AgentPromptResponse> {
    const { max_retries, retry_delays, retry_increment } = this.options.agent;
    return withRetry(
      () => this.prompt(request),
      { maxRetries: max_retries, delays: retry_delays, increment: retry_increment },
      {
        sleep: this.options.sleep,
        onRetry: (attempt, delaySeconds, previous) => {
          this.logger.warn(
            `${request.agentName}: ${previous.retryCode}, retrying in ${delaySeconds}s ` +
            `(attempt ${attempt + 1}/${max_retries})`
          );
        }
      }
    );
  }

  /**
   * `<slashCommand> <args...>` with the model chosen for the run's model set.
   */
  async executeTemplate(request: AgentTemplateRequest): Promise<AgentPromptResponse> {
    const state = WorkflowState.load(request.runId, this.options.agentsDir);
    const model = resolveModel(request.slashCommand, state?.get('model_set') ?? 'base');
    const prompt = [request.slashCommand, ...request.args].join(' ');
    const outputFile = path.join(getAgentDir(this.options.agentsDir, request.runId, request.agentName), 'raw_output.jsonl');

    this.logger.debug(`${request.agentName}: ${request.slashCommand} with model ${model}`);

    return this.promptWithRetry({
      prompt,
      runId: request.runId,
      agentName: request.agentName,
      model,
      dangerouslySkipPermissions: this.options.agent.skip_permissions,
      outputFile,
      workingDir: request.workingDir
    });
  }
}
