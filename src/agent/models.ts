import { ModelName, ModelSet } from '../types/schemas.js';

export const DEFAULT_MODEL: ModelName = 'sonnet';

/**
 * Model per slash command and model set. New commands are added here;
 * anything missing runs on DEFAULT_MODEL.
 */
export const SLASH_COMMAND_MODEL_MAP: Readonly<Record<string, Readonly<Record<ModelSet, ModelName>>>> = {
  '/classify_issue': { base: 'sonnet', heavy: 'sonnet' },
  '/classify_adw': { base: 'sonnet', heavy: 'sonnet' },
  '/generate_branch_name': { base: 'sonnet', heavy: 'sonnet' },
  '/implement': { base: 'sonnet', heavy: 'opus' },
  '/test': { base: 'sonnet', heavy: 'sonnet' },
  '/resolve_failed_test': { base: 'sonnet', heavy: 'opus' },
  '/test_e2e': { base: 'sonnet', heavy: 'sonnet' },
  '/resolve_failed_e2e_test': { base: 'sonnet', heavy: 'opus' },
  '/review': { base: 'sonnet', heavy: 'sonnet' },
  '/document': { base: 'sonnet', heavy: 'opus' },
  '/commit': { base: 'sonnet', heavy: 'sonnet' },
  '/pull_request': { base: 'sonnet', heavy: 'sonnet' },
  '/chore': { base: 'sonnet', heavy: 'opus' },
  '/bug': { base: 'sonnet', heavy: 'opus' },
  '/feature': { base: 'sonnet', heavy: 'opus' },
  '/patch': { base: 'sonnet', heavy: 'opus' },
  '/install_worktree': { base: 'sonnet', heavy: 'sonnet' },
  '/track_agentic_kpis': { base: 'sonnet', heavy: 'sonnet' }
};

export function resolveModel(slashCommand: string, modelSet: ModelSet = 'base'): ModelName {
  const entry = SLASH_COMMAND_MODEL_MAP[slashCommand];
  return entry ? entry[modelSet] : DEFAULT_MODEL;
}
