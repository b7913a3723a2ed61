import { ValidationError } from './errors.js';
import { ownValue } from './utils/record.js';

/**
 * Launch commands for interactive assistant CLIs, keyed by llm id. The
 * `llms` section of config.yml adds ids or overrides these.
 */
export const DEFAULT_LLM_COMMANDS: Readonly<Record<string, string>> = {
  claude: 'claude',
  codex: 'codex',
};

export interface LlmTemplateVars {
  feature: string;
  repo: string;
  host: string;
  worktree: string;
}

const PLACEHOLDER = /\{(feature|repo|host|worktree)\}/g;

export function knownLlms(configured: Record<string, string>): string[] {
  return Object.keys({ ...DEFAULT_LLM_COMMANDS, ...configured }).sort();
}

/**
 * Resolve the command to run for `llm`. An explicit override wins; otherwise
 * the configured or default template is filled in with `{feature}`, `{repo}`,
 * `{host}` and `{worktree}`.
 */
export function resolveLlmCommand(
  llm: string,
  configured: Record<string, string>,
  vars: LlmTemplateVars,
  override?: string
): string {
  if (override) {
    return override;
  }
  const templates: Record<string, string> = { ...DEFAULT_LLM_COMMANDS, ...configured };
  const template = ownValue(templates, llm);
  if (!template) {
    throw new ValidationError(`Unknown llm '${llm}'. Known: ${knownLlms(configured).join(', ')}`);
  }
  return template.replace(PLACEHOLDER, (_match, name: keyof LlmTemplateVars) => vars[name]);
}

/** First word of a template, for `command -v` checks. */
export function llmBinary(template: string): string {
  return template.trim().split(/\s+/)[0] ?? template;
}
