/**
 * @fileoverview Research workflow prompts and review note templates
 *
 * Files are looked up in the user's prompts directory first and in the
 * packaged `prompts/` directory second, so users can override any prompt
 * or template by dropping a file with the same name into
 * ~/.zotero-mcp/prompts/.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getErrorMessage } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';

export const WORKFLOW_PROMPT_NAMES = [
  'knowledge_discovery',
  'literature_review',
  'comparative_review',
  'bibliography_export',
] as const;

export type WorkflowPromptName = (typeof WORKFLOW_PROMPT_NAMES)[number];

export function getPackagedPromptsDir(): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(moduleDir, '..', '..', 'prompts');
}

export class PromptLibrary {
  readonly promptsDir: string;
  readonly defaultsDir: string;

  constructor(promptsDir: string, defaultsDir: string = getPackagedPromptsDir()) {
    this.promptsDir = promptsDir;
    this.defaultsDir = defaultsDir;
  }

  /** `<name>.md`, or null when neither directory has a readable copy. */
  async loadPrompt(name: string): Promise<string | null> {
    return this.readFirst(`${name}.md`);
  }

  /** `<name>_template.html`, or null when neither directory has a readable copy. */
  async loadTemplate(name: string): Promise<string | null> {
    return this.readFirst(`${name}_template.html`);
  }

  private async readFirst(filename: string): Promise<string | null> {
    for (const dir of [this.promptsDir, this.defaultsDir]) {
      const candidate = path.join(dir, filename);
      try {
        return await fs.readFile(candidate, 'utf8');
      } catch (error) {
        logDebug('[prompts] not readable', { path: candidate, error: getErrorMessage(error) });
      }
    }
    return null;
  }
}

// ============================================================================
// WORKFLOW PROMPTS
// ============================================================================

export interface WorkflowPromptArgs {
  query?: string;
  itemKey?: string;
  itemKeys?: string[];
}

function formatKeysList(itemKeys: readonly string[]): string {
  return itemKeys.map((key) => `\`${key}\``).join(', ');
}

/**
 * Fill a workflow prompt's `{query}`, `{item_key}`, `{keys_list}` and
 * `{first_key}` slots. A missing prompt file yields an error line instead
 * of a prompt.
 */
export async function renderWorkflowPrompt(
  library: PromptLibrary,
  name: WorkflowPromptName,
  args: WorkflowPromptArgs
): Promise<string> {
  const prompt = await library.loadPrompt(name);
  const itemKeys = args.itemKeys ?? [];
  const keysList = formatKeysList(itemKeys);

  switch (name) {
    case 'knowledge_discovery': {
      const query = args.query ?? '';
      return prompt
        ? prompt.split('{query}').join(query)
        : `Error: knowledge_discovery prompt not found for query '${query}'`;
    }
    case 'literature_review': {
      const itemKey = args.itemKey ?? '';
      return prompt
        ? prompt.split('{item_key}').join(itemKey)
        : `Error: literature_review prompt not found for item ${itemKey}`;
    }
    case 'comparative_review': {
      const firstKey = itemKeys[0] ?? 'ITEM_KEY';
      return prompt
        ? prompt.split('{keys_list}').join(keysList).split('{first_key}').join(firstKey)
        : `Error: comparative_review prompt not found for papers ${keysList}`;
    }
    case 'bibliography_export':
      return prompt
        ? prompt.split('{keys_list}').join(keysList)
        : `Error: bibliography_export prompt not found for papers ${keysList}`;
  }
}

// ============================================================================
// WORKFLOW SUGGESTION
// ============================================================================

interface WorkflowTrigger {
  promptName: WorkflowPromptName;
  triggers: readonly string[];
}

// Comparative is checked before the single-paper review so that
// "comparative review" is not caught by the bare "review" trigger.
const WORKFLOW_TRIGGERS: readonly WorkflowTrigger[] = [
  {
    promptName: 'comparative_review',
    triggers: ['comparative', 'compare papers', 'multiple papers', 'synthesis', 'comparison'],
  },
  {
    promptName: 'literature_review',
    triggers: ['literature review', 'review paper', 'analyze paper', 'paper analysis', 'single paper', 'review'],
  },
  {
    promptName: 'bibliography_export',
    triggers: ['bibliography', 'citation', 'bibtex', 'reference list', 'cite'],
  },
  {
    promptName: 'knowledge_discovery',
    triggers: ['explore', 'discover', 'find related', 'knowledge', 'topic'],
  },
];

export const WORKFLOW_MENU = [
  '# Available Research Workflows',
  '',
  'Call this tool again with one of these task types:',
  '- "literature review" - Deep analysis of a single paper',
  '- "comparative review" - Compare and synthesize multiple papers',
  '- "bibliography" - Export citations and BibTeX',
  '- "knowledge discovery" - Explore your knowledge base on a topic',
].join('\n');

export function matchWorkflow(task: string): WorkflowPromptName | null {
  const lowered = task.toLowerCase();
  for (const workflow of WORKFLOW_TRIGGERS) {
    if (workflow.triggers.some((trigger) => lowered.includes(trigger))) {
      return workflow.promptName;
    }
  }
  return null;
}

/**
 * The full instructions of the workflow the task describes, or the menu of
 * workflows when nothing matches.
 */
export async function suggestWorkflow(library: PromptLibrary, task: string): Promise<string> {
  const promptName = matchWorkflow(task);
  if (!promptName) {
    return WORKFLOW_MENU;
  }
  const prompt = await library.loadPrompt(promptName);
  if (!prompt) {
    return `Error: Could not load ${promptName} prompt`;
  }
  return `# Follow these instructions:\n\n${prompt}`;
}
