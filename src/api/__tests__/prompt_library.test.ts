import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { makeTempDir } from '../../__tests__/fixtures/zotero_fixtures.js';
import {
  getPackagedPromptsDir,
  matchWorkflow,
  PromptLibrary,
  renderWorkflowPrompt,
  suggestWorkflow,
  WORKFLOW_MENU,
  WORKFLOW_PROMPT_NAMES,
} from '../prompt_library.js';

describe('PromptLibrary', () => {
  let userDir: string;
  let defaultsDir: string;
  let library: PromptLibrary;

  beforeEach(() => {
    userDir = makeTempDir('zotero-prompts-user-');
    defaultsDir = makeTempDir('zotero-prompts-defaults-');
    library = new PromptLibrary(userDir, defaultsDir);
  });

  afterEach(() => {
    fs.rmSync(userDir, { recursive: true, force: true });
    fs.rmSync(defaultsDir, { recursive: true, force: true });
  });

  it('prefers the user copy over the packaged one', async () => {
    fs.writeFileSync(path.join(defaultsDir, 'literature_review.md'), 'default');
    fs.writeFileSync(path.join(userDir, 'literature_review.md'), 'custom');

    await expect(library.loadPrompt('literature_review')).resolves.toBe('custom');
  });

  it('falls back to the packaged copy', async () => {
    fs.writeFileSync(path.join(defaultsDir, 'literature_review_template.html'), '<h1>${title}</h1>');

    await expect(library.loadTemplate('literature_review')).resolves.toBe('<h1>${title}</h1>');
  });

  it('returns null when neither directory has the file', async () => {
    await expect(library.loadPrompt('knowledge_discovery')).resolves.toBeNull();
    await expect(library.loadTemplate('comparative_review')).resolves.toBeNull();
  });

  describe('renderWorkflowPrompt', () => {
    it('fills the query', async () => {
      fs.writeFileSync(path.join(defaultsDir, 'knowledge_discovery.md'), 'Explore {query}; then {query} again');

      await expect(renderWorkflowPrompt(library, 'knowledge_discovery', { query: 'graphs' })).resolves.toBe(
        'Explore graphs; then graphs again'
      );
    });

    it('fills the key list and first key', async () => {
      fs.writeFileSync(path.join(defaultsDir, 'comparative_review.md'), 'Compare {keys_list}; save on {first_key}');

      await expect(
        renderWorkflowPrompt(library, 'comparative_review', { itemKeys: ['AAAA1111', 'BBBB2222'] })
      ).resolves.toBe('Compare `AAAA1111`, `BBBB2222`; save on AAAA1111');
      await expect(renderWorkflowPrompt(library, 'comparative_review', {})).resolves.toBe('Compare ; save on ITEM_KEY');
    });

    it('reports a missing prompt in the text', async () => {
      await expect(renderWorkflowPrompt(library, 'knowledge_discovery', { query: 'graphs' })).resolves.toBe(
        "Error: knowledge_discovery prompt not found for query 'graphs'"
      );
      await expect(renderWorkflowPrompt(library, 'literature_review', { itemKey: 'ABCD2345' })).resolves.toBe(
        'Error: literature_review prompt not found for item ABCD2345'
      );
      await expect(renderWorkflowPrompt(library, 'bibliography_export', { itemKeys: ['AAAA1111'] })).resolves.toBe(
        'Error: bibliography_export prompt not found for papers `AAAA1111`'
      );
    });
  });

  describe('suggestWorkflow', () => {
    it('returns the matched prompt as instructions', async () => {
      fs.writeFileSync(path.join(defaultsDir, 'bibliography_export.md'), 'Export {keys_list}');

      await expect(suggestWorkflow(library, 'Make a BibTeX file')).resolves.toBe(
        '# Follow these instructions:\n\nExport {keys_list}'
      );
    });

    it('reports a matched workflow whose prompt is missing', async () => {
      await expect(suggestWorkflow(library, 'explore transformers')).resolves.toBe(
        'Error: Could not load knowledge_discovery prompt'
      );
    });

    it('returns the menu when nothing matches', async () => {
      await expect(suggestWorkflow(library, 'hello')).resolves.toBe(WORKFLOW_MENU);
    });
  });
});

describe('matchWorkflow', () => {
  it('routes comparative requests before the single-paper review', () => {
    expect(matchWorkflow('Write a comparative review of these')).toBe('comparative_review');
    expect(matchWorkflow('Literature review of this paper')).toBe('literature_review');
    expect(matchWorkflow('please review it')).toBe('literature_review');
    expect(matchWorkflow('Cite these for me')).toBe('bibliography_export');
    expect(matchWorkflow('Discover what I know about RL')).toBe('knowledge_discovery');
    expect(matchWorkflow('what time is it')).toBeNull();
  });
});

describe('packaged prompts', () => {
  it('ships every workflow prompt and both review templates', () => {
    const dir = getPackagedPromptsDir();
    for (const name of WORKFLOW_PROMPT_NAMES) {
      expect(fs.existsSync(path.join(dir, `${name}.md`))).toBe(true);
    }
    expect(fs.existsSync(path.join(dir, 'literature_review_template.html'))).toBe(true);
    expect(fs.existsSync(path.join(dir, 'comparative_review_template.html'))).toBe(true);
  });

  it('renders the packaged literature review prompt with the item key', async () => {
    const library = new PromptLibrary(path.join(makeTempDir('zotero-prompts-empty-'), 'none'));

    const text = await renderWorkflowPrompt(library, 'literature_review', { itemKey: 'ABCD2345' });

    expect(text.split('\n')[2]).toBe('Write a structured review of the paper with item key `ABCD2345`.');
    expect(text).not.toContain('{item_key}');
  });
});
