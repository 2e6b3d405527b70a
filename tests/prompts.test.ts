import { describe, it, expect } from 'vitest';
import { ConfigError, ValidationError } from '../src/errors/index';
import { buildRequest, loadPrompt, parsePromptFile } from '../src/prompts/prompt-loader';
import { extractTemplateVariables, renderTemplate, type TemplateVariables } from '../src/prompts/template-renderer';
import { PROMPT_NAMES, type PromptName } from '../src/schemas/prompt-schemas';

describe('renderTemplate', () => {
  it('renders string and number variables', () => {
    const variables: TemplateVariables = { sectionName: 'Team', targetWords: 450 };
    expect(renderTemplate('Write "{{sectionName}}" in {{targetWords}} words.', variables)).toBe(
      'Write "Team" in 450 words.'
    );
  });

  it('joins array variables with newlines', () => {
    const variables: TemplateVariables = { questions: ['- Who founded it?', '- Who is hiring?'] };
    expect(renderTemplate('Questions:\n{{questions}}', variables)).toBe('Questions:\n- Who founded it?\n- Who is hiring?');
  });

  it('accepts whitespace inside placeholders', () => {
    expect(renderTemplate('Memo on {{ company }}', { company: 'Acme' })).toBe('Memo on Acme');
  });

  it('keeps empty values', () => {
    expect(renderTemplate('Notes: {{notes}}!', { notes: '' })).toBe('Notes: !');
  });

  it('names the missing variable and the available ones', () => {
    expect(() => renderTemplate('Memo on {{company}}', { url: 'https://acme.example' })).toThrow(
      "Template variable 'company' is not defined. Available variables: url"
    );
  });

  it('leaves footnote syntax alone', () => {
    expect(renderTemplate('{{section}}', { section: 'Revenue grew.[^1]' })).toBe('Revenue grew.[^1]');
  });
});

describe('extractTemplateVariables', () => {
  it('lists each variable once in order of appearance', () => {
    expect(extractTemplateVariables('{{a}} {{ b }} {{a}}')).toEqual(['a', 'b']);
  });

  it('returns nothing for plain text', () => {
    expect(extractTemplateVariables('no placeholders')).toEqual([]);
  });
});

describe('parsePromptFile', () => {
  it('splits frontmatter from the body', () => {
    const raw = '---\nid: quality-review\nsystem: Be fair.\ntemperature: 0\n---\nScore {{company}}.\n';
    expect(parsePromptFile(raw, 'quality-review.md')).toEqual({
      fullPath: 'quality-review.md',
      meta: { id: 'quality-review', system: 'Be fair.', temperature: 0 },
      body: 'Score {{company}}.\n',
    });
  });

  it('rejects a file without frontmatter', () => {
    expect(() => parsePromptFile('Score {{company}}.', 'bare.md')).toThrow(ConfigError);
  });

  it('rejects unterminated frontmatter', () => {
    expect(() => parsePromptFile('---\nid: quality-review\n', 'open.md')).toThrow(
      'Prompt open.md has unterminated frontmatter'
    );
  });

  it('rejects an unknown prompt id', () => {
    expect(() => parsePromptFile('---\nid: summarize\nsystem: x\n---\nBody', 'x.md')).toThrow(ValidationError);
  });
});

describe('built-in prompts', () => {
  const expected: Record<PromptName, string[]> = {
    'deck-analysis': ['company', 'deckText'],
    'company-research': ['company', 'url', 'description', 'deckSummary'],
    'section-research': ['sectionName', 'company', 'url', 'sectionDescription', 'guidingQuestions', 'researchSummary'],
    'section-draft': [
      'sectionNumber',
      'sectionName',
      'company',
      'sectionDescription',
      'targetWords',
      'deckSummary',
      'research',
    ],
    'enrich-socials': ['company', 'section'],
    'enrich-links': ['company', 'url', 'section'],
    'cite-section': ['company', 'section'],
    'quality-review': ['company', 'factCheckSummary', 'citationSummary', 'memo'],
  };

  it.each(PROMPT_NAMES)('%s references only the variables its stage supplies', (name) => {
    const prompt = loadPrompt(name);
    expect(prompt.meta.id).toBe(name);
    expect(extractTemplateVariables(prompt.body).sort()).toEqual([...expected[name]].sort());
  });

  it('names every variable a request leaves out', () => {
    expect(() => buildRequest('quality-review', { company: 'Acme' })).toThrow(
      new ValidationError('Prompt quality-review is missing variables: factCheckSummary, citationSummary, memo')
    );
  });

  it('builds a request with the frontmatter settings', () => {
    const controller = new AbortController();
    const request = buildRequest(
      'quality-review',
      { company: 'Acme', memo: '# Acme', factCheckSummary: 'not run', citationSummary: 'not run' },
      controller.signal
    );

    expect(request.systemPrompt).toBe(
      'You are a partner at a venture capital firm reviewing an investment memo before it goes to the investment committee. You are demanding and fair.'
    );
    expect(request.userPrompt.startsWith('Score this investment memo on Acme from 0 to 10')).toBe(true);
    expect(request.userPrompt.endsWith('Memo:\n\n# Acme')).toBe(true);
    expect(request.maxTokens).toBe(2048);
    expect(request.temperature).toBe(0);
    expect(request.signal).toBe(controller.signal);
  });

  it('omits settings the frontmatter leaves out', () => {
    const request = buildRequest('cite-section', { company: 'Acme', section: '## Team' });
    expect(request.maxTokens).toBeUndefined();
    expect(request.temperature).toBeUndefined();
    expect(request.signal).toBeUndefined();
  });
});
