import { z } from 'zod';
import { readFileSync } from 'fs';
import YAML from 'yaml';
import { templatePath } from '../boundaries/template-locator';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import type { GenerationRequest } from '../providers/text-generator';
import { PROMPT_META_SCHEMA, type PromptFile, type PromptName } from '../schemas/prompt-schemas';
import { extractTemplateVariables, renderTemplate, type TemplateVariables } from './template-renderer';

/**
 * Splits a prompt file into YAML frontmatter and body, then validates the
 * frontmatter.
 */
export function parsePromptFile(raw: string, fullPath: string): PromptFile {
  if (!raw.startsWith('---')) {
    throw new ConfigError(`Prompt ${fullPath} is missing its frontmatter`);
  }
  const end = raw.indexOf('\n---', 3);
  if (end === -1) {
    throw new ConfigError(`Prompt ${fullPath} has unterminated frontmatter`);
  }

  let data: unknown;
  try {
    data = YAML.parse(raw.slice(3, end).trim());
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing prompt frontmatter');
    throw new ConfigError(`Prompt ${fullPath} has invalid YAML frontmatter: ${err.message}`);
  }

  try {
    const meta = PROMPT_META_SCHEMA.parse(data);
    const body = raw.slice(end + 4).replace(/^\s*\n/, '');
    return { fullPath, meta, body };
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid prompt frontmatter in ${fullPath}: ${e.message}`);
    }
    throw e;
  }
}

const cache = new Map<PromptName, PromptFile>();

export function loadPrompt(name: PromptName): PromptFile {
  const cached = cache.get(name);
  if (cached) return cached;

  const fullPath = templatePath('prompts', `${name}.md`);
  const prompt = parsePromptFile(readFileSync(fullPath, 'utf-8'), fullPath);
  if (prompt.meta.id !== name) {
    throw new ConfigError(`Prompt ${fullPath} declares id '${prompt.meta.id}', expected '${name}'`);
  }
  cache.set(name, prompt);
  return prompt;
}

/** Renders a built-in prompt into a generation request. */
export function buildRequest(name: PromptName, variables: TemplateVariables, signal?: AbortSignal): GenerationRequest {
  const prompt = loadPrompt(name);
  const missing = [
    ...new Set([...extractTemplateVariables(prompt.meta.system), ...extractTemplateVariables(prompt.body)]),
  ].filter((v) => variables[v] === undefined);
  if (missing.length > 0) {
    throw new ValidationError(`Prompt ${name} is missing variables: ${missing.join(', ')}`);
  }
  const request: GenerationRequest = {
    systemPrompt: renderTemplate(prompt.meta.system, variables).trim(),
    userPrompt: renderTemplate(prompt.body, variables).trim(),
  };
  if (prompt.meta.maxTokens !== undefined) request.maxTokens = prompt.meta.maxTokens;
  if (prompt.meta.temperature !== undefined) request.temperature = prompt.meta.temperature;
  if (signal) request.signal = signal;
  return request;
}
