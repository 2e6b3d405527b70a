import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import YAML from 'yaml';
import { slugify } from '../citations/toc';
import { ConfigError, ValidationError, handleUnknownError } from '../errors/index';
import { templatePath } from './template-locator';
import { OUTLINE_SCHEMA, type Outline } from '../schemas/outline-schemas';

export const DEFAULT_OUTLINE_NAME = 'direct-investment';

export function builtInOutlinePath(name: string = DEFAULT_OUTLINE_NAME): string {
  return templatePath('outlines', `${name}.yaml`);
}

export function parseOutline(raw: string, source: string): Outline {
  let data: unknown;
  try {
    data = YAML.parse(raw);
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Parsing outline');
    throw new ConfigError(`Failed to parse outline ${source}: ${err.message}`);
  }

  try {
    const parsed = OUTLINE_SCHEMA.parse(data);
    return {
      name: parsed.name,
      description: parsed.description,
      sections: [...parsed.sections]
        .sort((a, b) => a.number - b.number)
        .map((s) => ({ ...s, slug: s.slug ?? slugify(s.name) })),
    };
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid outline ${source}: ${e.message}`);
    }
    throw e;
  }
}

/**
 * Loads an outline from a YAML file path, or a built-in outline by name.
 * Without either, the default direct-investment outline.
 */
export function loadOutline(pathOrName?: string, cwd: string = process.cwd()): Outline {
  let file: string;
  if (!pathOrName) {
    file = builtInOutlinePath();
  } else if (/\.ya?ml$/i.test(pathOrName)) {
    file = path.resolve(cwd, pathOrName);
    if (!existsSync(file)) {
      throw new ConfigError(`Outline file not found: ${file}`);
    }
  } else {
    file = builtInOutlinePath(pathOrName);
  }
  return parseOutline(readFileSync(file, 'utf-8'), file);
}

/** The team section: first whose slug names the team or organization, else section 4. */
export function teamSectionNumber(outline: Outline): number {
  return outline.sections.find((s) => /team|organization/.test(s.slug))?.number ?? 4;
}
