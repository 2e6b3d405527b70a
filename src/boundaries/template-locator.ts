import { existsSync } from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from '../errors/index';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// src/boundaries when run from sources, dist when bundled
const TEMPLATE_ROOTS = [path.resolve(__dirname, '../../templates'), path.resolve(__dirname, '../templates')];

export type TemplateKind = 'outlines' | 'prompts';

/** Absolute path of a file shipped under `templates/{kind}/`. */
export function templatePath(kind: TemplateKind, fileName: string): string {
  const candidates = TEMPLATE_ROOTS.map((root) => path.join(root, kind, fileName));
  const found = candidates.find((file) => existsSync(file));
  if (!found) {
    throw new ConfigError(`Built-in template '${kind}/${fileName}' not found (searched ${candidates.join(', ')})`);
  }
  return found;
}
