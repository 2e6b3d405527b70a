import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { DEAL_CONFIG_SCHEMA, type DealConfig } from '../schemas/deal-schemas';
import { handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';
import { dealName, type DocumentLocation } from '../repository/versioning';

export interface DealRoots {
  ioRoot: string;
  dataRoot: string;
}

export interface LoadedDeal {
  config: DealConfig;
  /** File the config came from; relative paths inside it resolve here. */
  file: string;
}

/**
 * Candidate deal files in priority order: `inputs/deal.json` then
 * `{deal}.json` inside a firm's deal directory, or `data/{deal}.json`.
 */
export function dealConfigCandidates(location: DocumentLocation, roots: DealRoots): string[] {
  const name = dealName(location);
  if (location.firm) {
    const dealDir = path.join(roots.ioRoot, location.firm, 'deals', name);
    return [path.join(dealDir, 'inputs', 'deal.json'), path.join(dealDir, `${name}.json`)];
  }
  return [path.join(roots.dataRoot, `${name}.json`)];
}

/**
 * Loads the optional deal configuration. A missing file yields undefined;
 * an unreadable or invalid one is a warning and also yields undefined.
 */
export function loadDealConfig(location: DocumentLocation, roots: DealRoots): LoadedDeal | undefined {
  const file = dealConfigCandidates(location, roots).find((f) => existsSync(f));
  if (!file) return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'Reading deal config');
    warn(`[memoforge] Could not read deal config ${file}: ${err.message}`);
    return undefined;
  }

  const result = DEAL_CONFIG_SCHEMA.safeParse(raw);
  if (!result.success) {
    warn(`[memoforge] Ignoring invalid deal config ${file}: ${formatIssues(result.error)}`);
    return undefined;
  }
  return { config: result.data, file };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/** Resolves a path from the deal file, relative to that file's directory. */
export function resolveDealPath(deal: LoadedDeal, value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(path.dirname(deal.file), value);
}
