import { existsSync, readFileSync } from 'fs';
import * as path from 'path';
import { loadConfig } from '../boundaries/config-loader';
import { loadDealConfig, resolveDealPath, type LoadedDeal } from '../boundaries/deal-loader';
import { loadOutline, teamSectionNumber } from '../boundaries/outline-loader';
import { detectCheckpoint, type CheckpointDetection } from '../checkpoint/detector';
import { warn } from '../output/logger';
import type { PipelineSettings } from '../pipeline/context';
import type { CompanyContext } from '../pipeline/state';
import { FsDocumentRepository } from '../repository/fs-repository';
import {
  dealName,
  nextVersionDir,
  resolveVersionDir,
  type DocumentLocation,
} from '../repository/versioning';
import type { Config } from '../schemas/config-schemas';
import type { DocumentOptions } from '../schemas/cli-schemas';
import type { Strictness } from '../schemas/fact-check-schemas';
import type { Outline } from '../schemas/outline-schemas';

export interface DocumentSession {
  config: Config;
  location: DocumentLocation;
  dir: string;
  repo: FsDocumentRepository;
  outline: Outline;
  deal?: LoadedDeal;
  company: CompanyContext;
}

export type SessionMode = 'new' | 'existing';

interface SessionOptions extends Partial<Pick<DocumentOptions, 'firm' | 'deal' | 'version' | 'url' | 'config'>> {
  description?: string;
}

function resolveOutline(config: Config, deal: LoadedDeal | undefined): Outline {
  const fromDeal = deal?.config.outline;
  if (deal && fromDeal) {
    const ref = /\.ya?ml$/i.test(fromDeal) ? resolveDealPath(deal, fromDeal) : fromDeal;
    return loadOutline(ref, config.configDir);
  }
  return loadOutline(config.outline, config.configDir);
}

/**
 * Resolves configuration, the version directory, the deal config and the
 * outline for one document. `new` allocates the next version directory;
 * `existing` opens the requested or latest one.
 */
export function openSession(
  company: string | undefined,
  options: SessionOptions,
  mode: SessionMode,
  cwd: string = process.cwd()
): DocumentSession {
  const config = loadConfig(cwd, options.config);
  const location: DocumentLocation = {
    ...(company ? { company } : {}),
    ...(options.firm ? { firm: options.firm } : {}),
    ...(options.deal ? { deal: options.deal } : {}),
  };
  const roots = { outputRoot: config.outputRoot, ioRoot: config.ioRoot };

  const dir = mode === 'new' ? nextVersionDir(location, roots) : resolveVersionDir(location, roots, options.version);
  const deal = loadDealConfig(location, { ioRoot: config.ioRoot, dataRoot: config.dataRoot });
  const outline = resolveOutline(config, deal);

  const dealConfig = deal?.config;
  const url = options.url ?? dealConfig?.url;
  const description = options.description ?? dealConfig?.description;
  const companyContext: CompanyContext = {
    name: dealConfig?.company ?? company ?? dealName(location),
    ...(url ? { url } : {}),
    ...(description ? { description } : {}),
    ...(dealConfig?.stage ? { stage: dealConfig.stage } : {}),
    ...(dealConfig?.notes ? { notes: dealConfig.notes } : {}),
  };

  return {
    config,
    location,
    dir,
    repo: new FsDocumentRepository(dir),
    outline,
    ...(deal ? { deal } : {}),
    company: companyContext,
  };
}

export function detectSessionCheckpoint(session: DocumentSession): CheckpointDetection {
  return detectCheckpoint(session.repo.readAll(), {
    expectedSectionCount: session.outline.sections.length,
    teamSectionNumber: teamSectionNumber(session.outline),
  });
}

/**
 * `strictness` is the command-line or FACT_CHECK_STRICTNESS value; the
 * config file applies without one.
 */
export function pipelineSettings(config: Config, strictness?: Strictness): PipelineSettings {
  return {
    concurrency: config.concurrency,
    strictness: strictness ?? config.factCheck.strictness ?? 'high',
    evidence: {
      highRisk: config.factCheck.highRisk,
      mediumRisk: config.factCheck.mediumRisk,
      namedEntity: config.factCheck.namedEntity,
    },
    qualityThreshold: config.qualityThreshold,
    backReferences: config.citations.backReferences,
  };
}

/** Reads pre-extracted deck text. Binary decks are out of scope and skipped. */
export function readDeckText(deckPath: string | undefined, session: DocumentSession, cwd: string): string | undefined {
  const ref = deckPath ?? session.deal?.config.deck;
  if (!ref) return undefined;

  const file = deckPath
    ? path.resolve(cwd, deckPath)
    : session.deal
      ? resolveDealPath(session.deal, ref)
      : path.resolve(cwd, ref);
  if (!/\.(txt|md)$/i.test(file)) {
    warn(`[memoforge] Deck ${file} is not extracted text (.txt or .md), skipping deck analysis`);
    return undefined;
  }
  if (!existsSync(file)) {
    warn(`[memoforge] Deck ${file} not found, skipping deck analysis`);
    return undefined;
  }
  return readFileSync(file, 'utf-8');
}
