import fg from 'fast-glob';
import { existsSync } from 'fs';
import * as path from 'path';
import { DocumentNotFoundError, ValidationError } from '../errors/index';

export interface MemoVersion {
  major: number;
  minor: number;
  patch: number;
}

export interface DocumentLocation {
  /** Company or deal name as typed by the user. */
  company?: string;
  firm?: string;
  deal?: string;
}

export interface StorageRoots {
  /** Legacy root holding `{Deal}-vX.Y.Z` directories. */
  outputRoot: string;
  /** Firm-scoped root holding `{firm}/deals/{deal}/outputs/`. */
  ioRoot: string;
}

export interface VersionDirectory {
  version: MemoVersion;
  dir: string;
}

const VERSION_RE = /^v?(\d+)\.(\d+)\.(\d+)$/;

export function parseVersion(text: string): MemoVersion {
  const match = VERSION_RE.exec(text.trim());
  if (!match) {
    throw new ValidationError(`Invalid version '${text}' (expected vX.Y.Z)`);
  }
  return { major: Number(match[1]), minor: Number(match[2]), patch: Number(match[3]) };
}

export function formatVersion(v: MemoVersion): string {
  return `v${v.major}.${v.minor}.${v.patch}`;
}

export function compareVersions(a: MemoVersion, b: MemoVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}

/** Keeps letters, digits, spaces, '-' and '_', then turns spaces into hyphens. */
export function sanitizeName(name: string): string {
  return name
    .replace(/[^\p{L}\p{N} _-]/gu, '')
    .trim()
    .replace(/ /g, '-');
}

export function dealName(location: DocumentLocation): string {
  const name = location.deal ?? location.company;
  if (!name) {
    throw new ValidationError('A company name or --firm/--deal pair is required');
  }
  return sanitizeName(name);
}

export function outputsDir(location: DocumentLocation, roots: StorageRoots): string {
  if (location.firm) {
    return path.join(roots.ioRoot, location.firm, 'deals', dealName(location), 'outputs');
  }
  return roots.outputRoot;
}

/** Version directories for a deal, oldest first. */
export function listVersionDirs(location: DocumentLocation, roots: StorageRoots): VersionDirectory[] {
  const base = outputsDir(location, roots);
  if (!existsSync(base)) return [];

  const name = dealName(location);
  const prefix = `${name}-`;
  return fg
    .sync(`${fg.escapePath(name)}-v*`, { cwd: base, onlyDirectories: true })
    .flatMap((dirName): VersionDirectory[] => {
      const suffix = dirName.slice(prefix.length);
      if (!VERSION_RE.test(suffix)) return [];
      return [{ version: parseVersion(suffix), dir: path.join(base, dirName) }];
    })
    .sort((a, b) => compareVersions(a.version, b.version));
}

/**
 * Resolves an existing version directory: the requested version, or the
 * latest one when none is given.
 */
export function resolveVersionDir(location: DocumentLocation, roots: StorageRoots, version?: string): string {
  const versions = listVersionDirs(location, roots);
  const base = outputsDir(location, roots);
  const name = dealName(location);

  if (version !== undefined) {
    const wanted = parseVersion(version);
    const found = versions.find((v) => compareVersions(v.version, wanted) === 0);
    if (!found) {
      const dir = path.join(base, `${name}-${formatVersion(wanted)}`);
      throw new DocumentNotFoundError(`No output directory for ${name} ${formatVersion(wanted)}`, [dir]);
    }
    return found.dir;
  }

  const latest = versions[versions.length - 1];
  if (!latest) {
    throw new DocumentNotFoundError(`No output directory found for ${name}`, [path.join(base, `${name}-v*`)]);
  }
  return latest.dir;
}

/** Directory for a new run: the next patch version after the latest, or v0.0.1. */
export function nextVersionDir(location: DocumentLocation, roots: StorageRoots): string {
  const versions = listVersionDirs(location, roots);
  const latest = versions[versions.length - 1]?.version;
  const next: MemoVersion = latest
    ? { major: latest.major, minor: latest.minor, patch: latest.patch + 1 }
    : { major: 0, minor: 0, patch: 1 };
  return path.join(outputsDir(location, roots), `${dealName(location)}-${formatVersion(next)}`);
}
