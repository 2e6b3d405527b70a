import fg from 'fast-glob';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import * as path from 'path';
import { BaseDocumentRepository } from './base-repository';

/**
 * Document repository over a version directory on disk, e.g.
 * `output/Acme-v0.0.3/`. Every write lands on disk before returning, so a
 * completed stage's artifacts survive a crash in the next one.
 */
export class FsDocumentRepository extends BaseDocumentRepository {
  readonly dir: string;

  constructor(dir: string) {
    super(path.basename(path.resolve(dir)));
    this.dir = path.resolve(dir);
  }

  protected readRaw(relativePath: string): string | undefined {
    const file = path.join(this.dir, relativePath);
    if (!existsSync(file)) return undefined;
    return readFileSync(file, 'utf-8');
  }

  protected writeRaw(relativePath: string, content: string): void {
    const file = path.join(this.dir, relativePath);
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, content, 'utf-8');
  }

  protected listRaw(relativeDir: string): string[] {
    const cwd = path.join(this.dir, relativeDir);
    if (!existsSync(cwd)) return [];
    return fg.sync('*', { cwd, onlyFiles: true, dot: false });
  }
}
