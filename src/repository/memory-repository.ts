import { BaseDocumentRepository } from './base-repository';

/** In-memory repository keyed by relative path. */
export class MemoryDocumentRepository extends BaseDocumentRepository {
  readonly files = new Map<string, string>();

  constructor(name: string = 'Memo-v0.0.1', files: Record<string, string> = {}) {
    super(name);
    for (const [file, content] of Object.entries(files)) {
      this.files.set(file, content);
    }
  }

  protected readRaw(relativePath: string): string | undefined {
    return this.files.get(relativePath);
  }

  protected writeRaw(relativePath: string, content: string): void {
    this.files.set(relativePath, content);
  }

  protected listRaw(relativeDir: string): string[] {
    const prefix = relativeDir.length > 0 ? `${relativeDir}/` : '';
    return [...this.files.keys()]
      .filter((file) => file.startsWith(prefix) && !file.slice(prefix.length).includes('/'))
      .map((file) => file.slice(prefix.length));
  }
}
