import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { NotFoundError, ValidationError } from '../lib/errors.js';

const CONTENT_TYPES: Record<string, string> = {
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
  '.txt': 'text/plain; charset=utf-8',
  '.json': 'application/json',
};

export const AUDIO_ARTIFACT_EXTENSIONS = ['.wav', '.mp3'];

export interface ArtifactRef {
  job_id: string;
  name: string;
  extension: string;
  content_type: string;
  full_path: string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Read access to files under the runs directory. Paths are relative to it
 * and always start with the owning job's id: `<job id>/summary.txt`.
 */
export class ArtifactStore {
  private readonly root: string;

  constructor(runsDir: string) {
    this.root = path.resolve(runsDir);
  }

  resolve(relativePath: string): ArtifactRef {
    if (!relativePath || relativePath.startsWith('/') || relativePath.split(/[\\/]/).includes('..')) {
      throw new ValidationError('Invalid path');
    }
    const segments = relativePath.split('/').filter(Boolean);
    if (segments.length < 2) {
      throw new ValidationError('Invalid path');
    }

    const fullPath = path.resolve(this.root, ...segments);
    const inside = path.relative(this.root, fullPath);
    if (!inside || inside.startsWith('..') || path.isAbsolute(inside)) {
      throw new ValidationError('Invalid path');
    }

    const name = segments[segments.length - 1];
    const extension = path.extname(name).toLowerCase();
    return {
      job_id: segments[0],
      name,
      extension,
      content_type: CONTENT_TYPES[extension] ?? 'application/octet-stream',
      full_path: fullPath,
    };
  }

  async read(ref: ArtifactRef) {
    await this.ensureFile(ref);
    return new Uint8Array(await readFile(ref.full_path));
  }

  async readText(ref: ArtifactRef): Promise<string> {
    await this.ensureFile(ref);
    return readFile(ref.full_path, 'utf8');
  }

  private async ensureFile(ref: ArtifactRef): Promise<void> {
    try {
      const info = await stat(ref.full_path);
      if (info.isFile()) return;
    } catch (err) {
      if (!isMissingFile(err)) throw err;
    }
    throw new NotFoundError('File');
  }
}
