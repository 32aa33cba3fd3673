import { access, copyFile, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { StageError, errorMessage } from '../lib/errors.js';
import type { AudioArtifact, Stage, StageContext } from '../pipeline/stages.js';
import type { AcquisitionOptions, JobSource } from '../pipeline/types.js';
import type { ToolServiceClient } from './tool-client.js';

const extractResultSchema = z.object({
  file_path: z.string().min(1),
});

function inputFileName(source: string): string {
  const ext = path.extname(source).toLowerCase();
  return `input${ext || '.mp3'}`;
}

/**
 * Brings the job's audio into its run directory: YouTube through the
 * extraction service, direct URLs by download, local paths by copy.
 * Cookie, user-agent and proxy options go to the extraction service as given.
 */
export class AcquisitionStage implements Stage<JobSource, AudioArtifact> {
  constructor(private readonly extractor: ToolServiceClient) {}

  async invoke(source: JobSource, context: StageContext): Promise<AudioArtifact> {
    await mkdir(context.run_dir, { recursive: true });
    switch (source.kind) {
      case 'youtube':
        return this.extract(source.value, source.options ?? {}, context);
      case 'audio_url':
        return this.download(source.value, source.options?.user_agent, context);
      case 'audio_path':
        return this.copyLocal(source.value, context);
    }
  }

  private async extract(url: string, options: AcquisitionOptions, context: StageContext): Promise<AudioArtifact> {
    const result = await this.extractor.call(
      'extract_audio_to_file',
      { url, output_dir: context.run_dir, ...options },
      extractResultSchema,
    );
    return { path: result.file_path };
  }

  private async download(url: string, userAgent: string | undefined, context: StageContext): Promise<AudioArtifact> {
    const target = path.join(context.run_dir, inputFileName(new URL(url).pathname));
    let response: Response;
    try {
      response = await fetch(url, userAgent ? { headers: { 'User-Agent': userAgent } } : undefined);
    } catch (err) {
      throw new StageError(`Audio download failed: ${errorMessage(err)}`, { cause: err });
    }
    if (!response.ok) {
      throw new StageError(`Audio download failed (${response.status})`);
    }
    await writeFile(target, Buffer.from(await response.arrayBuffer()));
    context.log.debug({ url, target }, 'Audio downloaded');
    return { path: target };
  }

  private async copyLocal(sourcePath: string, context: StageContext): Promise<AudioArtifact> {
    const resolved = path.resolve(sourcePath);
    try {
      await access(resolved);
    } catch {
      throw new StageError(`Audio file not found: ${sourcePath}`);
    }
    const target = path.join(context.run_dir, inputFileName(resolved));
    await copyFile(resolved, target);
    return { path: target };
  }
}
