import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { defaultNarratorConfig, deriveSpeakerProfiles } from '../pipeline/speaker-profiles.js';
import type { SpeakerArtifact, SpeakerConfigInput, Stage, StageContext } from '../pipeline/stages.js';

/**
 * Writes `speakers.json` for the run: the supplied configs, or profiles
 * derived from the polished script. A script with no speaker tags gets the
 * default narrator.
 */
export class SpeakerProfileStage implements Stage<SpeakerConfigInput, SpeakerArtifact> {
  async invoke(input: SpeakerConfigInput, context: StageContext): Promise<SpeakerArtifact> {
    let speakers = input.provided ?? deriveSpeakerProfiles(input.script.text);
    if (speakers.length === 0) {
      context.log.info('No speaker tags detected, using default narrator');
      speakers = [defaultNarratorConfig()];
    }

    await mkdir(context.run_dir, { recursive: true });
    const file = path.join(context.run_dir, 'speakers.json');
    await writeFile(file, JSON.stringify(speakers, null, 2), 'utf8');
    return { path: file, speakers };
  }
}
