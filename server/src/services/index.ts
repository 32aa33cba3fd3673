import type { AppConfig } from '../lib/config.js';
import type { PipelineStages } from '../pipeline/stages.js';
import { AcquisitionStage } from './acquisition.js';
import { TextRewriteStage, TranscriptionStage } from './language.js';
import { SpeakerProfileStage } from './speaker-config.js';
import { MergeStage, NarrationStage, SynthesisStage } from './speech.js';
import { ToolServiceClient } from './tool-client.js';

export function createPipelineStages(services: AppConfig['services']): PipelineStages {
  const extractor = new ToolServiceClient('Audio extraction', services.acquisition);
  const asr = new ToolServiceClient('Transcription', services.asr);
  const translator = new ToolServiceClient('Translation', services.translate);
  const tts = new ToolServiceClient('Speech', services.tts);

  return {
    acquisition: new AcquisitionStage(extractor),
    transcription: new TranscriptionStage(asr),
    translation: new TextRewriteStage(translator, 'translate', 'translated.txt'),
    polish: new TextRewriteStage(translator, 'polish', 'polished.txt'),
    summary: new TextRewriteStage(translator, 'summary', 'summary.txt'),
    speakerConfig: new SpeakerProfileStage(),
    synthesis: new SynthesisStage(tts),
    narration: new NarrationStage(tts),
    merge: new MergeStage(tts),
  };
}
