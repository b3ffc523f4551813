import type { Settings } from '../../config/settings';
import type { AudioToolkit } from '../../types/audio.types';
import { FFmpegService } from '../audio/ffmpeg.service';
import type { AlignmentEngine } from '../alignment/alignment-engine.interface';
import { EstimatedAlignmentEngine } from '../alignment/estimated-alignment.engine';
import { WhisperAlignmentEngine } from '../alignment/whisper-alignment.engine';
import { ElevenLabsSoundProvider } from './elevenlabs-sound.provider';
import { ElevenLabsSpeechProvider } from './elevenlabs-speech.provider';
import type { GenerationProviders } from './providers.interface';

export interface ExternalClients {
  providers: GenerationProviders;
  alignmentEngine: AlignmentEngine;
  toolkit: AudioToolkit;
}

/**
 * Builds every external client from settings. Callers pass the result down
 * explicitly; tests build their own fakes instead.
 */
export function createExternalClients(settings: Settings): ExternalClients {
  const sound = new ElevenLabsSoundProvider({
    apiKey: settings.elevenLabs.apiKey,
    apiUrl: settings.elevenLabs.apiUrl,
  });

  return {
    providers: {
      speech: new ElevenLabsSpeechProvider({
        apiKey: settings.elevenLabs.apiKey,
        apiUrl: settings.elevenLabs.apiUrl,
        modelId: settings.elevenLabs.ttsModel,
      }),
      music: sound,
      effects: sound,
    },
    alignmentEngine:
      settings.alignmentEngine === 'whisper'
        ? new WhisperAlignmentEngine({
            apiKey: settings.transcription.apiKey,
            apiUrl: settings.transcription.apiUrl,
            model: settings.transcription.model,
          })
        : new EstimatedAlignmentEngine(),
    toolkit: new FFmpegService(),
  };
}
