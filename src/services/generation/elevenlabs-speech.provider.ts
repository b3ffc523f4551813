import axios from 'axios';
import { logger } from '../../config/logger';
import type { VoiceHandle } from '../../types/production.types';
import type { SpeechProvider } from './providers.interface';
import { ElevenLabsOptions, toElevenLabsError } from './elevenlabs-http';

export interface ElevenLabsSpeechOptions extends ElevenLabsOptions {
  modelId: string;
  outputFormat?: string;
}

const DEFAULT_VOICE_SETTINGS = {
  stability: 0.5,
  similarity_boost: 0.75,
  style: 0.0,
  use_speaker_boost: true,
};

export class ElevenLabsSpeechProvider implements SpeechProvider {
  constructor(private readonly options: ElevenLabsSpeechOptions) {}

  async generateSpeech(text: string, voice: VoiceHandle, signal?: AbortSignal): Promise<Buffer> {
    if (!this.options.apiKey) {
      throw new Error('ElevenLabs API key not configured');
    }

    logger.info('Generating speech with ElevenLabs', {
      voiceId: voice.voiceId,
      textLength: text.length,
      modelId: this.options.modelId,
    });

    try {
      const response = await axios.post<ArrayBuffer>(
        `${this.options.apiUrl}/text-to-speech/${encodeURIComponent(voice.voiceId)}`,
        {
          text,
          model_id: this.options.modelId,
          voice_settings: DEFAULT_VOICE_SETTINGS,
        },
        {
          headers: {
            'xi-api-key': this.options.apiKey,
            'Content-Type': 'application/json',
            Accept: 'audio/mpeg',
          },
          params: {
            output_format: this.options.outputFormat ?? 'mp3_44100_128',
          },
          responseType: 'arraybuffer',
          signal,
        }
      );

      const audioBuffer = Buffer.from(response.data);
      logger.info('Speech generated successfully', {
        audioSize: audioBuffer.length,
        characters: text.length,
      });
      return audioBuffer;
    } catch (error: unknown) {
      throw toElevenLabsError(error, 'generate speech');
    }
  }
}
