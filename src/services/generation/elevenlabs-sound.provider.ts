import axios from 'axios';
import { logger } from '../../config/logger';
import type { EffectAudioProvider, MusicProvider } from './providers.interface';
import { ElevenLabsOptions, toElevenLabsError } from './elevenlabs-http';

/** Limits of the sound-generation endpoint. */
export const MIN_SOUND_DURATION = 0.5;
export const MAX_SOUND_DURATION = 22;

export const clampSoundDuration = (durationSec: number): number =>
  Math.min(MAX_SOUND_DURATION, Math.max(MIN_SOUND_DURATION, durationSec));

/**
 * ElevenLabs sound generation, used for both effects and the music bed.
 * Beds come back short and are looped by the mixer.
 */
export class ElevenLabsSoundProvider implements MusicProvider, EffectAudioProvider {
  constructor(
    private readonly options: ElevenLabsOptions,
    private readonly promptInfluence = 0.3
  ) {}

  generateMusic(prompt: string, durationSec: number, signal?: AbortSignal): Promise<Buffer> {
    return this.generateSound(prompt, durationSec, signal);
  }

  generateEffectAudio(prompt: string, durationSec: number, signal?: AbortSignal): Promise<Buffer> {
    return this.generateSound(prompt, durationSec, signal);
  }

  private async generateSound(text: string, durationSec: number, signal?: AbortSignal): Promise<Buffer> {
    if (!this.options.apiKey) {
      throw new Error('ElevenLabs API key not configured');
    }
    const duration = clampSoundDuration(durationSec);

    logger.info('Generating sound with ElevenLabs', {
      textLength: text.length,
      duration,
    });

    try {
      const response = await axios.post<ArrayBuffer>(
        `${this.options.apiUrl}/sound-generation`,
        {
          text,
          duration_seconds: duration,
          prompt_influence: this.promptInfluence,
        },
        {
          headers: {
            'xi-api-key': this.options.apiKey,
            'Content-Type': 'application/json',
            Accept: 'audio/mpeg',
          },
          responseType: 'arraybuffer',
          signal,
        }
      );

      const audioBuffer = Buffer.from(response.data);
      logger.info('Sound generated successfully', { audioSize: audioBuffer.length, duration });
      return audioBuffer;
    } catch (error: unknown) {
      throw toElevenLabsError(error, 'generate sound');
    }
  }
}
