// ===========================================================================
// Generation Providers
//
// External generative services seen as black boxes returning audio bytes.
// Every call takes an AbortSignal so an export can be cancelled mid-flight.
// ===========================================================================

import type { VoiceHandle } from '../../types/production.types';

export interface SpeechProvider {
  generateSpeech(text: string, voice: VoiceHandle, signal?: AbortSignal): Promise<Buffer>;
}

export interface MusicProvider {
  generateMusic(prompt: string, durationSec: number, signal?: AbortSignal): Promise<Buffer>;
}

export interface EffectAudioProvider {
  generateEffectAudio(prompt: string, durationSec: number, signal?: AbortSignal): Promise<Buffer>;
}

export interface GenerationProviders {
  speech: SpeechProvider;
  music: MusicProvider;
  effects: EffectAudioProvider;
}
