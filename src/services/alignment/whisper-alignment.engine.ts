import fs from 'fs/promises';
import path from 'path';
import axios, { AxiosError } from 'axios';
import { z } from 'zod';
import { logger } from '../../config/logger';
import type { RecognizedWord } from '../../types/alignment.types';
import type { AlignmentEngine, AlignmentRequest } from './alignment-engine.interface';

export interface WhisperEngineOptions {
  apiKey: string;
  apiUrl: string;
  model: string;
}

const transcriptionSchema = z.object({
  text: z.string().optional(),
  duration: z.number().optional(),
  words: z
    .array(
      z.object({
        word: z.string(),
        start: z.number(),
        end: z.number(),
      })
    )
    .default([]),
});

// The transcription API only reads the tail of long prompts
const MAX_PROMPT_CHARS = 900;

/**
 * Word timestamps from an OpenAI-compatible `/audio/transcriptions` endpoint.
 * The known transcript is passed as the prompt to bias recognition toward it.
 */
export class WhisperAlignmentEngine implements AlignmentEngine {
  readonly name = 'whisper';
  readonly inputFormat = 'mp3' as const;

  constructor(private readonly options: WhisperEngineOptions) {}

  isConfigured(): boolean {
    return this.options.apiKey.length > 0;
  }

  async recognize(request: AlignmentRequest): Promise<RecognizedWord[]> {
    if (!this.isConfigured()) {
      throw new Error('Transcription API key not configured');
    }

    const audio = await fs.readFile(request.audioPath);
    const form = new FormData();
    form.append('file', new Blob([audio], { type: 'audio/mpeg' }), path.basename(request.audioPath));
    form.append('model', this.options.model);
    form.append('response_format', 'verbose_json');
    form.append('timestamp_granularities[]', 'word');
    form.append('prompt', request.transcript.slice(0, MAX_PROMPT_CHARS));

    try {
      const response = await axios.post<unknown>(`${this.options.apiUrl}/audio/transcriptions`, form, {
        headers: { Authorization: `Bearer ${this.options.apiKey}` },
        signal: request.signal,
      });

      const parsed = transcriptionSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new Error(`Unexpected transcription response: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
      }

      logger.info('Transcription received', {
        engine: this.name,
        words: parsed.data.words.length,
        durationSec: parsed.data.duration,
      });
      return parsed.data.words.map((w) => ({ word: w.word.trim(), start: w.start, end: w.end }));
    } catch (error: unknown) {
      if (error instanceof AxiosError) {
        const status = error.response?.status;
        logger.error('Transcription request failed', { status, message: error.message });
        if (status === 401) throw new Error('Invalid transcription API key');
        if (status === 429) throw new Error('Transcription rate limit exceeded');
        throw new Error(`Transcription failed: ${error.message}`);
      }
      throw error;
    }
  }
}
