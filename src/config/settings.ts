import path from 'path';
import { z } from 'zod';
import { OUTPUT_FORMATS, MixConfiguration } from '../types/audio.types';

const numberFromEnv = (fallback: number) =>
  z.coerce.number().finite().default(fallback);

const settingsSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  CORS_ORIGIN: z.string().default('*'),
  DATABASE_URL: z.string().min(1).default('mongodb://localhost:27017/scenecast_db'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  UPLOAD_DIR: z.string().min(1).default('./uploads'),

  ELEVENLABS_API_KEY: z.string().default(''),
  ELEVENLABS_API_URL: z.string().url().default('https://api.elevenlabs.io/v1'),
  ELEVENLABS_TTS_MODEL: z.string().default('eleven_multilingual_v2'),
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_API_URL: z.string().url().default('https://api.openai.com/v1'),
  TRANSCRIPTION_MODEL: z.string().default('whisper-1'),

  ALIGNMENT_ENGINE: z.enum(['whisper', 'estimate']).default('whisper'),
  GENERATION_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(3),
  EXPORT_WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  SPEECH_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  MUSIC_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  EFFECT_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ALIGNMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  DEFAULT_EFFECT_DURATION_SEC: z.coerce.number().positive().default(3),

  MIX_BACKGROUND_GAIN: numberFromEnv(0.15),
  MIX_EFFECT_GAIN: numberFromEnv(0.3),
  MIX_TARGET_LUFS: numberFromEnv(-18),
  MIX_TRUE_PEAK_DB: numberFromEnv(-2),
  MIX_SEGMENT_PADDING_SEC: z.coerce.number().min(0).default(0),
  MIX_OUTPUT_FORMAT: z.enum(OUTPUT_FORMATS).default('mp3'),
  MIX_MUSIC_FADE_IN_SEC: z.coerce.number().min(0).default(2),
  MIX_MUSIC_FADE_OUT_SEC: z.coerce.number().min(0).default(3),
  MIX_HEADROOM_DB: z.coerce.number().min(0).default(3),
});

export type RawSettings = z.infer<typeof settingsSchema>;

export interface Settings {
  nodeEnv: RawSettings['NODE_ENV'];
  port: number;
  corsOrigin: string;
  databaseUrl: string;
  redisUrl: string;
  uploadDir: string;
  exportsDir: string;
  elevenLabs: { apiKey: string; apiUrl: string; ttsModel: string };
  transcription: { apiKey: string; apiUrl: string; model: string };
  alignmentEngine: RawSettings['ALIGNMENT_ENGINE'];
  generationConcurrency: number;
  exportWorkerConcurrency: number;
  timeouts: { speechMs: number; musicMs: number; effectMs: number; alignmentMs: number };
  retry: { attempts: number; baseDelayMs: number };
  defaultEffectDurationSec: number;
  mixDefaults: MixConfiguration;
}

export class SettingsError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'SettingsError';
  }
}

/**
 * Parse and validate settings from an env map. Throws SettingsError naming
 * every offending key.
 */
export function parseSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(env);
  if (!parsed.success) {
    throw new SettingsError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const s = parsed.data;
  const uploadDir = path.resolve(s.UPLOAD_DIR);

  return {
    nodeEnv: s.NODE_ENV,
    port: s.PORT,
    corsOrigin: s.CORS_ORIGIN,
    databaseUrl: s.DATABASE_URL,
    redisUrl: s.REDIS_URL,
    uploadDir,
    exportsDir: path.join(uploadDir, 'exports'),
    elevenLabs: {
      apiKey: s.ELEVENLABS_API_KEY,
      apiUrl: s.ELEVENLABS_API_URL,
      ttsModel: s.ELEVENLABS_TTS_MODEL,
    },
    transcription: {
      apiKey: s.OPENAI_API_KEY,
      apiUrl: s.OPENAI_API_URL,
      model: s.TRANSCRIPTION_MODEL,
    },
    alignmentEngine: s.ALIGNMENT_ENGINE,
    generationConcurrency: s.GENERATION_CONCURRENCY,
    exportWorkerConcurrency: s.EXPORT_WORKER_CONCURRENCY,
    timeouts: {
      speechMs: s.SPEECH_TIMEOUT_MS,
      musicMs: s.MUSIC_TIMEOUT_MS,
      effectMs: s.EFFECT_TIMEOUT_MS,
      alignmentMs: s.ALIGNMENT_TIMEOUT_MS,
    },
    retry: { attempts: s.RETRY_ATTEMPTS, baseDelayMs: s.RETRY_BASE_DELAY_MS },
    defaultEffectDurationSec: s.DEFAULT_EFFECT_DURATION_SEC,
    mixDefaults: {
      backgroundGain: s.MIX_BACKGROUND_GAIN,
      effectGain: s.MIX_EFFECT_GAIN,
      targetLufs: s.MIX_TARGET_LUFS,
      truePeakDb: s.MIX_TRUE_PEAK_DB,
      segmentPaddingSec: s.MIX_SEGMENT_PADDING_SEC,
      outputFormat: s.MIX_OUTPUT_FORMAT,
      musicFadeInSec: s.MIX_MUSIC_FADE_IN_SEC,
      musicFadeOutSec: s.MIX_MUSIC_FADE_OUT_SEC,
      headroomDb: s.MIX_HEADROOM_DB,
    },
  };
}

let cached: Settings | null = null;

/** Settings for this process, parsed on first use. */
export function getSettings(): Settings {
  if (!cached) {
    cached = parseSettings();
  }
  return cached;
}
