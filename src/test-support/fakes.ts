import fs from 'fs/promises';
import type { AlignmentEngine, AlignmentRequest } from '../services/alignment/alignment-engine.interface';
import type { RecognizedWord } from '../types/alignment.types';
import type {
  AudioProbe,
  AudioToolkit,
  OutputFormat,
  RenderGraphOptions,
} from '../types/audio.types';
import { tokenizeWords } from '../utils/word-tokenizer';

/** Audio stand-in whose probed duration is encoded in the bytes. */
export const fakeAudio = (durationSec: number): Buffer => Buffer.from(`dur:${durationSec}`);

export const CORRUPT_AUDIO = Buffer.from('corrupt');

/**
 * In-process AudioToolkit: probes parse `dur:<seconds>`, renders write a
 * description of the graph so outputs can be compared byte for byte.
 */
export class FakeAudioToolkit implements AudioToolkit {
  readonly renders: RenderGraphOptions[] = [];
  readonly transcodes: Array<{ inputPath: string; outputPath: string; format: OutputFormat }> = [];
  /** Duration reported for rendered outputs, keyed by output path */
  private readonly rendered = new Map<string, number>();

  async probe(filePath: string): Promise<AudioProbe> {
    const rendered = this.rendered.get(filePath);
    if (rendered !== undefined) return { durationSec: rendered };

    const content = (await fs.readFile(filePath)).toString('utf8');
    const match = /^dur:(-?[0-9.]+)$/.exec(content);
    if (!match) throw new Error(`Invalid data found when processing input ${filePath}`);
    return { durationSec: Number(match[1]), sampleRate: 48000, channels: 2 };
  }

  async renderGraph(options: RenderGraphOptions): Promise<string> {
    this.renders.push(options);
    await fs.writeFile(options.outputPath, `render:${options.format}:${options.filterComplex}`);
    this.rendered.set(options.outputPath, await this.outputDuration(options));
    return options.outputPath;
  }

  async transcode(inputPath: string, outputPath: string, format: OutputFormat): Promise<string> {
    this.transcodes.push({ inputPath, outputPath, format });
    await fs.copyFile(inputPath, outputPath);
    const duration = this.rendered.get(inputPath);
    if (duration !== undefined) this.rendered.set(outputPath, duration);
    return outputPath;
  }

  /** Speech renders report the summed input durations; mixes the first input's. */
  private async outputDuration(options: RenderGraphOptions): Promise<number> {
    const durations = await Promise.all(options.inputs.map((input) => this.probe(input.filePath)));
    if (options.outputLabel === 'speech') {
      const pad = /apad=pad_dur=([0-9.]+)/.exec(options.filterComplex);
      const padding = pad ? Number(pad[1]) * (durations.length - 1) : 0;
      return durations.reduce((sum, d) => sum + d.durationSec, 0) + padding;
    }
    return durations[0]?.durationSec ?? 0;
  }
}

/**
 * Alignment engine that spreads the transcript evenly over the duration,
 * optionally dropping words, and counts its calls.
 */
export class ScriptedAlignmentEngine implements AlignmentEngine {
  readonly name = 'scripted';
  calls = 0;
  lastRequest: AlignmentRequest | null = null;

  constructor(
    readonly inputFormat: OutputFormat = 'wav',
    private readonly script?: (request: AlignmentRequest) => RecognizedWord[] | Promise<RecognizedWord[]>
  ) {}

  async recognize(request: AlignmentRequest): Promise<RecognizedWord[]> {
    this.calls++;
    this.lastRequest = request;
    if (this.script) return this.script(request);
    const words = tokenizeWords(request.transcript);
    const step = words.length > 0 ? request.durationSec / words.length : 0;
    return words.map((word, i) => ({ word, start: i * step, end: (i + 1) * step }));
  }
}

/** Clock that advances one second per call, starting at `start`. */
export function steppingClock(start = Date.UTC(2024, 0, 1)): () => Date {
  let current = start;
  return () => {
    const value = new Date(current);
    current += 1000;
    return value;
  };
}

/** Retry settings that never wait. */
export const instantRetry = {
  attempts: 3,
  baseDelayMs: 1,
  sleep: async () => undefined,
};
