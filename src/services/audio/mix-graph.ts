// ============================================================================
// Mix Graph
//
// Pure construction of the ffmpeg filter graph for the final mix:
//
//   speech  ─ loudnorm(target) ─────────────────────────────┐
//   music   ─ loop ─ trim(D) ─ fade in/out ─ volume(bg) ────┤ amix(normalize=0)
//   fx 1..n ─ volume(fx) ─ adelay(start) ─ amix ─ [fxbus] ──┘      │
//                                   headroom ─ alimiter ─ loudnorm ─ 48k
//
// Nothing here depends on wall-clock time or iteration order of a hash map, so
// the same input always yields the same graph string.
// ============================================================================

import type { MixConfiguration, RenderInput } from '../../types/audio.types';
import { SAMPLE_RATE } from './ffmpeg.service';

// ----------------------------------------------------------------------------
// Types
// ----------------------------------------------------------------------------

export interface MixGraphEffect {
  effectId: string;
  filePath: string;
  startTime: number;
}

export interface MixGraphInput {
  speech: { filePath: string; durationSec: number };
  music?: { filePath: string } | null;
  effects: MixGraphEffect[];
  config: MixConfiguration;
}

export interface MixGraph {
  inputs: RenderInput[];
  filterComplex: string;
  outputLabel: string;
  /** Effect ids in the order they were placed on the bus */
  effectOrder: string[];
}

// ----------------------------------------------------------------------------
// Constants
// ----------------------------------------------------------------------------

const LOUDNESS_RANGE = 11;
const OUTPUT_LABEL = 'out';
const FORMAT_SYNC = `aformat=channel_layouts=stereo,aresample=${SAMPLE_RATE}`;

// ----------------------------------------------------------------------------
// Helpers
// ----------------------------------------------------------------------------

/** Render a number for a filter argument without float noise (0.1 + 0.2 → "0.3"). */
export function formatNumber(value: number): string {
  const rounded = Number(value.toFixed(6));
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

export const loudnormFilter = (config: MixConfiguration): string =>
  `loudnorm=I=${formatNumber(config.targetLufs)}:TP=${formatNumber(config.truePeakDb)}:LRA=${LOUDNESS_RANGE}`;

/** alimiter takes a linear ceiling in 0.0625..1 */
export function limiterCeiling(truePeakDb: number): number {
  const linear = Math.pow(10, truePeakDb / 20);
  return Number(Math.min(1, Math.max(0.0625, linear)).toFixed(4));
}

/** Effects in bus order: start time ascending, then id ascending. */
export function orderEffects<T extends { effectId: string; startTime: number }>(effects: T[]): T[] {
  return [...effects].sort(
    (a, b) =>
      a.startTime - b.startTime || (a.effectId < b.effectId ? -1 : a.effectId > b.effectId ? 1 : 0)
  );
}

// ----------------------------------------------------------------------------
// Graph
// ----------------------------------------------------------------------------

export function buildMixGraph(input: MixGraphInput): MixGraph {
  const { speech, music, config } = input;
  const duration = speech.durationSec;
  const inputs: RenderInput[] = [{ filePath: speech.filePath }];
  const filters: string[] = [];
  const busLabels: string[] = ['[speech]'];

  // 1. Speech is the reference level
  filters.push(`[0:a]${FORMAT_SYNC},${loudnormFilter(config)},aresample=${SAMPLE_RATE}[speech]`);

  // 2. Music bed, looped then cut to the speech length
  if (music) {
    const index = inputs.length;
    inputs.push({ filePath: music.filePath, inputOptions: ['-stream_loop', '-1'] });

    const fadeIn = Math.min(config.musicFadeInSec, duration / 2);
    const fadeOut = Math.min(config.musicFadeOutSec, duration / 2);
    const chain = [
      FORMAT_SYNC,
      `atrim=0:${formatNumber(duration)}`,
      'asetpts=PTS-STARTPTS',
    ];
    if (fadeIn > 0) chain.push(`afade=t=in:st=0:d=${formatNumber(fadeIn)}`);
    if (fadeOut > 0) {
      chain.push(`afade=t=out:st=${formatNumber(duration - fadeOut)}:d=${formatNumber(fadeOut)}`);
    }
    chain.push(`volume=${formatNumber(config.backgroundGain)}`);
    filters.push(`[${index}:a]${chain.join(',')}[music]`);
    busLabels.push('[music]');
  }

  // 3. Effects on their own bus, summed linearly
  const ordered = orderEffects(input.effects);
  const fxLabels: string[] = [];
  ordered.forEach((effect, i) => {
    const index = inputs.length;
    inputs.push({ filePath: effect.filePath });
    const delayMs = Math.max(0, Math.round(effect.startTime * 1000));
    const label = `[fx${i}]`;
    filters.push(
      `[${index}:a]${FORMAT_SYNC},volume=${formatNumber(config.effectGain)},adelay=${delayMs}|${delayMs}${label}`
    );
    fxLabels.push(label);
  });

  if (fxLabels.length > 1) {
    filters.push(`${fxLabels.join('')}amix=inputs=${fxLabels.length}:duration=longest:normalize=0[fxbus]`);
    busLabels.push('[fxbus]');
  } else if (fxLabels.length === 1) {
    busLabels.push(fxLabels[0]);
  }

  // 4-5. Sum, reserve headroom, limit, normalize, resample
  const master: string[] = [];
  if (config.headroomDb > 0) master.push(`volume=-${formatNumber(config.headroomDb)}dB`);
  master.push(`alimiter=limit=${limiterCeiling(config.truePeakDb)}:level=disabled`);
  master.push(loudnormFilter(config));
  master.push(`aresample=${SAMPLE_RATE}`);

  const sum =
    busLabels.length > 1
      ? `${busLabels.join('')}amix=inputs=${busLabels.length}:duration=first:normalize=0,`
      : `${busLabels[0]}`;
  filters.push(`${sum}${master.join(',')}[${OUTPUT_LABEL}]`);

  return {
    inputs,
    filterComplex: filters.join(';'),
    outputLabel: OUTPUT_LABEL,
    effectOrder: ordered.map((e) => e.effectId),
  };
}
