export const OUTPUT_FORMATS = ['mp3', 'wav', 'aac'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Caller-supplied parameters for one export. Never persisted and never mutated
 * by the pipeline; gains are linear multipliers, loudness values are LUFS/dB.
 */
export interface MixConfiguration {
  /** Music bed gain as a fraction of full scale (it sits under speech) */
  backgroundGain: number;
  /** Gain applied to every effect on the effect bus */
  effectGain: number;
  /** Integrated loudness target for speech and for the final mix */
  targetLufs: number;
  /** True peak ceiling used by loudnorm */
  truePeakDb: number;
  /** Silence inserted between consecutive speech segments */
  segmentPaddingSec: number;
  outputFormat: OutputFormat;
  musicFadeInSec: number;
  /** Fade-out length; the fade ends exactly where speech ends */
  musicFadeOutSec: number;
  /** Attenuation applied to the summed busses before the limiter */
  headroomDb: number;
}

export const DEFAULT_MIX_CONFIGURATION: Readonly<MixConfiguration> = Object.freeze({
  backgroundGain: 0.15,
  effectGain: 0.3,
  targetLufs: -18,
  truePeakDb: -2,
  segmentPaddingSec: 0,
  outputFormat: 'mp3',
  musicFadeInSec: 2,
  musicFadeOutSec: 3,
  headroomDb: 3,
});

/** Merge per-call overrides onto defaults, ignoring keys explicitly set to undefined. */
export function resolveMixConfiguration(
  overrides: Partial<MixConfiguration> = {},
  defaults: Readonly<MixConfiguration> = DEFAULT_MIX_CONFIGURATION
): MixConfiguration {
  return {
    backgroundGain: overrides.backgroundGain ?? defaults.backgroundGain,
    effectGain: overrides.effectGain ?? defaults.effectGain,
    targetLufs: overrides.targetLufs ?? defaults.targetLufs,
    truePeakDb: overrides.truePeakDb ?? defaults.truePeakDb,
    segmentPaddingSec: overrides.segmentPaddingSec ?? defaults.segmentPaddingSec,
    outputFormat: overrides.outputFormat ?? defaults.outputFormat,
    musicFadeInSec: overrides.musicFadeInSec ?? defaults.musicFadeInSec,
    musicFadeOutSec: overrides.musicFadeOutSec ?? defaults.musicFadeOutSec,
    headroomDb: overrides.headroomDb ?? defaults.headroomDb,
  };
}

export interface AudioProbe {
  durationSec: number;
  sampleRate?: number;
  channels?: number;
  codec?: string;
}

export interface RenderInput {
  filePath: string;
  /** Options placed before this input, e.g. ['-stream_loop', '-1'] */
  inputOptions?: string[];
}

export interface RenderGraphOptions {
  inputs: RenderInput[];
  filterComplex: string;
  /** Label of the graph output to map, without brackets */
  outputLabel: string;
  outputPath: string;
  format: OutputFormat;
}

/** The audio operations the timeline builder and mixer need from ffmpeg. */
export interface AudioToolkit {
  probe(filePath: string): Promise<AudioProbe>;
  renderGraph(options: RenderGraphOptions): Promise<string>;
  transcode(inputPath: string, outputPath: string, format: OutputFormat): Promise<string>;
}
