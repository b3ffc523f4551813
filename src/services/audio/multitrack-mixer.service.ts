import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../config/logger';
import { MixingError } from '../../errors/pipeline.errors';
import type { AudioToolkit, MixConfiguration } from '../../types/audio.types';
import type { PositionedEffect } from '../../types/sfx.types';
import { buildMixGraph, MixGraphEffect, orderEffects } from './mix-graph';

export interface MixRequest {
  textId: string;
  speech: { filePath: string };
  music?: Buffer | null;
  effects: PositionedEffect[];
  config: MixConfiguration;
  workDir: string;
}

export interface MixResult {
  filePath: string;
  durationSec: number;
  includedEffectIds: string[];
  /** Human-readable reasons for every track left out of the mix */
  omissions: string[];
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export const MUSIC_UNAVAILABLE = 'background music unavailable';

/**
 * Layers speech, the music bed and positioned effects into one file. Optional
 * tracks that are missing or unreadable are dropped and reported; only
 * unreadable speech fails the mix.
 */
export class MultiTrackMixer {
  constructor(private readonly toolkit: AudioToolkit) {}

  async mix(request: MixRequest): Promise<MixResult> {
    const { textId, config, workDir } = request;
    const log = logger.child({ stage: 'mixing', textId });
    const omissions: string[] = [];

    let speechDuration: number;
    try {
      speechDuration = (await this.toolkit.probe(request.speech.filePath)).durationSec;
    } catch (error) {
      throw new MixingError(`Speech timeline unreadable: ${errorMessage(error)}`, { cause: error });
    }
    if (!(speechDuration > 0)) {
      throw new MixingError('Speech timeline is empty');
    }

    await fs.mkdir(workDir, { recursive: true });

    // Music bed
    let music: { filePath: string } | null = null;
    if (!request.music || request.music.length === 0) {
      omissions.push(MUSIC_UNAVAILABLE);
    } else {
      const filePath = path.join(workDir, 'music.audio');
      const problem = await this.writeAndProbe(filePath, request.music);
      if (problem) {
        omissions.push(`${MUSIC_UNAVAILABLE}: ${problem}`);
      } else {
        music = { filePath };
      }
    }
    if (!music) log.warn('Mixing without music bed', { reason: omissions[omissions.length - 1] });

    // Effects, written in bus order so file names are stable too
    const effects: MixGraphEffect[] = [];
    const candidates = orderEffects(request.effects);
    for (const [i, effect] of candidates.entries()) {
      if (!Number.isFinite(effect.startTime) || effect.startTime < 0 || effect.startTime >= speechDuration) {
        omissions.push(`effect ${effect.effectId} skipped: start ${effect.startTime}s outside speech`);
        log.warn('Effect outside speech timeline', { effectId: effect.effectId, startTime: effect.startTime });
        continue;
      }
      if (effect.audio.length === 0) {
        omissions.push(`effect ${effect.effectId} skipped: no audio`);
        log.warn('Effect has no audio', { effectId: effect.effectId });
        continue;
      }
      const filePath = path.join(workDir, `effect-${i}.audio`);
      const problem = await this.writeAndProbe(filePath, effect.audio);
      if (problem) {
        omissions.push(`effect ${effect.effectId} skipped: ${problem}`);
        log.warn('Effect audio unreadable', { effectId: effect.effectId, problem });
        continue;
      }
      effects.push({ effectId: effect.effectId, filePath, startTime: effect.startTime });
    }

    const graph = buildMixGraph({
      speech: { filePath: request.speech.filePath, durationSec: speechDuration },
      music,
      effects,
      config,
    });

    const outputPath = path.join(workDir, `mix.${config.outputFormat}`);
    try {
      await this.toolkit.renderGraph({
        inputs: graph.inputs,
        filterComplex: graph.filterComplex,
        outputLabel: graph.outputLabel,
        outputPath,
        format: config.outputFormat,
      });
    } catch (error) {
      throw new MixingError(`Mix render failed: ${errorMessage(error)}`, { cause: error });
    }

    log.info('Mix rendered', {
      durationSec: speechDuration,
      music: !!music,
      effects: graph.effectOrder.length,
      omissions: omissions.length,
    });

    return {
      filePath: outputPath,
      durationSec: speechDuration,
      includedEffectIds: graph.effectOrder,
      omissions,
    };
  }

  /** Returns a problem description, or null when the file probes as audio with a duration. */
  private async writeAndProbe(filePath: string, data: Buffer): Promise<string | null> {
    await fs.writeFile(filePath, data);
    try {
      const probe = await this.toolkit.probe(filePath);
      return probe.durationSec > 0 ? null : 'zero-length audio';
    } catch (error) {
      return `unreadable (${errorMessage(error)})`;
    }
  }
}
