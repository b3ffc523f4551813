import { logger } from '../../config/logger';
import type { WordTimestamp } from '../../types/alignment.types';
import type { EffectPlacement, SoundEffectRecord } from '../../types/sfx.types';

type PlacementInput = Pick<SoundEffectRecord, 'id' | 'startWordPosition' | 'endWordPosition'>;

const clampPosition = (position: number, count: number): number =>
  Math.min(Math.max(Math.round(position), 1), count);

/**
 * Resolve one effect's 1-based word range to absolute seconds. Pure apart
 * from the warning logged when a position had to be clamped.
 */
export function resolveEffectPlacement(cache: WordTimestamp[], effect: PlacementInput): EffectPlacement {
  const count = cache.length;
  if (count === 0) {
    return { status: 'unresolvable', effectId: effect.id, reason: 'alignment cache is empty' };
  }
  if (!Number.isFinite(effect.startWordPosition) || !Number.isFinite(effect.endWordPosition)) {
    return { status: 'unresolvable', effectId: effect.id, reason: 'word positions are not numbers' };
  }

  const startPos = clampPosition(effect.startWordPosition, count);
  const endPos = clampPosition(effect.endWordPosition, count);
  const clamped = startPos !== effect.startWordPosition || endPos !== effect.endWordPosition;
  if (clamped) {
    logger.warn('Effect word position out of range, clamped', {
      effectId: effect.id,
      startWordPosition: effect.startWordPosition,
      endWordPosition: effect.endWordPosition,
      wordCount: count,
      clampedStart: startPos,
      clampedEnd: endPos,
    });
  }

  const startTime = cache[startPos - 1].start;
  if (startPos > endPos) {
    return {
      status: 'zero-duration',
      effectId: effect.id,
      startTime,
      endTime: startTime,
      reason: `start position ${startPos} is after end position ${endPos}`,
    };
  }

  return {
    status: 'placed',
    effectId: effect.id,
    startTime,
    endTime: Math.max(startTime, cache[endPos - 1].end),
    startWordPosition: startPos,
    endWordPosition: endPos,
    clamped,
  };
}

/** Resolve every effect independently; results keep the input order. */
export function resolveAll(cache: WordTimestamp[], effects: PlacementInput[]): EffectPlacement[] {
  return effects.map((effect) => resolveEffectPlacement(cache, effect));
}
