import { logger } from '../../config/logger';
import type { ArtifactStore } from '../../store/artifact-store.interface';
import type { GenerationUnitKind } from '../generation/generation.service';

/**
 * Asynchronous completion of an external generation job. `id` is the segment
 * or effect id, or the text id for a music bed.
 */
export interface ArtifactReadyEvent {
  kind: GenerationUnitKind;
  id: string;
  status: 'succeeded' | 'failed';
  audio?: Buffer;
  error?: string;
}

export type ArtifactReadyOutcome =
  | { applied: true; textId: string }
  | { applied: false; reason: string };

/**
 * Commit the audio carried by a completion event. Speech updates go through
 * putSegmentAudio, which also drops the text's alignment cache.
 */
export async function applyArtifactReady(
  store: ArtifactStore,
  event: ArtifactReadyEvent
): Promise<ArtifactReadyOutcome> {
  if (event.status === 'failed') {
    logger.warn('External generation reported failure', {
      kind: event.kind,
      id: event.id,
      error: event.error,
    });
    return { applied: false, reason: event.error ?? 'generation failed' };
  }
  if (!event.audio || event.audio.length === 0) {
    logger.warn('Completion event carried no audio', { kind: event.kind, id: event.id });
    return { applied: false, reason: 'no audio in event' };
  }

  let textId: string;
  switch (event.kind) {
    case 'speech':
      textId = await store.putSegmentAudio(event.id, event.audio);
      break;
    case 'effect':
      textId = await store.putEffectAudio(event.id, event.audio);
      break;
    case 'music':
      await store.putMusicAudio(event.id, event.audio);
      textId = event.id;
      break;
  }

  logger.info('Artifact committed', { kind: event.kind, id: event.id, textId, bytes: event.audio.length });
  return { applied: true, textId };
}
