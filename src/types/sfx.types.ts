// ===========================================================================
// Sound Effect Types
//
// Effects are analyzed over the whole text and anchored on word positions
// (1-based indexes into the shared tokenization of the transcript). Once the
// alignment cache exists, the placement resolver turns those positions into
// absolute seconds on the speech timeline.
// ===========================================================================

export interface SoundEffectRecord {
  id: string;
  textId: string;
  /** Effects are text-wide; the segment reference is informational */
  segmentId?: string | null;
  /** Human-readable name, e.g. "distant-thunder" */
  name: string;
  /** Display tokens for the anchoring words */
  startWord: string;
  endWord: string;
  /** 1-based word positions; these, not the tokens, drive placement */
  startWordPosition: number;
  endWordPosition: number;
  prompt: string;
  audio?: Buffer | null;
  /** Absolute seconds filled in by placement resolution */
  startTime?: number | null;
  endTime?: number | null;
  /** 1 = most important */
  rank?: number | null;
  createdAt: Date;
}

/** Result of resolving one effect against the word cache. */
export type EffectPlacement =
  | {
      status: 'placed';
      effectId: string;
      startTime: number;
      endTime: number;
      /** Positions actually used after clamping to 1..N */
      startWordPosition: number;
      endWordPosition: number;
      clamped: boolean;
    }
  | {
      status: 'zero-duration';
      effectId: string;
      /** Anchored at the start word; startTime === endTime */
      startTime: number;
      endTime: number;
      reason: string;
    }
  | {
      status: 'unresolvable';
      effectId: string;
      reason: string;
    };

/** An effect ready for the effect bus: resolved offset plus audio. */
export interface PositionedEffect {
  effectId: string;
  name: string;
  startTime: number;
  endTime: number;
  audio: Buffer;
}
