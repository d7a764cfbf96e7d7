/**
 * Latest analysis result handed from the audio pipeline to the light loop.
 * Energies are normalized and smoothed into [0,1]. `beat` marks a pulse in
 * this analysis frame; `beatCount` counts every pulse since the analyzer
 * started so a slower reader can still see pulses it sampled past.
 */
export type AudioSnapshot = {
  readonly low: number;
  readonly mid: number;
  readonly high: number;
  readonly overall: number;
  readonly beat: boolean;
  readonly beatCount: number;
  /** Milliseconds on the producer's clock; 0 for the initial silence value. */
  readonly timestamp: number;
};

export const SILENCE_SNAPSHOT: AudioSnapshot = Object.freeze({
  low: 0,
  mid: 0,
  high: 0,
  overall: 0,
  beat: false,
  beatCount: 0,
  timestamp: 0,
});

export const createSilenceSnapshot = (timestamp: number, beatCount = 0): AudioSnapshot =>
  Object.freeze({ ...SILENCE_SNAPSHOT, timestamp, beatCount });

export const isSilent = (snapshot: AudioSnapshot): boolean =>
  snapshot.low === 0 &&
  snapshot.mid === 0 &&
  snapshot.high === 0 &&
  snapshot.overall === 0 &&
  !snapshot.beat;

export const freezeSnapshot = (snapshot: AudioSnapshot): AudioSnapshot =>
  Object.isFrozen(snapshot) ? snapshot : Object.freeze({ ...snapshot });
