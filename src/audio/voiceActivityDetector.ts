import { log } from '../log';
import { rmsDb } from './pcm';
import type { SpeechSegment } from './types';

export interface VoiceActivityDetectorOptions {
  sampleRate?: number;
  frameSize?: number;
  hopSize?: number;
  silenceThresholdDb?: number;
  minSpeechDurationMs?: number;
  paddingMs?: number;
}

const MAX_GAP_MS = 100;

/**
 * Energy-based speech detector.
 *
 * Frames of `frameSize` samples are taken every `hopSize` samples; a frame is
 * speech when its RMS energy is above `silenceThresholdDb`. Short bursts are
 * dropped, short gaps between speech are bridged, and each segment is padded
 * on both sides before overlapping segments are merged.
 */
export class VoiceActivityDetector {
  private readonly sampleRate: number;
  private readonly frameSize: number;
  private readonly hopSize: number;
  private readonly silenceThresholdDb: number;
  private readonly minSpeechDurationMs: number;
  private readonly paddingMs: number;

  constructor(options: VoiceActivityDetectorOptions = {}) {
    this.sampleRate = options.sampleRate ?? 44100;
    this.frameSize = options.frameSize ?? 2048;
    this.hopSize = options.hopSize ?? 512;
    this.silenceThresholdDb = options.silenceThresholdDb ?? -40;
    this.minSpeechDurationMs = options.minSpeechDurationMs ?? 100;
    this.paddingMs = options.paddingMs ?? 200;
  }

  public detectSpeechSegments(samples: Float32Array): SpeechSegment[] {
    if (samples.length === 0) return [];

    const frameStarts: number[] = [];
    let speechFrames: boolean[] = [];

    for (let frameStart = 0; frameStart + this.frameSize <= samples.length; frameStart += this.hopSize) {
      frameStarts.push(frameStart);
      speechFrames.push(rmsDb(samples, frameStart, frameStart + this.frameSize) > this.silenceThresholdDb);
    }

    const minFrames = Math.floor(((this.minSpeechDurationMs / 1000) * this.sampleRate) / this.hopSize);
    speechFrames = filterShortSegments(speechFrames, minFrames);

    const maxGapFrames = Math.floor(((MAX_GAP_MS / 1000) * this.sampleRate) / this.hopSize);
    speechFrames = fillSmallGaps(speechFrames, maxGapFrames);

    const paddingSamples = Math.floor((this.paddingMs / 1000) * this.sampleRate);
    const segments: SpeechSegment[] = [];
    let inSpeech = false;
    let segmentStart = 0;

    speechFrames.forEach((isSpeech, index) => {
      const samplePosition = frameStarts[index];
      if (isSpeech && !inSpeech) {
        segmentStart = Math.max(0, samplePosition - paddingSamples);
        inSpeech = true;
      } else if (!isSpeech && inSpeech) {
        segments.push({
          startSample: segmentStart,
          endSample: Math.min(samples.length, samplePosition + paddingSamples),
        });
        inSpeech = false;
      }
    });

    if (inSpeech) {
      segments.push({ startSample: segmentStart, endSample: samples.length });
    }

    const merged = mergeOverlappingSegments(segments);
    log.debug({ event: 'vad_segments', segments: merged.length }, 'vad detected speech segments');
    return merged;
  }

  public containsSpeech(samples: Float32Array): boolean {
    return this.detectSpeechSegments(samples).length > 0;
  }
}

export function filterShortSegments(frames: boolean[], minLength: number): boolean[] {
  const result = [...frames];
  let i = 0;

  while (i < frames.length) {
    if (!frames[i]) {
      i += 1;
      continue;
    }
    let j = i;
    while (j < frames.length && frames[j]) j += 1;
    if (j - i < minLength) {
      result.fill(false, i, j);
    }
    i = j;
  }

  return result;
}

/** Bridges gaps of at most `maxGap` frames that have speech on both sides. */
export function fillSmallGaps(frames: boolean[], maxGap: number): boolean[] {
  const result = [...frames];
  let i = 0;

  while (i < frames.length) {
    if (frames[i]) {
      i += 1;
      continue;
    }
    let j = i;
    while (j < frames.length && !frames[j]) j += 1;
    if (j - i <= maxGap && i > 0 && j < frames.length && frames[i - 1] && frames[j]) {
      result.fill(true, i, j);
    }
    i = j;
  }

  return result;
}

export function mergeOverlappingSegments(segments: SpeechSegment[]): SpeechSegment[] {
  if (segments.length === 0) return [];

  const merged: SpeechSegment[] = [];
  let current = { ...segments[0] };

  for (const next of segments.slice(1)) {
    if (next.startSample <= current.endSample) {
      current = { startSample: current.startSample, endSample: Math.max(current.endSample, next.endSample) };
    } else {
      merged.push(current);
      current = { ...next };
    }
  }

  merged.push(current);
  return merged;
}
