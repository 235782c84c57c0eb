// ─── Utterance Segmenter ────────────────────────────────────────────────────────
// Cuts the inbound 16-bit PCM stream into utterance segments for the voice
// pipeline. A segment opens on the first speech chunk and closes after a run
// of trailing silence, at a maximum length, or on an explicit flush.
//
// Classification follows the usual energy VAD: a fixed conservative RMS
// threshold while bootstrapping, then a fraction of the median speech RMS.
// Durations are audio-time (samples / sample rate), never wall-clock.

export interface SegmenterConfig {
  /** PCM sample rate in Hz. Default: 16000 */
  sampleRate: number;
  /** Trailing silence that closes a segment, in seconds. Default: 0.8 */
  endSilenceSeconds: number;
  /** Hard cap on segment length, in seconds. Default: 15 */
  maxSegmentSeconds: number;
  /** Segments with less speech than this are discarded as noise. Default: 0.2 */
  minSpeechSeconds: number;
  /** Fraction of median speech energy used as the silence threshold. Default: 0.15 */
  thresholdMultiplier: number;
  /** Sliding window cap for speech RMS values. Default: 600 */
  speechEnergyWindowChunks: number;
  /** Chunks before the adaptive threshold activates. Default: 40 */
  noiseFloorBootstrapChunks: number;
  /** Silent chunks kept ahead of speech onset so the first syllable survives. Default: 3 */
  preRollChunks: number;
}

export interface AudioSegment {
  /** Concatenated 16-bit LE PCM. */
  audio: Buffer;
  firstSeq: number;
  lastSeq: number;
  durationSeconds: number;
  speechSeconds: number;
}

export type SegmentCallback = (segment: AudioSegment) => void;

export const DEFAULT_SEGMENTER_CONFIG: SegmenterConfig = {
  sampleRate: 16000,
  endSilenceSeconds: 0.8,
  maxSegmentSeconds: 15,
  minSpeechSeconds: 0.2,
  thresholdMultiplier: 0.15,
  speechEnergyWindowChunks: 600,
  noiseFloorBootstrapChunks: 40,
  preRollChunks: 3,
};

/** Fixed conservative RMS threshold used during the noise floor bootstrap period */
export const BOOTSTRAP_RMS_THRESHOLD = 50;

interface BufferedChunk {
  pcm: Buffer;
  seq: number;
  samples: number;
}

/**
 * Compute the RMS (Root Mean Square) energy of a 16-bit PCM audio chunk.
 */
export function computeChunkRMS(chunk: Buffer): number {
  const sampleCount = Math.floor(chunk.length / 2);
  if (sampleCount === 0) return 0;
  let sumSquares = 0;
  for (let i = 0; i < sampleCount; i++) {
    const sample = chunk.readInt16LE(i * 2);
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / sampleCount);
}

/**
 * Compute the median of a numeric array.
 * Returns 0 for empty arrays.
 */
export function computeMedian(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

export class UtteranceSegmenter {
  private readonly config: SegmenterConfig;
  private readonly onSegment: SegmentCallback;

  private speechRmsValues: number[] = [];
  private totalChunksProcessed = 0;
  private preRoll: BufferedChunk[] = [];
  private current: BufferedChunk[] = [];
  // Counted in samples so boundaries do not drift with float rounding
  private currentSamples = 0;
  private currentSpeechSamples = 0;
  private trailingSilenceSamples = 0;
  private stopped = false;

  constructor(config: Partial<SegmenterConfig>, onSegment: SegmentCallback) {
    this.config = { ...DEFAULT_SEGMENTER_CONFIG, ...config };
    this.onSegment = onSegment;
  }

  /** True while a segment is open (speech has started and not yet closed). */
  get inSegment(): boolean {
    return this.current.length > 0;
  }

  feedChunk(chunk: Buffer, seq: number): void {
    if (this.stopped) return;

    const samples = Math.floor(chunk.length / 2);
    const rms = computeChunkRMS(chunk);
    const isSpeech = rms >= this.getSilenceThreshold();
    this.totalChunksProcessed++;

    if (isSpeech) {
      this.speechRmsValues.push(rms);
      if (this.speechRmsValues.length > this.config.speechEnergyWindowChunks) {
        this.speechRmsValues.shift();
      }
    }

    const buffered: BufferedChunk = { pcm: chunk, seq, samples };

    if (!this.inSegment) {
      if (!isSpeech) {
        this.preRoll.push(buffered);
        if (this.preRoll.length > this.config.preRollChunks) {
          this.preRoll.shift();
        }
        return;
      }
      // Speech onset opens a segment with the pre-roll in front of it
      this.current = [...this.preRoll];
      this.currentSamples = this.preRoll.reduce((sum, c) => sum + c.samples, 0);
      this.preRoll = [];
    }

    this.current.push(buffered);
    this.currentSamples += samples;
    if (isSpeech) {
      this.currentSpeechSamples += samples;
      this.trailingSilenceSamples = 0;
    } else {
      this.trailingSilenceSamples += samples;
    }

    if (
      this.trailingSilenceSamples >= this.secondsToSamples(this.config.endSilenceSeconds) ||
      this.currentSamples >= this.secondsToSamples(this.config.maxSegmentSeconds)
    ) {
      this.emit();
    }
  }

  /** Closes the open segment now, e.g. on push-to-talk release. */
  flush(): void {
    if (this.stopped) return;
    if (this.inSegment) this.emit();
  }

  /**
   * Stop segmenting. Buffered audio is dropped; subsequent feedChunk() calls are no-ops.
   */
  stop(): void {
    this.stopped = true;
    this.clearSegment();
    this.preRoll = [];
  }

  private getSilenceThreshold(): number {
    const isInBootstrap = this.totalChunksProcessed < this.config.noiseFloorBootstrapChunks;
    const hasEnoughSpeechData = this.speechRmsValues.length >= this.config.noiseFloorBootstrapChunks;

    if (isInBootstrap || !hasEnoughSpeechData) {
      return BOOTSTRAP_RMS_THRESHOLD;
    }
    return computeMedian(this.speechRmsValues) * this.config.thresholdMultiplier;
  }

  private secondsToSamples(seconds: number): number {
    return Math.round(seconds * this.config.sampleRate);
  }

  private emit(): void {
    const chunks = this.current;
    const speechSamples = this.currentSpeechSamples;
    const totalSamples = this.currentSamples;
    this.clearSegment();

    if (chunks.length === 0 || speechSamples < this.secondsToSamples(this.config.minSpeechSeconds)) return;

    this.onSegment({
      audio: Buffer.concat(chunks.map((c) => c.pcm)),
      firstSeq: chunks[0].seq,
      lastSeq: chunks[chunks.length - 1].seq,
      durationSeconds: totalSamples / this.config.sampleRate,
      speechSeconds: speechSamples / this.config.sampleRate,
    });
  }

  private clearSegment(): void {
    this.current = [];
    this.currentSamples = 0;
    this.currentSpeechSamples = 0;
    this.trailingSilenceSamples = 0;
  }
}
