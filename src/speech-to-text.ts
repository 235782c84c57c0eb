// Crisis Relay - Speech-to-Text
// Transcribes one closed utterance segment at a time with Deepgram's
// prerecorded endpoint. Segments are in-memory PCM only and never written to disk.

import type { PrerecordedSchema } from "@deepgram/sdk";
import type { AudioSegment } from "./utterance-segmenter.js";

// ─── Collaborator contract ──────────────────────────────────────────────────────

export interface SpeechToText {
  /** Resolves to the transcript, or "" when nothing intelligible was said. */
  transcribe(segment: AudioSegment, signal?: AbortSignal): Promise<string>;
}

// ─── Deepgram client interface (for testability / dependency injection) ─────────

/**
 * Subset of the prerecorded response we read.
 */
export interface DeepgramTranscriptionResult {
  results: {
    channels: Array<{
      alternatives: Array<{
        transcript: string;
        confidence: number;
      }>;
    }>;
  };
}

/**
 * Minimal interface for the Deepgram `listen.prerecorded` surface we use.
 * The SDK's DeepgramClient satisfies it; tests inject a fake.
 */
export interface DeepgramPrerecordedClient {
  listen: {
    prerecorded: {
      transcribeFile(
        source: Buffer,
        options: PrerecordedSchema,
      ): Promise<{ result: DeepgramTranscriptionResult | null; error: Error | null }>;
    };
  };
}

/**
 * Matches the inbound audio contract: mono, LINEAR16, 16kHz.
 */
export const DEFAULT_PRERECORDED_CONFIG: PrerecordedSchema = {
  model: "nova-2",
  language: "en",
  encoding: "linear16",
  sample_rate: 16000,
  channels: 1,
  punctuate: true,
  smart_format: true,
};

/** Alternatives below this confidence are treated as silence. */
export const MIN_TRANSCRIPT_CONFIDENCE = 0.3;

// ─── Engine ─────────────────────────────────────────────────────────────────────

export class DeepgramSpeechToText implements SpeechToText {
  private readonly client: DeepgramPrerecordedClient;
  private readonly options: PrerecordedSchema;

  constructor(client: DeepgramPrerecordedClient, options: Partial<PrerecordedSchema> = {}) {
    this.client = client;
    this.options = { ...DEFAULT_PRERECORDED_CONFIG, ...options };
  }

  async transcribe(segment: AudioSegment, signal?: AbortSignal): Promise<string> {
    const { result, error } = await this.client.listen.prerecorded.transcribeFile(segment.audio, this.options);

    // The SDK call cannot be cancelled; a late answer for a cancelled unit is discarded.
    if (signal?.aborted) return "";

    if (error) {
      throw error;
    }
    if (!result) {
      throw new Error("Deepgram returned neither a result nor an error");
    }

    const alternative = result.results.channels[0]?.alternatives[0];
    if (!alternative || alternative.confidence < MIN_TRANSCRIPT_CONFIDENCE) {
      return "";
    }
    return alternative.transcript.trim();
  }
}
