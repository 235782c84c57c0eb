// Crisis Relay - Synthesis Engine
// Renders replies through Murf. Voice parameters travel with every request,
// so a mode switch changes the next utterance's voice without reconnecting:
// one engine instance, one keep-alive HTTP pool, no per-mode session.
//
//   browser   -> /v1/speech/stream   MP3 at 24 kHz, streamed as it renders
//   telephony -> /v1/speech/generate WAV at 8 kHz mono, fetched whole

import type { SynthesisFormat, VoiceProfile } from "./types.js";

// ─── Collaborator contract ──────────────────────────────────────────────────────

export interface SynthesisEngine {
  /** Yields encoded audio chunks in playback order. */
  synthesize(text: string, profile: VoiceProfile, format: SynthesisFormat, signal?: AbortSignal): AsyncIterable<Buffer>;
}

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const MURF_STREAM_URL = "https://api.murf.ai/v1/speech/stream";
export const MURF_GENERATE_URL = "https://api.murf.ai/v1/speech/generate";

export interface FormatSpec {
  format: "MP3" | "WAV";
  sampleRate: number;
  contentType: string;
}

export const FORMAT_SPECS: Readonly<Record<SynthesisFormat, FormatSpec>> = {
  browser: { format: "MP3", sampleRate: 24000, contentType: "audio/mpeg" },
  telephony: { format: "WAV", sampleRate: 8000, contentType: "audio/wav" },
};

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface MurfSynthesisOptions {
  apiKey: string;
  /** Injected for tests. Defaults to the global fetch. */
  fetch?: FetchLike;
  streamUrl?: string;
  generateUrl?: string;
  /** Murf model for the streaming endpoint. Default: FALCON */
  model?: string;
}

// ─── Engine ─────────────────────────────────────────────────────────────────────

export class MurfSynthesisEngine implements SynthesisEngine {
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;
  private readonly streamUrl: string;
  private readonly generateUrl: string;
  private readonly model: string;

  constructor(options: MurfSynthesisOptions) {
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.streamUrl = options.streamUrl ?? MURF_STREAM_URL;
    this.generateUrl = options.generateUrl ?? MURF_GENERATE_URL;
    this.model = options.model ?? "FALCON";
  }

  synthesize(text: string, profile: VoiceProfile, format: SynthesisFormat, signal?: AbortSignal): AsyncIterable<Buffer> {
    return format === "browser" ? this.stream(text, profile, signal) : this.generate(text, profile, signal);
  }

  /**
   * Build the per-request body. The only place voice parameters enter a request.
   */
  buildRequestBody(text: string, profile: VoiceProfile, format: SynthesisFormat): Record<string, string | number> {
    const spec = FORMAT_SPECS[format];
    const body: Record<string, string | number> = {
      text,
      voiceId: profile.voiceId,
      style: profile.style,
      rate: profile.rate,
      pitch: profile.pitch,
      format: spec.format,
      sampleRate: spec.sampleRate,
    };
    if (format === "browser") {
      body.model = this.model;
    } else {
      body.channelType = "MONO";
    }
    return body;
  }

  private async *stream(text: string, profile: VoiceProfile, signal?: AbortSignal): AsyncGenerator<Buffer> {
    const response = await this.fetchImpl(this.streamUrl, {
      method: "POST",
      headers: { "api-key": this.apiKey, "Content-Type": "application/json" },
      body: JSON.stringify(this.buildRequestBody(text, profile, "browser")),
      signal,
    });
    await assertOk(response);

    if (!response.body) {
      throw new Error("Murf stream returned no body");
    }

    const reader = response.body.getReader();
    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        if (value && value.length > 0) {
          yield Buffer.from(value);
        }
      }
    } finally {
      reader.releaseLock();
    }
  }

  private async *generate(text: string, profile: VoiceProfile, signal?: AbortSignal): AsyncGenerator<Buffer> {
    const response = await this.fetchImpl(this.generateUrl, {
      method: "POST",
      headers: { "api-key": this.apiKey, "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify(this.buildRequestBody(text, profile, "telephony")),
      signal,
    });
    await assertOk(response);

    const audioFile = readAudioFileUrl(await response.json());
    if (!audioFile) {
      throw new Error("Murf generate response has no audioFile");
    }

    const audio = await this.fetchImpl(audioFile, { signal });
    await assertOk(audio);
    yield Buffer.from(await audio.arrayBuffer());
  }
}

function readAudioFileUrl(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null || !("audioFile" in payload)) return null;
  const { audioFile } = payload;
  return typeof audioFile === "string" && audioFile.length > 0 ? audioFile : null;
}

async function assertOk(response: Response): Promise<void> {
  if (response.ok) return;
  const detail = await response.text().catch(() => "");
  throw new Error(`Murf request failed: ${response.status} ${detail.slice(0, 200)}`);
}

/** Drains a synthesis stream into one buffer. */
export async function collectAudio(stream: AsyncIterable<Buffer>): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}
