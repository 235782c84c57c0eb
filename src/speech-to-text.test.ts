// Crisis Relay - Speech-to-text tests

import { describe, it, expect, vi } from "vitest";
import { DeepgramSpeechToText, DEFAULT_PRERECORDED_CONFIG } from "./speech-to-text.js";
import type { DeepgramPrerecordedClient, DeepgramTranscriptionResult } from "./speech-to-text.js";
import type { AudioSegment } from "./utterance-segmenter.js";

const segment: AudioSegment = {
  audio: Buffer.alloc(3200),
  firstSeq: 0,
  lastSeq: 1,
  durationSeconds: 0.1,
  speechSeconds: 0.1,
};

function resultOf(transcript: string, confidence: number): DeepgramTranscriptionResult {
  return { results: { channels: [{ alternatives: [{ transcript, confidence }] }] } };
}

function fakeClient(response: { result: DeepgramTranscriptionResult | null; error: Error | null }) {
  const transcribeFile = vi.fn().mockResolvedValue(response);
  const client: DeepgramPrerecordedClient = { listen: { prerecorded: { transcribeFile } } };
  return { client, transcribeFile };
}

describe("DeepgramSpeechToText", () => {
  it("returns the trimmed top transcript", async () => {
    const { client, transcribeFile } = fakeClient({ result: resultOf("  help me  ", 0.92), error: null });
    const stt = new DeepgramSpeechToText(client);

    await expect(stt.transcribe(segment)).resolves.toBe("help me");
    expect(transcribeFile).toHaveBeenCalledWith(segment.audio, DEFAULT_PRERECORDED_CONFIG);
  });

  it("merges option overrides into the defaults", async () => {
    const { client, transcribeFile } = fakeClient({ result: resultOf("hi", 0.9), error: null });
    await new DeepgramSpeechToText(client, { model: "nova-3" }).transcribe(segment);
    expect(transcribeFile.mock.calls[0]?.[1]).toEqual({ ...DEFAULT_PRERECORDED_CONFIG, model: "nova-3" });
  });

  it("treats low-confidence results as silence", async () => {
    const { client } = fakeClient({ result: resultOf("mumble", 0.1), error: null });
    await expect(new DeepgramSpeechToText(client).transcribe(segment)).resolves.toBe("");
  });

  it("treats a result with no alternatives as silence", async () => {
    const { client } = fakeClient({ result: { results: { channels: [] } }, error: null });
    await expect(new DeepgramSpeechToText(client).transcribe(segment)).resolves.toBe("");
  });

  it("throws the SDK's error", async () => {
    const { client } = fakeClient({ result: null, error: new Error("401 Unauthorized") });
    await expect(new DeepgramSpeechToText(client).transcribe(segment)).rejects.toThrow("401 Unauthorized");
  });

  it("throws when the SDK returns nothing", async () => {
    const { client } = fakeClient({ result: null, error: null });
    await expect(new DeepgramSpeechToText(client).transcribe(segment)).rejects.toThrow(
      "Deepgram returned neither a result nor an error",
    );
  });

  it("discards a late answer for a cancelled unit", async () => {
    const { client } = fakeClient({ result: resultOf("too late", 0.99), error: null });
    const controller = new AbortController();
    controller.abort();
    await expect(new DeepgramSpeechToText(client).transcribe(segment, controller.signal)).resolves.toBe("");
  });
});
