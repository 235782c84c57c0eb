// Crisis Relay - Audio frame codec tests

import { describe, it, expect } from "vitest";
import {
  AUDIO_FRAME_HEADER_BYTES,
  MAX_AUDIO_PAYLOAD_BYTES,
  decodeAudioChunk,
  encodeAudioChunk,
} from "./audio-frame-codec.js";

describe("encodeAudioChunk", () => {
  it("writes the magic, type byte and big-endian sequence number", () => {
    const frame = encodeAudioChunk(258, Buffer.from([1, 2, 3, 4]));
    expect([...frame]).toEqual([0x43, 0x52, 0x41, 0, 0, 1, 2, 1, 2, 3, 4]);
  });
});

describe("decodeAudioChunk", () => {
  it("recovers sequence number and PCM", () => {
    const pcm = Buffer.from([10, 0, 20, 0]);
    const chunk = decodeAudioChunk(encodeAudioChunk(7, pcm));
    expect(chunk).not.toBeNull();
    expect(chunk?.seq).toBe(7);
    expect(chunk?.pcm.equals(pcm)).toBe(true);
  });

  it("rejects a frame with no payload", () => {
    expect(decodeAudioChunk(encodeAudioChunk(1, Buffer.alloc(0)))).toBeNull();
  });

  it("rejects wrong magic or type", () => {
    const frame = encodeAudioChunk(1, Buffer.alloc(4));
    const badMagic = Buffer.from(frame);
    badMagic[0] = 0x00;
    const badType = Buffer.from(frame);
    badType[2] = 0x56;
    expect(decodeAudioChunk(badMagic)).toBeNull();
    expect(decodeAudioChunk(badType)).toBeNull();
  });

  it("rejects an odd-length payload", () => {
    expect(decodeAudioChunk(encodeAudioChunk(1, Buffer.alloc(3)))).toBeNull();
  });

  it("rejects a payload over the size limit", () => {
    expect(decodeAudioChunk(encodeAudioChunk(1, Buffer.alloc(MAX_AUDIO_PAYLOAD_BYTES + 2)))).toBeNull();
    expect(decodeAudioChunk(encodeAudioChunk(1, Buffer.alloc(MAX_AUDIO_PAYLOAD_BYTES)))).not.toBeNull();
  });

  it("rejects frames shorter than the header", () => {
    expect(decodeAudioChunk(Buffer.from([0x43, 0x52, 0x41]))).toBeNull();
    expect(AUDIO_FRAME_HEADER_BYTES).toBe(7);
  });
});
