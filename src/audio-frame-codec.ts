/**
 * Binary frame codec for inbound audio chunks.
 *
 * Wire format: [0x43 0x52 magic ("CR")][type byte 0x41][uint32 big-endian seq][PCM bytes]
 *
 * PCM is 16-bit little-endian mono at the rate agreed in the audio_format
 * handshake, so the payload length must be even.
 */

// ─── Constants ──────────────────────────────────────────────────────────────────

const CR_MAGIC_0 = 0x43; // 'C'
const CR_MAGIC_1 = 0x52; // 'R'
const TYPE_AUDIO = 0x41; // 'A'

/** 2 (magic) + 1 (type) + 4 (seq) */
export const AUDIO_FRAME_HEADER_BYTES = 7;

/** One second of 16 kHz mono PCM; larger chunks are rejected. */
export const MAX_AUDIO_PAYLOAD_BYTES = 32000;

export interface AudioChunk {
  seq: number;
  pcm: Buffer;
}

// ─── Encode ─────────────────────────────────────────────────────────────────────

/**
 * Encode an audio chunk into the CR-prefixed wire format.
 * Produces: [0x43 0x52][0x41][uint32 seq][PCM bytes]
 */
export function encodeAudioChunk(seq: number, pcm: Buffer): Buffer {
  const buf = Buffer.alloc(AUDIO_FRAME_HEADER_BYTES + pcm.length);
  buf[0] = CR_MAGIC_0;
  buf[1] = CR_MAGIC_1;
  buf[2] = TYPE_AUDIO;
  buf.writeUInt32BE(seq, 3);
  pcm.copy(buf, AUDIO_FRAME_HEADER_BYTES);
  return buf;
}

// ─── Decode ─────────────────────────────────────────────────────────────────────

/**
 * Decode an audio chunk from the CR-prefixed wire format.
 * Returns null on malformed input.
 */
export function decodeAudioChunk(data: Buffer): AudioChunk | null {
  if (!Buffer.isBuffer(data) || data.length <= AUDIO_FRAME_HEADER_BYTES) return null;

  if (data[0] !== CR_MAGIC_0 || data[1] !== CR_MAGIC_1) return null;
  if (data[2] !== TYPE_AUDIO) return null;

  const pcm = data.subarray(AUDIO_FRAME_HEADER_BYTES);

  // 16-bit alignment
  if (pcm.length % 2 !== 0) return null;
  if (pcm.length > MAX_AUDIO_PAYLOAD_BYTES) return null;

  return { seq: data.readUInt32BE(3), pcm };
}
