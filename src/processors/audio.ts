import type { Transform } from "../contracts";
import { assertNever } from "../lib/assertNever";
import { ProcessorError } from "../lib/errors";
import type { Processor } from "./types";

// --- PCM Buffer ---

/** Decoded audio: interleaved samples in [-1, 1]. */
export interface AudioData {
  sampleRate: number;
  channels: number;
  samples: Float32Array;
  /** Bit depth of the source file. */
  sourceBits: number;
}

export type WavEncoding = "pcm16" | "float32";

const WAVE_FORMAT_PCM = 1;
const WAVE_FORMAT_IEEE_FLOAT = 3;
const WAVE_FORMAT_EXTENSIBLE = 0xfffe;

export function frameCount(audio: AudioData): number {
  return audio.channels === 0 ? 0 : Math.floor(audio.samples.length / audio.channels);
}

// --- WAV Decode ---

function readSample(buf: Buffer, offset: number, bits: number, float: boolean): number {
  if (float) {
    return bits === 64 ? buf.readDoubleLE(offset) : buf.readFloatLE(offset);
  }
  switch (bits) {
    case 8:
      return (buf.readUInt8(offset) - 128) / 128;
    case 16:
      return buf.readInt16LE(offset) / 32768;
    case 24:
      return buf.readIntLE(offset, 3) / 8388608;
    case 32:
      return buf.readInt32LE(offset) / 2147483648;
    default:
      throw new ProcessorError("decode", `unsupported PCM bit depth ${bits}`);
  }
}

/**
 * Decode a RIFF/WAVE file. Handles integer PCM at 8/16/24/32 bits and
 * IEEE float at 32/64 bits, including WAVE_FORMAT_EXTENSIBLE headers.
 */
export function decodeWav(input: Buffer): AudioData {
  if (input.length < 12 || input.toString("ascii", 0, 4) !== "RIFF" || input.toString("ascii", 8, 12) !== "WAVE") {
    throw new ProcessorError("decode", "not a RIFF/WAVE file");
  }

  let format: number | null = null;
  let channels = 0;
  let sampleRate = 0;
  let bits = 0;
  let data: Buffer | null = null;

  let offset = 12;
  while (offset + 8 <= input.length) {
    const id = input.toString("ascii", offset, offset + 4);
    const size = input.readUInt32LE(offset + 4);
    const start = offset + 8;
    const end = Math.min(start + size, input.length);

    if (id === "fmt ") {
      if (size < 16) throw new ProcessorError("decode", "fmt chunk too short");
      format = input.readUInt16LE(start);
      channels = input.readUInt16LE(start + 2);
      sampleRate = input.readUInt32LE(start + 4);
      bits = input.readUInt16LE(start + 14);
      if (format === WAVE_FORMAT_EXTENSIBLE && size >= 26) {
        // First two bytes of the sub-format GUID carry the real format tag
        format = input.readUInt16LE(start + 24);
      }
    } else if (id === "data") {
      data = input.subarray(start, end);
    }
    // Chunks are word-aligned
    offset = start + size + (size % 2);
  }

  if (format === null) throw new ProcessorError("decode", "missing fmt chunk");
  if (data === null) throw new ProcessorError("decode", "missing data chunk");
  if (format !== WAVE_FORMAT_PCM && format !== WAVE_FORMAT_IEEE_FLOAT) {
    throw new ProcessorError("decode", `unsupported WAV format tag ${format}`);
  }
  if (channels < 1 || sampleRate < 1) {
    throw new ProcessorError("decode", "invalid channel count or sample rate");
  }
  const float = format === WAVE_FORMAT_IEEE_FLOAT;
  if (float && bits !== 32 && bits !== 64) {
    throw new ProcessorError("decode", `unsupported float bit depth ${bits}`);
  }

  const bytesPerSample = bits / 8;
  const frameBytes = bytesPerSample * channels;
  const frames = Math.floor(data.length / frameBytes);
  const samples = new Float32Array(frames * channels);
  for (let i = 0; i < samples.length; i++) {
    samples[i] = readSample(data, i * bytesPerSample, bits, float);
  }
  return { sampleRate, channels, samples, sourceBits: bits };
}

// --- WAV Encode ---

export function encodeWav(audio: AudioData, encoding: WavEncoding): Buffer {
  const bits = encoding === "pcm16" ? 16 : 32;
  const bytesPerSample = bits / 8;
  const dataBytes = audio.samples.length * bytesPerSample;
  const out = Buffer.alloc(44 + dataBytes);

  out.write("RIFF", 0, "ascii");
  out.writeUInt32LE(36 + dataBytes, 4);
  out.write("WAVE", 8, "ascii");
  out.write("fmt ", 12, "ascii");
  out.writeUInt32LE(16, 16);
  out.writeUInt16LE(encoding === "pcm16" ? WAVE_FORMAT_PCM : WAVE_FORMAT_IEEE_FLOAT, 20);
  out.writeUInt16LE(audio.channels, 22);
  out.writeUInt32LE(audio.sampleRate, 24);
  out.writeUInt32LE(audio.sampleRate * audio.channels * bytesPerSample, 28);
  out.writeUInt16LE(audio.channels * bytesPerSample, 32);
  out.writeUInt16LE(bits, 34);
  out.write("data", 36, "ascii");
  out.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < audio.samples.length; i++) {
    const offset = 44 + i * bytesPerSample;
    if (encoding === "pcm16") {
      const clamped = Math.max(-1, Math.min(1, audio.samples[i]));
      out.writeInt16LE(Math.max(-32768, Math.min(32767, Math.round(clamped * 32767))), offset);
    } else {
      out.writeFloatLE(audio.samples[i], offset);
    }
  }
  return out;
}

// --- DSP ---

/** Scale so the loudest sample reaches `peak`. Silence is left alone. */
export function normalize(audio: AudioData, peak: number): AudioData {
  let max = 0;
  for (const s of audio.samples) max = Math.max(max, Math.abs(s));
  if (max === 0) return audio;
  const gain = peak / max;
  return { ...audio, samples: audio.samples.map((s) => s * gain) };
}

/** Linear-interpolation resample to `targetRate`. */
export function resample(audio: AudioData, targetRate: number): AudioData {
  if (targetRate === audio.sampleRate) return audio;
  const ratio = targetRate / audio.sampleRate;
  const inFrames = frameCount(audio);
  const outFrames = Math.ceil(inFrames * ratio);
  const { channels } = audio;
  const out = new Float32Array(outFrames * channels);

  for (let frame = 0; frame < outFrames; frame++) {
    const srcPos = frame / ratio;
    const i0 = Math.min(Math.floor(srcPos), inFrames - 1);
    const i1 = Math.min(i0 + 1, inFrames - 1);
    const frac = srcPos - Math.floor(srcPos);
    for (let ch = 0; ch < channels; ch++) {
      const s0 = audio.samples[i0 * channels + ch];
      const s1 = audio.samples[i1 * channels + ch];
      out[frame * channels + ch] = s0 + (s1 - s0) * frac;
    }
  }
  return { ...audio, sampleRate: targetRate, samples: out };
}

// --- Processor ---

export function createAudioProcessor(): Processor {
  return {
    kind: "audio",
    async transform(input: Buffer, step: Transform): Promise<Buffer> {
      switch (step.op) {
        case "normalize":
          return encodeWav(normalize(decodeWav(input), step.peak), "float32");
        case "resample":
          return encodeWav(resample(decodeWav(input), step.sampleRate), "float32");
        case "encode":
          if (step.format === "wav") {
            return encodeWav(decodeWav(input), "pcm16");
          }
          if (step.format === "ogg") {
            throw new ProcessorError(
              "encode",
              "OGG Vorbis output needs an external encoder, which is not installed"
            );
          }
          throw new ProcessorError("encode", `audio cannot be encoded as ${step.format}`);
        case "resize":
        case "trim":
        case "recompress":
        case "generateMip":
        case "simplify":
        case "bufferCompress":
          throw new ProcessorError(step.op, "not an audio operation");
        default:
          return assertNever(step, "transform");
      }
    },
  };
}

// --- Info ---

export interface AudioInfo {
  channels: number;
  sampleRate: number;
  bitsPerSample: number;
  frames: number;
  durationSecs: number;
  /** Bits per second of the uncompressed stream. */
  bitrate: number;
}

export function audioInfo(input: Buffer): AudioInfo {
  const audio = decodeWav(input);
  const frames = frameCount(audio);
  return {
    channels: audio.channels,
    sampleRate: audio.sampleRate,
    bitsPerSample: audio.sourceBits,
    frames,
    durationSecs: frames / audio.sampleRate,
    bitrate: audio.sampleRate * audio.channels * audio.sourceBits,
  };
}
