// PCM helpers for the capture and transcription path.
// Audio format contract: mono, 16-bit signed little-endian (LINEAR16).

export const BYTES_PER_SAMPLE = 2;

/** Read a LINEAR16 buffer into samples. A trailing odd byte is ignored. */
export function pcmBufferToSamples(pcm: Buffer): Int16Array {
  const sampleCount = Math.floor(pcm.length / BYTES_PER_SAMPLE);
  const samples = new Int16Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = pcm.readInt16LE(i * BYTES_PER_SAMPLE);
  }
  return samples;
}

/** Normalize 16-bit samples to floats in [-1, 1). */
export function pcm16ToFloat32(samples: Int16Array): Float32Array {
  const out = new Float32Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    out[i] = samples[i] / 32768;
  }
  return out;
}

/** Inverse of pcm16ToFloat32, clamping out-of-range input. */
export function float32ToPcm16(samples: Float32Array): Int16Array {
  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i++) {
    const clamped = Math.max(-1, Math.min(1, samples[i]));
    out[i] = Math.max(-32768, Math.min(32767, Math.round(clamped * 32768)));
  }
  return out;
}

/**
 * Wrap mono 16-bit samples in a canonical 44-byte RIFF/WAVE header so that
 * file-based transcription APIs can sniff the format.
 */
export function encodeWav(samples: Int16Array, sampleRate: number): Buffer {
  const dataBytes = samples.length * BYTES_PER_SAMPLE;
  const wav = Buffer.alloc(44 + dataBytes);

  wav.write("RIFF", 0, "ascii");
  wav.writeUInt32LE(36 + dataBytes, 4);
  wav.write("WAVE", 8, "ascii");
  wav.write("fmt ", 12, "ascii");
  wav.writeUInt32LE(16, 16); // fmt chunk size
  wav.writeUInt16LE(1, 20); // PCM
  wav.writeUInt16LE(1, 22); // mono
  wav.writeUInt32LE(sampleRate, 24);
  wav.writeUInt32LE(sampleRate * BYTES_PER_SAMPLE, 28); // byte rate
  wav.writeUInt16LE(BYTES_PER_SAMPLE, 32); // block align
  wav.writeUInt16LE(16, 34); // bits per sample
  wav.write("data", 36, "ascii");
  wav.writeUInt32LE(dataBytes, 40);

  for (let i = 0; i < samples.length; i++) {
    wav.writeInt16LE(samples[i], 44 + i * BYTES_PER_SAMPLE);
  }
  return wav;
}
