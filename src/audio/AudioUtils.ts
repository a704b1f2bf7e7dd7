/**
 * Audio Utility Functions
 *
 * - PCM (16-bit signed, little-endian, mono) ↔ WAV container
 * - Sample/duration arithmetic shared by the mixer and encoder
 */

export const BYTES_PER_SAMPLE = 2;
const WAV_HEADER_SIZE = 44;

/**
 * Convert raw PCM to WAV format
 *
 * @param pcmData - Raw 16-bit signed PCM data (little-endian)
 * @param sampleRate - Sample rate in Hz
 * @returns WAV buffer with proper headers
 */
export function pcmToWav(pcmData: Buffer, sampleRate: number, numChannels: number = 1): Buffer {
  const bitsPerSample = 16;
  const byteRate = (sampleRate * numChannels * bitsPerSample) / 8;
  const blockAlign = (numChannels * bitsPerSample) / 8;

  const wavBuffer = Buffer.alloc(WAV_HEADER_SIZE + pcmData.length);

  // RIFF header
  wavBuffer.write('RIFF', 0);
  wavBuffer.writeUInt32LE(36 + pcmData.length, 4); // File size - 8
  wavBuffer.write('WAVE', 8);

  // fmt subchunk
  wavBuffer.write('fmt ', 12);
  wavBuffer.writeUInt32LE(16, 16); // Subchunk1Size (16 for PCM)
  wavBuffer.writeUInt16LE(1, 20); // AudioFormat (1 = PCM)
  wavBuffer.writeUInt16LE(numChannels, 22);
  wavBuffer.writeUInt32LE(sampleRate, 24);
  wavBuffer.writeUInt32LE(byteRate, 28);
  wavBuffer.writeUInt16LE(blockAlign, 32);
  wavBuffer.writeUInt16LE(bitsPerSample, 34);

  // data subchunk
  wavBuffer.write('data', 36);
  wavBuffer.writeUInt32LE(pcmData.length, 40);

  pcmData.copy(wavBuffer, WAV_HEADER_SIZE);

  return wavBuffer;
}

/**
 * Extract raw PCM and its sample rate from a WAV file
 */
export function wavToPcm(wavData: Buffer): { pcm: Buffer; sampleRate: number } {
  if (wavData.toString('utf8', 0, 4) !== 'RIFF') {
    throw new Error('Invalid WAV file: missing RIFF header');
  }

  if (wavData.toString('utf8', 8, 12) !== 'WAVE') {
    throw new Error('Invalid WAV file: missing WAVE format');
  }

  let offset = 12;
  let sampleRate = 0;

  while (offset <= wavData.length - 8) {
    const chunkId = wavData.toString('utf8', offset, offset + 4);
    const chunkSize = wavData.readUInt32LE(offset + 4);

    if (chunkId === 'fmt ') {
      sampleRate = wavData.readUInt32LE(offset + 12);
    } else if (chunkId === 'data') {
      const pcm = wavData.subarray(offset + 8, offset + 8 + chunkSize);
      return { pcm, sampleRate };
    }

    offset += 8 + chunkSize;
  }

  throw new Error('Invalid WAV file: missing data chunk');
}

export function msToSamples(ms: number, sampleRate: number): number {
  return Math.round((ms * sampleRate) / 1000);
}

export function samplesToMs(samples: number, sampleRate: number): number {
  return Math.round((samples * 1000) / sampleRate);
}

export function clampInt16(value: number): number {
  return Math.max(-32768, Math.min(32767, value));
}
