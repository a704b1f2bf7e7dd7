import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import type { AudioBuffer } from './AudioBuffer';
import type { MixedRecording } from '../models/AudioFrame';
import { NoAudioCapturedError } from '../errors/PipelineError';
import { BYTES_PER_SAMPLE, clampInt16, msToSamples, pcmToWav, samplesToMs } from './AudioUtils';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'AudioMixer' });

export interface MixedPcm {
  pcm: Buffer;
  sampleRate: number;
  durationMs: number;
  /** Epoch ms of the first captured sample; sample 0 of the timeline */
  startTimestamp: number;
  speakerCount: number;
}

interface Placement {
  offset: number;
  frame: Buffer;
}

/**
 * Audio Mixer
 * Merges frozen per-speaker buffers onto one shared timeline and encodes it as WAV.
 *
 * - Frames are positioned by capture timestamp relative to the earliest frame,
 *   whatever order they arrived in
 * - Gaps between frames are silence
 * - Overlapping speakers are summed sample by sample, clamped to the 16-bit range
 * - A speaker never overlaps itself: a frame stamped before the end of that speaker's
 *   previous frame is placed directly after it
 */
export class AudioMixer {
  private readonly sampleRate: number;

  constructor(sampleRate: number) {
    this.sampleRate = sampleRate;
  }

  /**
   * @throws NoAudioCapturedError when no speaker delivered any audio
   */
  mix(buffers: Iterable<AudioBuffer>): MixedPcm {
    const speakers = Array.from(buffers).filter((buffer) => !buffer.isEmpty);
    if (speakers.length === 0) {
      throw new NoAudioCapturedError();
    }

    // Long sessions exceed the argument limit of Math.min(...frames)
    const origin = speakers.reduce(
      (earliest, buffer) =>
        buffer.frames.reduce((min, frame) => Math.min(min, frame.timestamp), earliest),
      Number.POSITIVE_INFINITY
    );

    // Pass 1: place every frame and find the timeline length
    const placements: Placement[] = [];
    let totalSamples = 0;

    for (const buffer of speakers) {
      let cursor = 0;
      // Stable sort keeps arrival order for equal timestamps
      const ordered = [...buffer.frames].sort((a, b) => a.timestamp - b.timestamp);
      for (const frame of ordered) {
        const frameSamples = Math.floor(frame.data.length / BYTES_PER_SAMPLE);
        if (frameSamples === 0) continue;

        const offset = Math.max(msToSamples(frame.timestamp - origin, this.sampleRate), cursor);
        placements.push({ offset, frame: frame.data });
        cursor = offset + frameSamples;
      }
      totalSamples = Math.max(totalSamples, cursor);
    }

    // Pass 2: additive mix in a wide accumulator, clamp once at the end
    const accumulator = new Int32Array(totalSamples);
    for (const { offset, frame } of placements) {
      const frameSamples = Math.floor(frame.length / BYTES_PER_SAMPLE);
      for (let i = 0; i < frameSamples; i++) {
        accumulator[offset + i] += frame.readInt16LE(i * BYTES_PER_SAMPLE);
      }
    }

    const pcm = Buffer.alloc(totalSamples * BYTES_PER_SAMPLE);
    let clippedSamples = 0;
    for (let i = 0; i < totalSamples; i++) {
      const clamped = clampInt16(accumulator[i]);
      if (clamped !== accumulator[i]) clippedSamples++;
      pcm.writeInt16LE(clamped, i * BYTES_PER_SAMPLE);
    }

    const durationMs = samplesToMs(totalSamples, this.sampleRate);
    logger.debug({
      speakers: speakers.length,
      frames: placements.length,
      durationMs,
      clippedSamples
    }, 'Mixed speaker buffers');

    return {
      pcm,
      sampleRate: this.sampleRate,
      durationMs,
      startTimestamp: origin,
      speakerCount: speakers.length
    };
  }

  /**
   * Write mixed PCM to a WAV file
   */
  async encode(mixed: MixedPcm, outputPath: string): Promise<MixedRecording> {
    const wav = pcmToWav(mixed.pcm, mixed.sampleRate);

    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, wav);

    logger.info({
      outputPath,
      sizeMb: (wav.length / (1024 * 1024)).toFixed(2),
      durationMs: mixed.durationMs
    }, 'Encoded mixed recording');

    return {
      path: outputPath,
      sizeBytes: wav.length,
      format: 'wav',
      durationMs: mixed.durationMs,
      sampleRate: mixed.sampleRate,
      speakerCount: mixed.speakerCount
    };
  }

  async mixToFile(buffers: Iterable<AudioBuffer>, outputPath: string): Promise<MixedRecording> {
    return this.encode(this.mix(buffers), outputPath);
  }
}
