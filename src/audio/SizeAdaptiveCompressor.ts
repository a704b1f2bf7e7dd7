/**
 * Size-Adaptive Compressor
 *
 * Re-encodes audio down a fixed ladder of presets until the file fits the
 * transcription upload limit. Files already under the limit are returned untouched.
 */

import { rm } from 'fs/promises';
import path from 'path';
import type { IAudioTranscoder } from './IAudioTranscoder';
import type { AudioArtifact } from '../models/AudioFrame';
import type { CompressionPreset } from '../config/constants';
import { FileTooLargeError, InternalError, errorMessage } from '../errors/PipelineError';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'SizeAdaptiveCompressor' });

export interface CompressionOutcome {
  artifact: AudioArtifact;
  /** Preset that produced the artifact; undefined when the input already fit */
  preset?: CompressionPreset;
  /** Number of re-encodes performed */
  attempts: number;
}

export class SizeAdaptiveCompressor {
  private readonly transcoder: IAudioTranscoder;
  private readonly ladder: readonly CompressionPreset[];

  constructor(transcoder: IAudioTranscoder, ladder: readonly CompressionPreset[]) {
    this.transcoder = transcoder;
    this.ladder = ladder;
  }

  /**
   * Only the returned artifact survives; every intermediate encode is deleted
   * as soon as the next one exists.
   *
   * @throws FileTooLargeError when the last preset still exceeds maxBytes
   */
  async fit(input: AudioArtifact, maxBytes: number): Promise<CompressionOutcome> {
    if (input.sizeBytes <= maxBytes) {
      logger.debug({ sizeBytes: input.sizeBytes, maxBytes }, 'Audio within size limit, no compression needed');
      return { artifact: input, attempts: 0 };
    }

    logger.info({
      inputPath: input.path,
      sizeMb: toMegabytes(input.sizeBytes),
      limitMb: toMegabytes(maxBytes)
    }, 'Audio exceeds size limit, compressing');

    const parsed = path.parse(input.path);
    let previous: AudioArtifact | undefined;
    let smallest = input.sizeBytes;
    let attempts = 0;

    for (const [index, preset] of this.ladder.entries()) {
      const outputPath = path.join(
        parsed.dir,
        `${parsed.name}_c${index + 1}_${preset.bitrateKbps}k_${preset.sampleRate}hz.mp3`
      );

      let artifact: AudioArtifact;
      try {
        artifact = await this.transcoder.transcode({
          inputPath: input.path,
          outputPath,
          format: 'mp3',
          bitrateKbps: preset.bitrateKbps,
          sampleRate: preset.sampleRate,
          channels: preset.channels
        });
      } catch (error) {
        await discard(previous);
        throw new InternalError(`Compression with ${describePreset(preset)} failed: ${errorMessage(error)}`, 'compress', error);
      }
      attempts++;
      smallest = Math.min(smallest, artifact.sizeBytes);

      if (previous && artifact.sizeBytes > previous.sizeBytes) {
        logger.warn({
          preset: describePreset(preset),
          sizeBytes: artifact.sizeBytes,
          previousSizeBytes: previous.sizeBytes
        }, 'Compression preset produced a larger file than the previous one');
      }

      await discard(previous);
      previous = artifact;

      logger.info({
        attempt: attempts,
        preset: describePreset(preset),
        sizeMb: toMegabytes(artifact.sizeBytes)
      }, 'Compression attempt finished');

      if (artifact.sizeBytes <= maxBytes) {
        return { artifact, preset, attempts };
      }
    }

    // Oversized output would be rejected by the transcription API anyway
    await discard(previous);
    throw new FileTooLargeError(smallest, maxBytes);
  }
}

async function discard(artifact: AudioArtifact | undefined): Promise<void> {
  if (artifact) {
    await rm(artifact.path, { force: true });
  }
}

function describePreset(preset: CompressionPreset): string {
  return `${preset.bitrateKbps}kbps/${preset.sampleRate}Hz/${preset.channels === 1 ? 'mono' : 'stereo'}`;
}

function toMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(2);
}
