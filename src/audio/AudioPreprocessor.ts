/**
 * Audio Preprocessor
 *
 * Cleans up the mixed recording before transcription. Each level is an ordered
 * ffmpeg filter chain and every level includes the chain of the level below it.
 */

import path from 'path';
import type { IAudioTranscoder } from './IAudioTranscoder';
import type { AudioArtifact } from '../models/AudioFrame';
import type { PreprocessingLevel } from '../config/providerConfig';
import { PreprocessingFailedError, errorMessage } from '../errors/PipelineError';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'AudioPreprocessor' });

const LIGHT_CHAIN = [
  'highpass=f=80', // rumble, desk thumps
  'lowpass=f=8000', // speech band only
  'dynaudnorm=f=250:g=15:p=0.9' // mild gain normalization
];

const MEDIUM_CHAIN = [
  ...LIGHT_CHAIN,
  'afftdn=nf=-25', // FFT noise reduction
  'loudnorm=I=-16:TP=-1.5:LRA=11', // EBU R128 loudness
  'deesser=i=0.4'
];

const HEAVY_CHAIN = [
  ...MEDIUM_CHAIN,
  'highpass=f=200',
  'lowpass=f=3400', // telephone band
  'acompressor=threshold=-21dB:ratio=4:attack=5:release=50'
];

export const PREPROCESSING_CHAINS: Readonly<Record<PreprocessingLevel, readonly string[]>> = {
  light: LIGHT_CHAIN,
  medium: MEDIUM_CHAIN,
  heavy: HEAVY_CHAIN
};

export interface PreprocessorOptions {
  enabled: boolean;
  level: PreprocessingLevel;
}

export interface PreprocessOutcome {
  artifact: AudioArtifact;
  /** Set when preprocessing failed and the input was passed through unchanged */
  warning?: PreprocessingFailedError;
}

export class AudioPreprocessor {
  private readonly transcoder: IAudioTranscoder;
  private readonly options: PreprocessorOptions;

  constructor(transcoder: IAudioTranscoder, options: PreprocessorOptions) {
    this.transcoder = transcoder;
    this.options = options;
  }

  getFilterChain(): readonly string[] {
    return PREPROCESSING_CHAINS[this.options.level];
  }

  /**
   * Never throws: a failed filter run falls back to the unprocessed input
   */
  async process(input: AudioArtifact): Promise<PreprocessOutcome> {
    if (!this.options.enabled) {
      logger.debug({ inputPath: input.path }, 'Preprocessing disabled, passing input through');
      return { artifact: input };
    }

    const parsed = path.parse(input.path);
    const outputPath = path.join(parsed.dir, `${parsed.name}_${this.options.level}.wav`);

    try {
      const artifact = await this.transcoder.transcode({
        inputPath: input.path,
        outputPath,
        format: 'wav',
        audioFilters: [...this.getFilterChain()]
      });

      logger.info({
        level: this.options.level,
        inputBytes: input.sizeBytes,
        outputBytes: artifact.sizeBytes
      }, 'Preprocessing complete');

      return { artifact };
    } catch (error) {
      logger.warn({ level: this.options.level, error: errorMessage(error) }, 'Preprocessing failed, using unprocessed audio');

      return {
        artifact: input,
        warning: new PreprocessingFailedError(
          `Preprocessing (${this.options.level}) failed, continued with unprocessed audio: ${errorMessage(error)}`,
          error
        )
      };
    }
  }
}
