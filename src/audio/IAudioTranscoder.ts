/**
 * Audio Transcoder Interface
 *
 * Abstraction over the encoder used by the preprocessing and compression stages
 * (ffmpeg in production, in-process fakes in tests).
 */

import type { AudioArtifact } from '../models/AudioFrame';

export interface TranscodeRequest {
  inputPath: string;
  outputPath: string;

  /**
   * Container of the output file
   */
  format: 'wav' | 'mp3';

  /**
   * Ordered filter chain applied before encoding (ffmpeg -af syntax)
   */
  audioFilters?: string[];

  bitrateKbps?: number;
  sampleRate?: number;
  channels?: number;
}

export interface IAudioTranscoder {
  /**
   * Transcoder name for logging/debugging
   */
  readonly name: string;

  /**
   * Encode inputPath into a new file at outputPath
   * @returns The written artifact with its measured size
   */
  transcode(request: TranscodeRequest): Promise<AudioArtifact>;
}
