/**
 * Audio Models
 *
 * Captured audio is raw 16-bit signed little-endian mono PCM.
 */

export interface PcmFrame {
  /** Capture time of the first sample, epoch milliseconds */
  timestamp: number;
  data: Buffer;
}

/**
 * A file on disk produced by one pipeline stage.
 * Artifacts are never modified in place; each stage writes a new one.
 */
export interface AudioArtifact {
  path: string;
  sizeBytes: number;
  format: 'wav' | 'mp3';
}

export interface MixedRecording extends AudioArtifact {
  durationMs: number;
  sampleRate: number;
  speakerCount: number;
}
