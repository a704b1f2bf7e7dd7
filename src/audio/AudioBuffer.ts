import type { PcmFrame } from '../models/AudioFrame';

export class AudioBufferFrozenError extends Error {
  constructor(speakerId: string) {
    super(`Audio buffer for speaker ${speakerId} is frozen`);
    this.name = 'AudioBufferFrozenError';
  }
}

/**
 * Per-speaker audio accumulation for one session.
 *
 * Append-only while the session records; read-only once frozen.
 * Each speaker has its own buffer so frame arrival never contends across speakers.
 */
export class AudioBuffer {
  readonly speakerId: string;
  private readonly chunks: PcmFrame[] = [];
  private totalBytes = 0;
  private frozen = false;

  constructor(speakerId: string) {
    this.speakerId = speakerId;
  }

  append(frame: PcmFrame): void {
    if (this.frozen) {
      throw new AudioBufferFrozenError(this.speakerId);
    }

    // Copy so a caller reusing its packet buffer cannot rewrite captured audio
    this.chunks.push({ timestamp: frame.timestamp, data: Buffer.from(frame.data) });
    this.totalBytes += frame.data.length;
  }

  freeze(): void {
    this.frozen = true;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get frames(): readonly PcmFrame[] {
    return this.chunks;
  }

  get frameCount(): number {
    return this.chunks.length;
  }

  get byteLength(): number {
    return this.totalBytes;
  }

  get isEmpty(): boolean {
    return this.totalBytes === 0;
  }
}
