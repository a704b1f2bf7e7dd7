import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import { vi } from 'vitest';
import type { IAudioTranscoder, TranscodeRequest } from '../audio/IAudioTranscoder';
import type { AudioArtifact } from '../models/AudioFrame';
import type { ITranscriptionProvider } from '../providers/ai/ITranscriptionProvider';
import type { IMinutesProvider } from '../providers/ai/IMinutesProvider';

export const T0 = 1_700_000_000_000;

/** Mono 16-bit PCM holding `samples` copies of `value` */
export function pcmOf(samples: number, value: number): Buffer {
  const buffer = Buffer.alloc(samples * 2);
  for (let i = 0; i < samples; i++) {
    buffer.writeInt16LE(value, i * 2);
  }
  return buffer;
}

export function readSamples(pcm: Buffer): number[] {
  const samples: number[] = [];
  for (let offset = 0; offset + 1 < pcm.length; offset += 2) {
    samples.push(pcm.readInt16LE(offset));
  }
  return samples;
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'voice-minutes-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Transcoder double: writes a small placeholder file and reports the given size
 */
export function fakeTranscoder(sizeFor: (request: TranscodeRequest) => number) {
  const transcode = vi.fn(async (request: TranscodeRequest): Promise<AudioArtifact> => {
    await writeFile(request.outputPath, Buffer.from('encoded'));
    return { path: request.outputPath, sizeBytes: sizeFor(request), format: request.format };
  });
  const transcoder: IAudioTranscoder = { name: 'fake', transcode };
  return { transcoder, transcode };
}

export function fakeTranscriptionProvider() {
  const transcribe = vi.fn<ITranscriptionProvider['transcribe']>();
  const provider: ITranscriptionProvider = {
    name: 'fake-stt',
    isConfigured: () => true,
    transcribe
  };
  return { provider, transcribe };
}

export function fakeMinutesProvider() {
  const generateMinutes = vi.fn<IMinutesProvider['generateMinutes']>();
  const provider: IMinutesProvider = {
    name: 'openai',
    isConfigured: () => true,
    generateMinutes
  };
  return { provider, generateMinutes };
}

/** Settles only when the request is aborted */
export function hangUntilAborted(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });
}
