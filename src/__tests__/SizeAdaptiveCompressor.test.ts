import { readdir, writeFile } from 'fs/promises';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SizeAdaptiveCompressor } from '../audio/SizeAdaptiveCompressor';
import type { CompressionPreset } from '../config/constants';
import type { AudioArtifact } from '../models/AudioFrame';
import { FileTooLargeError, InternalError } from '../errors/PipelineError';
import { fakeTranscoder, makeTempDir, removeTempDir } from './helpers';

const MB = 1024 * 1024;
const LIMIT = 25 * MB;

const LADDER: CompressionPreset[] = [
  { bitrateKbps: 64, sampleRate: 16000, channels: 1 },
  { bitrateKbps: 32, sampleRate: 8000, channels: 1 }
];

describe('SizeAdaptiveCompressor', () => {
  let dir: string;
  let input: AudioArtifact;

  beforeEach(async () => {
    dir = await makeTempDir();
    input = { path: path.join(dir, 'recording_s1.wav'), sizeBytes: 40 * MB, format: 'wav' };
    await writeFile(input.path, Buffer.from('original'));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('returns audio under the limit without re-encoding', async () => {
    const { transcoder, transcode } = fakeTranscoder(() => 0);
    const small: AudioArtifact = { ...input, sizeBytes: 10 * MB };

    const outcome = await new SizeAdaptiveCompressor(transcoder, LADDER).fit(small, LIMIT);

    expect(outcome).toEqual({ artifact: small, attempts: 0 });
    expect(transcode).not.toHaveBeenCalled();
  });

  it('stops at the first preset that fits', async () => {
    const { transcoder, transcode } = fakeTranscoder(() => 20 * MB);

    const outcome = await new SizeAdaptiveCompressor(transcoder, LADDER).fit(input, LIMIT);

    expect(transcode).toHaveBeenCalledTimes(1);
    expect(transcode).toHaveBeenCalledWith({
      inputPath: input.path,
      outputPath: path.join(dir, 'recording_s1_c1_64k_16000hz.mp3'),
      format: 'mp3',
      bitrateKbps: 64,
      sampleRate: 16000,
      channels: 1
    });
    expect(outcome.preset).toEqual(LADDER[0]);
    expect(outcome.attempts).toBe(1);
    expect(outcome.artifact.sizeBytes).toBe(20 * MB);
  });

  it('deletes the previous encode when walking down the ladder', async () => {
    const sizes = [30 * MB, 12 * MB];
    const { transcoder } = fakeTranscoder(() => sizes.shift() ?? 0);

    const outcome = await new SizeAdaptiveCompressor(transcoder, LADDER).fit(input, LIMIT);

    expect(outcome.preset).toEqual(LADDER[1]);
    expect(outcome.attempts).toBe(2);
    expect((await readdir(dir)).sort()).toEqual(['recording_s1.wav', 'recording_s1_c2_32k_8000hz.mp3']);
  });

  it('throws FileTooLarge and returns no artifact when the ladder is exhausted', async () => {
    const sizes = [30 * MB, 28 * MB];
    const { transcoder, transcode } = fakeTranscoder(() => sizes.shift() ?? 0);

    const error = await new SizeAdaptiveCompressor(transcoder, LADDER)
      .fit(input, LIMIT)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FileTooLargeError);
    expect(error).toMatchObject({ kind: 'FileTooLarge', smallestSizeBytes: 28 * MB, maxBytes: LIMIT });
    expect(transcode).toHaveBeenCalledTimes(2);
    expect(await readdir(dir)).toEqual(['recording_s1.wav']);
  });

  it('reports a failed encode as an internal compression error', async () => {
    const { transcoder, transcode } = fakeTranscoder(() => 30 * MB);
    transcode.mockRejectedValueOnce(new Error('ffmpeg exited with code 1'));

    const error = await new SizeAdaptiveCompressor(transcoder, LADDER)
      .fit(input, LIMIT)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InternalError);
    expect(error).toMatchObject({ stage: 'compress' });
  });
});
