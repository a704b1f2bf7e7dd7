import { describe, it, expect, vi } from 'vitest';
import { AudioPreprocessor, PREPROCESSING_CHAINS } from '../audio/AudioPreprocessor';
import type { IAudioTranscoder, TranscodeRequest } from '../audio/IAudioTranscoder';
import type { AudioArtifact } from '../models/AudioFrame';
import { PreprocessingFailedError } from '../errors/PipelineError';

const input: AudioArtifact = { path: '/recordings/recording_s1.wav', sizeBytes: 1000, format: 'wav' };

function stubTranscoder() {
  const transcode = vi.fn<(request: TranscodeRequest) => Promise<AudioArtifact>>();
  const transcoder: IAudioTranscoder = { name: 'fake', transcode };
  return { transcoder, transcode };
}

describe('AudioPreprocessor', () => {
  it('nests the filter chains: light within medium within heavy', () => {
    const { light, medium, heavy } = PREPROCESSING_CHAINS;

    expect(medium.slice(0, light.length)).toEqual(light);
    expect(heavy.slice(0, medium.length)).toEqual(medium);
    expect(medium.length).toBeGreaterThan(light.length);
    expect(heavy.length).toBeGreaterThan(medium.length);
  });

  it('passes the input through when disabled', async () => {
    const { transcoder, transcode } = stubTranscoder();
    const preprocessor = new AudioPreprocessor(transcoder, { enabled: false, level: 'heavy' });

    expect(await preprocessor.process(input)).toEqual({ artifact: input });
    expect(transcode).not.toHaveBeenCalled();
  });

  it('runs the configured chain into a new WAV file', async () => {
    const output: AudioArtifact = { path: '/recordings/recording_s1_light.wav', sizeBytes: 900, format: 'wav' };
    const { transcoder, transcode } = stubTranscoder();
    transcode.mockResolvedValue(output);
    const preprocessor = new AudioPreprocessor(transcoder, { enabled: true, level: 'light' });

    const outcome = await preprocessor.process(input);

    expect(outcome).toEqual({ artifact: output });
    expect(transcode).toHaveBeenCalledWith({
      inputPath: '/recordings/recording_s1.wav',
      outputPath: '/recordings/recording_s1_light.wav',
      format: 'wav',
      audioFilters: [...PREPROCESSING_CHAINS.light]
    });
  });

  it('falls back to the unprocessed file with a warning when filtering fails', async () => {
    const { transcoder, transcode } = stubTranscoder();
    transcode.mockRejectedValue(new Error('afftdn: unknown filter'));
    const preprocessor = new AudioPreprocessor(transcoder, { enabled: true, level: 'medium' });

    const outcome = await preprocessor.process(input);

    expect(outcome.artifact).toBe(input);
    expect(outcome.warning).toBeInstanceOf(PreprocessingFailedError);
    expect(outcome.warning?.message).toContain('afftdn: unknown filter');
  });
});
