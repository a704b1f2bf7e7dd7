import { spawn } from 'child_process';
import { mkdir, stat } from 'fs/promises';
import path from 'path';
import type { IAudioTranscoder, TranscodeRequest } from './IAudioTranscoder';
import type { AudioArtifact } from '../models/AudioFrame';
import { createLogger } from '../utils/logger';

const logger = createLogger({ service: 'FfmpegTranscoder' });

/**
 * Build the ffmpeg argument list for a transcode request
 */
export function buildFfmpegArgs(request: TranscodeRequest): string[] {
  const args = ['-hide_banner', '-loglevel', 'error', '-i', request.inputPath];

  if (request.audioFilters && request.audioFilters.length > 0) {
    args.push('-af', request.audioFilters.join(','));
  }

  if (request.format === 'mp3') {
    args.push('-acodec', 'libmp3lame');
    if (request.bitrateKbps !== undefined) {
      args.push('-b:a', `${request.bitrateKbps}k`);
    }
  } else {
    args.push('-acodec', 'pcm_s16le');
  }

  if (request.sampleRate !== undefined) {
    args.push('-ar', request.sampleRate.toString());
  }
  if (request.channels !== undefined) {
    args.push('-ac', request.channels.toString());
  }

  args.push('-y', request.outputPath);
  return args;
}

const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000;

/**
 * ffmpeg-backed transcoder (requires the ffmpeg binary on PATH or FFMPEG_PATH).
 * A run that outlives `timeoutMs` is killed and rejects.
 */
export class FfmpegTranscoder implements IAudioTranscoder {
  readonly name = 'ffmpeg';
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number;

  constructor(ffmpegPath: string = 'ffmpeg', timeoutMs: number = DEFAULT_TIMEOUT_MS) {
    this.ffmpegPath = ffmpegPath;
    this.timeoutMs = timeoutMs;
  }

  async transcode(request: TranscodeRequest): Promise<AudioArtifact> {
    await mkdir(path.dirname(request.outputPath), { recursive: true });
    const args = buildFfmpegArgs(request);

    await new Promise<void>((resolve, reject) => {
      const ffmpeg = spawn(this.ffmpegPath, args);

      const timer = setTimeout(() => {
        logger.error({ timeoutMs: this.timeoutMs, args }, 'ffmpeg timed out, killing');
        reject(new Error(`ffmpeg timed out after ${this.timeoutMs}ms`));
        ffmpeg.kill('SIGKILL');
      }, this.timeoutMs);

      let stderr = '';
      ffmpeg.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      ffmpeg.on('close', (code) => {
        clearTimeout(timer);
        if (code === 0) {
          resolve();
        } else {
          logger.error({ code, stderr, args }, 'ffmpeg transcode failed');
          reject(new Error(`ffmpeg exited with code ${code}: ${stderr.trim()}`));
        }
      });

      ffmpeg.on('error', (err) => {
        clearTimeout(timer);
        logger.error({ error: err }, 'ffmpeg spawn error');
        reject(new Error(`ffmpeg error: ${err.message}`));
      });
    });

    const { size } = await stat(request.outputPath);
    if (size === 0) {
      throw new Error(`ffmpeg produced an empty file: ${request.outputPath}`);
    }

    return { path: request.outputPath, sizeBytes: size, format: request.format };
  }
}
