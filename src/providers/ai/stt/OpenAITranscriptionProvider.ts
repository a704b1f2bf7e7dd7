import { createReadStream } from 'fs';
import { OpenAI } from 'openai';
import type { ITranscriptionProvider, TranscriptionOptions } from '../ITranscriptionProvider';
import type { AudioArtifact } from '../../../models/AudioFrame';
import type { Transcript, TranscriptSegment, TranscriptWord } from '../../../models/ProcessingResult';
import { ProviderError } from '../../../errors/PipelineError';
import { classifyOpenAIError } from '../../providerErrors';
import { createLogger } from '../../../utils/logger';

const logger = createLogger({ service: 'OpenAITranscriptionProvider' });

/**
 * OpenAI Whisper Speech-to-Text Provider
 *
 * The only audio-capable backend; transcription never routes elsewhere.
 */
export class OpenAITranscriptionProvider implements ITranscriptionProvider {
  readonly name = 'openai-whisper';
  private openai: OpenAI;
  private apiKey: string;
  private model: string;

  constructor(apiKey: string, model: string = 'whisper-1') {
    // Retries are owned by TranscriptionClient
    this.openai = new OpenAI({ apiKey, maxRetries: 0 });
    this.apiKey = apiKey;
    this.model = model;
  }

  isConfigured(): boolean {
    return this.apiKey.length > 10;
  }

  async transcribe(audio: AudioArtifact, options: TranscriptionOptions): Promise<Transcript> {
    const params: OpenAI.Audio.TranscriptionCreateParams = {
      file: createReadStream(audio.path),
      model: this.model,
      language: options.language,
      response_format: options.responseFormat,
      temperature: options.temperature
    };

    if (options.contextHint) {
      params.prompt = options.contextHint;
    }
    if (options.responseFormat === 'verbose_json') {
      params.timestamp_granularities = options.wordTimestamps ? ['word', 'segment'] : ['segment'];
    }

    logger.info({
      path: audio.path,
      sizeMb: (audio.sizeBytes / (1024 * 1024)).toFixed(2),
      responseFormat: options.responseFormat,
      wordTimestamps: options.wordTimestamps
    }, 'Transcribing audio');

    let response: unknown;
    try {
      response = await this.openai.audio.transcriptions.create(params, { signal: options.signal });
    } catch (error) {
      logger.error({ error }, 'OpenAI transcription failed');
      throw classifyOpenAIError(error, 'transcription');
    }

    return parseTranscriptionResponse(response, options.language);
  }
}

/**
 * Normalize a Whisper response (plain text or verbose JSON) into a Transcript
 */
export function parseTranscriptionResponse(response: unknown, language: string): Transcript {
  if (typeof response === 'string') {
    return { text: response.trim(), language };
  }

  if (!isRecord(response) || typeof response.text !== 'string') {
    throw new ProviderError('Unexpected transcription response shape', 'transcription');
  }

  const transcript: Transcript = {
    text: response.text.trim(),
    language: typeof response.language === 'string' ? response.language : language
  };

  if (typeof response.duration === 'number') {
    transcript.durationSeconds = response.duration;
  }

  if (Array.isArray(response.segments)) {
    transcript.segments = response.segments.filter(isSegment).map((segment) => ({
      start: segment.start,
      end: segment.end,
      text: segment.text.trim()
    }));
  }

  if (Array.isArray(response.words)) {
    transcript.words = response.words.filter(isWord).map((word) => ({
      word: word.word,
      start: word.start,
      end: word.end
    }));
  }

  return transcript;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isSegment(value: unknown): value is TranscriptSegment {
  return (
    isRecord(value) &&
    typeof value.start === 'number' &&
    typeof value.end === 'number' &&
    typeof value.text === 'string'
  );
}

function isWord(value: unknown): value is TranscriptWord {
  return (
    isRecord(value) &&
    typeof value.start === 'number' &&
    typeof value.end === 'number' &&
    typeof value.word === 'string'
  );
}
