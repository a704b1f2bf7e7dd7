import { getOutcome, type ProcessingResult, type StageError } from '../models/ProcessingResult';
import { MESSAGE_CHUNK_SIZE } from '../config/constants';

export interface PresentationOptions {
  /** Send the transcript alongside the minutes */
  includeTranscript: boolean;
  chunkSize?: number;
}

/**
 * One-line outcome summary: nothing produced, transcript only, or full success,
 * naming the error kind that decided it
 */
export function summarizeResult(result: ProcessingResult): string {
  const failure = result.errors.find((entry) => entry.severity === 'error');
  const warnings = result.errors.filter((entry) => entry.severity === 'warning');

  switch (getOutcome(result)) {
    case 'nothing':
      return failure
        ? `Nothing produced: ${describe(failure)}`
        : 'Nothing produced';
    case 'transcript-only':
      return failure
        ? `Transcript only, minutes failed: ${describe(failure)}`
        : 'Transcript only';
    case 'full':
      return warnings.length > 0
        ? `Transcript and minutes ready (warnings: ${warnings.map((entry) => entry.kind).join(', ')})`
        : 'Transcript and minutes ready';
  }
}

/**
 * Split text into pieces of at most `size` characters
 */
export function chunkMessage(text: string, size: number = MESSAGE_CHUNK_SIZE): string[] {
  if (size <= 0) {
    throw new RangeError(`Chunk size must be positive, got ${size}`);
  }
  if (text.length <= size) {
    return [text];
  }

  const chunks: string[] = [];
  for (let offset = 0; offset < text.length; offset += size) {
    chunks.push(text.slice(offset, offset + size));
  }
  return chunks;
}

/**
 * Code-fenced messages with a title line; split sections are numbered (i/n).
 * `size` bounds the whole message, fences and title included.
 */
export function formatSection(title: string, text: string, size: number = MESSAGE_CHUNK_SIZE): string[] {
  const whole = fence(`${title}\n\n${text}`);
  if (whole.length <= size) {
    return [whole];
  }

  // The header width depends on the chunk count, so grow the estimate until it holds
  let count = 2;
  for (;;) {
    const header = `${title} (${count}/${count})\n\n`;
    const chunks = chunkMessage(text, size - FENCE_OVERHEAD - header.length);
    if (chunks.length <= count) {
      return chunks.map((chunk, index) => fence(`${title} (${index + 1}/${chunks.length})\n\n${chunk}`));
    }
    count = chunks.length;
  }
}

/**
 * Messages for the presentation layer: summary first, then transcript and minutes.
 * Without minutes the transcript is always sent.
 */
export function formatForPresentation(result: ProcessingResult, options: PresentationOptions): string[] {
  const messages = [summarizeResult(result)];

  if (result.transcriptText !== undefined && (options.includeTranscript || result.minutesText === undefined)) {
    messages.push(...formatSection('Transcript', result.transcriptText, options.chunkSize));
  }
  if (result.minutesText !== undefined) {
    messages.push(...formatSection('Minutes', result.minutesText, options.chunkSize));
  }

  return messages;
}

function describe(entry: StageError): string {
  return `${entry.kind} at ${entry.stage} (${entry.message})`;
}

const FENCE_OVERHEAD = '```\n\n```'.length;

function fence(body: string): string {
  return '```\n' + body + '\n```';
}
