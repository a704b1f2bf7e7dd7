import { describe, it, expect } from 'vitest';
import { chunkMessage, formatForPresentation, formatSection, summarizeResult } from '../services/ResultFormatter';
import type { ProcessingResult } from '../models/ProcessingResult';

function result(extra: Partial<ProcessingResult>): ProcessingResult {
  return {
    sessionId: 's1',
    channelId: 'general',
    errors: [],
    completedAt: new Date(0),
    ...extra
  };
}

describe('summarizeResult', () => {
  it('names the error kind when nothing was produced', () => {
    const summary = summarizeResult(
      result({
        errors: [{ stage: 'mix', kind: 'NoAudioCaptured', message: 'No audio was captured from any speaker', severity: 'error' }]
      })
    );
    expect(summary).toBe('Nothing produced: NoAudioCaptured at mix (No audio was captured from any speaker)');
  });

  it('reports a transcript-only outcome with the minutes failure', () => {
    const summary = summarizeResult(
      result({
        transcriptText: 'hello',
        errors: [{ stage: 'minutes', kind: 'QuotaExceeded', message: 'quota exhausted', severity: 'error' }]
      })
    );
    expect(summary).toBe('Transcript only, minutes failed: QuotaExceeded at minutes (quota exhausted)');
  });

  it('reports full success and lists warnings', () => {
    expect(summarizeResult(result({ transcriptText: 'a', minutesText: 'b' }))).toBe('Transcript and minutes ready');
    expect(
      summarizeResult(
        result({
          transcriptText: 'a',
          minutesText: 'b',
          errors: [{ stage: 'preprocess', kind: 'PreprocessingFailed', message: 'x', severity: 'warning' }]
        })
      )
    ).toBe('Transcript and minutes ready (warnings: PreprocessingFailed)');
  });
});

describe('chunkMessage', () => {
  it('keeps short text whole', () => {
    expect(chunkMessage('short', 10)).toEqual(['short']);
    expect(chunkMessage('', 10)).toEqual(['']);
  });

  it('splits long text into pieces no longer than the limit', () => {
    expect(chunkMessage('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
  });

  it('splits at 1900 characters by default', () => {
    const chunks = chunkMessage('x'.repeat(4000));
    expect(chunks.map((chunk) => chunk.length)).toEqual([1900, 1900, 200]);
  });
});

describe('formatSection', () => {
  it('numbers split sections and keeps every message within the limit', () => {
    expect(formatSection('Minutes', 'abcdefghij', 26)).toEqual([
      '```\nMinutes (1/4)\n\nabc\n```',
      '```\nMinutes (2/4)\n\ndef\n```',
      '```\nMinutes (3/4)\n\nghi\n```',
      '```\nMinutes (4/4)\n\nj\n```'
    ]);
  });

  it('leaves a section that fits unnumbered', () => {
    expect(formatSection('Minutes', 'abc', 20)).toEqual(['```\nMinutes\n\nabc\n```']);
  });

  it('counts the fences and title against the default 1900 characters', () => {
    const messages = formatSection('Transcript', 'x'.repeat(4000));
    expect(messages.map((message) => message.length)).toEqual([1900, 1900, 278]);
    expect(messages[2].startsWith('```\nTranscript (3/3)\n\n')).toBe(true);
  });
});

describe('formatForPresentation', () => {
  const full = result({ transcriptText: 'the transcript', minutesText: 'the minutes' });

  it('sends only the minutes after a plain stop', () => {
    expect(formatForPresentation(full, { includeTranscript: false })).toEqual([
      'Transcript and minutes ready',
      '```\nMinutes\n\nthe minutes\n```'
    ]);
  });

  it('sends transcript and minutes when both are requested', () => {
    expect(formatForPresentation(full, { includeTranscript: true })).toEqual([
      'Transcript and minutes ready',
      '```\nTranscript\n\nthe transcript\n```',
      '```\nMinutes\n\nthe minutes\n```'
    ]);
  });

  it('falls back to the transcript when minutes are missing', () => {
    const partial = result({
      transcriptText: 'the transcript',
      errors: [{ stage: 'minutes', kind: 'TransientNetworkError', message: 'timeout', severity: 'error' }]
    });

    expect(formatForPresentation(partial, { includeTranscript: false })).toEqual([
      'Transcript only, minutes failed: TransientNetworkError at minutes (timeout)',
      '```\nTranscript\n\nthe transcript\n```'
    ]);
  });
});
