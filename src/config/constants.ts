/** Hard upload limit of the Whisper transcription endpoint */
export const MAX_TRANSCRIPTION_BYTES = 25 * 1024 * 1024;

/** Chat platforms cap message length; stay below the 2000 character limit */
export const MESSAGE_CHUNK_SIZE = 1900;

export const MAX_RETRIES = 1;

// Vocabulary only, no instructions (avoids prompt leakage into the transcript)
export const DEFAULT_CONTEXT_HINT = 'Team voice meeting: agenda, decision, action item, deadline, follow-up';

export interface CompressionPreset {
  bitrateKbps: number;
  sampleRate: number;
  channels: 1 | 2;
}

/** Ordered from best quality to smallest output */
export const DEFAULT_COMPRESSION_LADDER: readonly CompressionPreset[] = [
  { bitrateKbps: 64, sampleRate: 16000, channels: 1 },
  { bitrateKbps: 48, sampleRate: 16000, channels: 1 },
  { bitrateKbps: 32, sampleRate: 16000, channels: 1 },
  { bitrateKbps: 24, sampleRate: 12000, channels: 1 },
  { bitrateKbps: 16, sampleRate: 8000, channels: 1 }
];

export const PROMPTS = {
  MINUTES_SYSTEM: 'You are an assistant that writes clear, accurate meeting minutes from voice-chat transcripts.',
  MINUTES_REQUIREMENTS: [
    'Summarize the main points of the conversation',
    'List every decision that was made',
    'List action items with their owners where mentioned',
    'Keep the original language of the transcript',
    'Use short headings and bullet points'
  ]
};
