import type { ChatMessage, MinutesContext } from './IMinutesProvider';
import { PROMPTS } from '../../config/constants';

export function formatMeetingDate(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * Build the chat messages for a minutes request
 */
export function buildMinutesMessages(transcript: string, context: MinutesContext): ChatMessage[] {
  const info = [
    `- Title: ${context.meetingTitle}`,
    `- Date: ${formatMeetingDate(context.startedAt)}`
  ];
  if (context.channelName) {
    info.push(`- Channel: ${context.channelName}`);
  }
  if (context.participants.length > 0) {
    info.push(`- Participants: ${context.participants.join(', ')}`);
  }
  if (context.vocabulary) {
    info.push(`- Vocabulary: ${context.vocabulary}`);
  }

  const requirements = PROMPTS.MINUTES_REQUIREMENTS.map((line, index) => `${index + 1}. ${line}`);

  const prompt = [
    'Write meeting minutes for the following voice conversation.',
    '',
    '[Meeting]',
    ...info,
    '',
    '[Transcript]',
    transcript.trim(),
    '',
    '[Requirements]',
    ...requirements,
    '',
    'Minutes:'
  ].join('\n');

  return [
    { role: 'system', content: PROMPTS.MINUTES_SYSTEM },
    { role: 'user', content: prompt }
  ];
}
