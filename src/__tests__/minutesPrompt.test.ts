import { describe, it, expect } from 'vitest';
import { buildMinutesMessages, formatMeetingDate } from '../providers/ai/minutesPrompt';
import { PROMPTS } from '../config/constants';

describe('buildMinutesMessages', () => {
  const startedAt = new Date(2024, 2, 5, 9, 7);

  it('formats the meeting date in local time', () => {
    expect(formatMeetingDate(startedAt)).toBe('2024-03-05 09:07');
  });

  it('puts meeting details, transcript and requirements into the user prompt', () => {
    const [system, user] = buildMinutesMessages('  We ship on Friday.\n', {
      meetingTitle: 'Release planning',
      startedAt,
      participants: ['alice', 'bob'],
      channelName: 'general',
      vocabulary: 'release, hotfix'
    });

    expect(system).toEqual({ role: 'system', content: PROMPTS.MINUTES_SYSTEM });
    expect(user.role).toBe('user');

    const lines = user.content.split('\n');
    expect(lines.slice(2, 8)).toEqual([
      '[Meeting]',
      '- Title: Release planning',
      '- Date: 2024-03-05 09:07',
      '- Channel: general',
      '- Participants: alice, bob',
      '- Vocabulary: release, hotfix'
    ]);
    expect(lines.slice(9, 11)).toEqual(['[Transcript]', 'We ship on Friday.']);
    expect(lines).toContain('3. List action items with their owners where mentioned');
    expect(lines[lines.length - 1]).toBe('Minutes:');
  });

  it('leaves out optional details that are missing', () => {
    const [, user] = buildMinutesMessages('Hi', { meetingTitle: 'Standup', startedAt, participants: [] });

    expect(user.content).not.toContain('- Channel:');
    expect(user.content).not.toContain('- Participants:');
    expect(user.content).not.toContain('- Vocabulary:');
  });
});
