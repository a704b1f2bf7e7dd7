import { randomUUID } from 'crypto';

export function generateCorrelationId(): string {
  return randomUUID();
}

/**
 * Session id: channel, start time and a short random suffix
 */
export function generateSessionId(channelId: string, startedAt: Date): string {
  return `${channelId}_${startedAt.getTime()}_${randomUUID().slice(0, 8)}`;
}
