/**
 * Recording Session Model
 */

export enum SessionState {
  IDLE = 'idle',
  RECORDING = 'recording',
  STOPPING = 'stopping',
  FINALIZED = 'finalized',
  FAILED = 'failed'
}

export interface SessionContext {
  channelId: string;
  channelName?: string;
  guildId?: string;
  initiatedBy?: string;
}

export interface SessionStatus {
  sessionId: string;
  channelId: string;
  state: SessionState;
  startedAt?: Date;
  speakers: Array<{ speakerId: string; frames: number; bytes: number }>;
}
