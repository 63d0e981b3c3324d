/**
 * Session transcript types.
 */

export type MessageRole = 'user' | 'assistant' | 'tool';

export interface TranscriptMessage {
  role: MessageRole;
  content: unknown;
  agentName?: string;
  createdAt: string;
}

export interface SessionSummary {
  sessionId: string;
  messageCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface SessionTranscript extends SessionSummary {
  tenantId: string;
  instanceId: string;
  messages: TranscriptMessage[];
}
