import { logger } from '../config';
import { errorMessage } from '../errors';
import type { TeamCache } from '../team/TeamCache';
import { withTimeout } from '../utils/timeout';

export interface ChatRequest {
  tenantId: string;
  instanceId: string;
  sessionId: string;
  message: string;
  customerName?: string;
  timeoutMs?: number;
}

export interface ChatResponse {
  response: string;
  sessionId: string;
  success: boolean;
}

export function formatChatInput(message: string, customerName?: string): string {
  const name = customerName?.trim();
  return name ? `[Customer: ${name}] ${message}` : message;
}

/**
 * Routes one user turn through the tenant's cached team.
 */
export class TeamChatService {
  constructor(
    private readonly teams: TeamCache,
    private readonly defaultTimeoutMs: number
  ) {}

  async chat(request: ChatRequest): Promise<ChatResponse> {
    const { tenantId, instanceId, sessionId } = request;
    const startedAt = Date.now();

    const team = await this.teams.getOrCreate(tenantId, instanceId);
    const input = formatChatInput(request.message, request.customerName);
    const timeoutMs = request.timeoutMs ?? this.defaultTimeoutMs;

    try {
      const result = await withTimeout(
        team.delegator.run(input, { tenantId, instanceId, sessionId }),
        timeoutMs
      );

      logger.info(
        { tenantId, instanceId, sessionId, durationMs: Date.now() - startedAt },
        'Team run completed'
      );
      return { response: result.content, sessionId: result.sessionId, success: true };
    } catch (error) {
      logger.error(
        { tenantId, instanceId, sessionId, error: errorMessage(error) },
        'Team run failed'
      );
      throw error;
    }
  }
}
