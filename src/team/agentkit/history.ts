/**
 * Conversion between stored session transcripts and agent-kit results.
 *
 * Every output message is stored. Only text turns are replayed as history:
 * tool calls without their paired results are rejected by most providers.
 */
import { AgentResult, type Message } from '@inngest/agent-kit';
import { z } from 'zod';
import type { TranscriptMessage } from '../../types/session';

const textContentSchema = z.union([
  z.string(),
  z.array(z.object({ type: z.literal('text'), text: z.string() })),
]);

const storedContentSchema = z.union([
  z.string(),
  z.object({ type: z.literal('text'), content: textContentSchema }),
]);

function joinText(content: z.infer<typeof textContentSchema>): string {
  return typeof content === 'string' ? content : content.map((part) => part.text).join('');
}

export function messageText(message: Message): string | undefined {
  if (message.type !== 'text') return undefined;
  return typeof message.content === 'string'
    ? message.content
    : message.content.map((part) => part.text).join('');
}

/**
 * Final text of a result: its text messages joined in order.
 */
export function resultText(result: AgentResult): string {
  return result.output
    .map(messageText)
    .filter((text): text is string => text !== undefined && text.length > 0)
    .join('\n');
}

export function userMessage(content: string, createdAt: Date): TranscriptMessage {
  return { role: 'user', content, createdAt: createdAt.toISOString() };
}

export function toTranscriptMessages(results: AgentResult[]): TranscriptMessage[] {
  return results.flatMap((result) =>
    result.output.map((message) => ({
      role: message.type === 'text' ? ('assistant' as const) : ('tool' as const),
      content: message,
      agentName: result.agentName,
      createdAt: result.createdAt.toISOString(),
    }))
  );
}

export function toAgentResults(messages: TranscriptMessage[]): AgentResult[] {
  const results: AgentResult[] = [];

  for (const stored of messages) {
    if (stored.role === 'tool') continue;

    const parsed = storedContentSchema.safeParse(stored.content);
    if (!parsed.success) continue;

    const content = typeof parsed.data === 'string' ? parsed.data : joinText(parsed.data.content);
    const role = stored.role === 'user' ? 'user' : 'assistant';
    results.push(
      new AgentResult(
        stored.agentName ?? role,
        [{ type: 'text', role, content }],
        [],
        new Date(stored.createdAt)
      )
    );
  }

  return results;
}
