import { AgentResult } from '@inngest/agent-kit';
import { resultText, toAgentResults, toTranscriptMessages, userMessage } from './history';

jest.mock('@inngest/agent-kit', () =>
  jest
    .requireActual<typeof import('../../__tests__/utils/agentKitMock')>('../../__tests__/utils/agentKitMock')
    .createAgentKitMock()
);

const at = new Date('2024-01-01T00:00:00.000Z');

describe('resultText', () => {
  it('joins the text messages of a result', () => {
    const result = new AgentResult(
      'Analyst',
      [
        { type: 'text', role: 'assistant', content: 'first' },
        { type: 'text', role: 'assistant', content: '' },
        { type: 'text', role: 'assistant', content: [{ type: 'text', text: 'sec' }, { type: 'text', text: 'ond' }] },
      ],
      [],
      at
    );

    expect(resultText(result)).toBe('first\nsecond');
  });
});

describe('userMessage', () => {
  it('stamps the user turn', () => {
    expect(userMessage('hi', at)).toEqual({ role: 'user', content: 'hi', createdAt: '2024-01-01T00:00:00.000Z' });
  });
});

describe('toTranscriptMessages', () => {
  it('stores every output message with its agent', () => {
    const result = new AgentResult('team-i1', [{ type: 'text', role: 'assistant', content: 'done' }], [], at);

    expect(toTranscriptMessages([result])).toEqual([
      {
        role: 'assistant',
        content: { type: 'text', role: 'assistant', content: 'done' },
        agentName: 'team-i1',
        createdAt: '2024-01-01T00:00:00.000Z',
      },
    ]);
  });
});

describe('toAgentResults', () => {
  it('replays user and assistant text turns only', () => {
    const results = toAgentResults([
      { role: 'user', content: 'hi', createdAt: '2024-01-01T00:00:00.000Z' },
      {
        role: 'tool',
        content: { type: 'tool_call', role: 'assistant' },
        agentName: 'team-i1',
        createdAt: '2024-01-01T00:00:01.000Z',
      },
      {
        role: 'assistant',
        content: { type: 'text', role: 'assistant', content: [{ type: 'text', text: 'Hel' }, { type: 'text', text: 'lo' }] },
        agentName: 'team-i1',
        createdAt: '2024-01-01T00:00:02.000Z',
      },
      { role: 'assistant', content: 42, createdAt: '2024-01-01T00:00:03.000Z' },
    ]);

    expect(results.map((result) => result.agentName)).toEqual(['user', 'team-i1']);
    expect(results.map((result) => result.output)).toEqual([
      [{ type: 'text', role: 'user', content: 'hi' }],
      [{ type: 'text', role: 'assistant', content: 'Hello' }],
    ]);
    expect(results[1]?.createdAt).toEqual(new Date('2024-01-01T00:00:02.000Z'));
  });

  it('names untagged assistant turns by role', () => {
    const [result] = toAgentResults([{ role: 'assistant', content: 'ok', createdAt: '2024-01-01T00:00:00.000Z' }]);
    expect(result?.agentName).toBe('assistant');
  });
});
