import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { FUNCTION_SCHEMAS } from '../common/function-schemas';
import { OPENAI_CLIENT } from './llm.constants';
import { LlmService } from './llm.service';

function completionWith(message: Record<string, unknown>) {
  return { choices: [{ index: 0, finish_reason: 'stop', message: { role: 'assistant', ...message } }] };
}

describe('LlmService', () => {
  const create = jest.fn();
  let service: LlmService;

  beforeEach(async () => {
    create.mockReset();
    const moduleRef = await Test.createTestingModule({
      providers: [
        LlmService,
        { provide: OPENAI_CLIENT, useValue: { chat: { completions: { create } } } },
        {
          provide: ConfigService,
          useValue: new ConfigService({ OPENAI_MODEL: 'test-model', LLM_TIMEOUT_MS: 1000, LLM_MAX_CONCURRENCY: 2 }),
        },
      ],
    }).compile();
    service = moduleRef.get(LlmService);
  });

  it('sends the prompt, history and tools and returns parsed calls', async () => {
    create.mockResolvedValue(
      completionWith({
        content: null,
        tool_calls: [
          {
            id: 'call_1',
            type: 'function',
            function: { name: 'setReminder', arguments: '{"message":"buy milk","date":"2025-03-28","time":"08:00"}' },
          },
        ],
      }),
    );

    const response = await service.converse({
      systemPrompt: 'system',
      tools: FUNCTION_SCHEMAS,
      history: [
        { role: 'user', content: 'hi' },
        { role: 'assistant', content: 'hello!' },
      ],
      userText: 'Remind me to buy milk tomorrow at 8am',
    });

    expect(response).toEqual({
      replyText: '',
      functionCalls: [{ name: 'setReminder', args: { message: 'buy milk', date: '2025-03-28', time: '08:00' } }],
    });

    const [body, options] = create.mock.calls[0];
    expect(body.model).toBe('test-model');
    expect(body.messages).toEqual([
      { role: 'system', content: 'system' },
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'hello!' },
      { role: 'user', content: 'Remind me to buy milk tomorrow at 8am' },
    ]);
    expect(body.tools).toHaveLength(FUNCTION_SCHEMAS.length);
    expect(body.tools[0].type).toBe('function');
    expect(options).toEqual({ timeout: 1000 });
  });

  it('drops calls whose arguments are not a JSON object', async () => {
    create.mockResolvedValue(
      completionWith({
        content: 'On it',
        tool_calls: [
          { id: 'a', type: 'function', function: { name: 'cancelEvent', arguments: '{not json' } },
          { id: 'b', type: 'function', function: { name: 'cancelEvent', arguments: '[1,2]' } },
          { id: 'c', type: 'function', function: { name: 'getReminder', arguments: '' } },
        ],
      }),
    );

    const response = await service.converse({ systemPrompt: 's', tools: [], history: [], userText: 'x' });

    expect(response).toEqual({ replyText: 'On it', functionCalls: [{ name: 'getReminder', args: {} }] });
  });

  it('fails when the model does not answer in time', async () => {
    create.mockReturnValue(new Promise(() => undefined));

    await expect(service.converse({ systemPrompt: 's', tools: [], history: [], userText: 'x' })).rejects.toThrow(
      'LLM request timed out after 1000ms',
    );
  });

  it('restates results as plain text', async () => {
    create.mockResolvedValue(completionWith({ content: '  All done, milk reminder set.  ' }));

    const text = await service.restateResults('remind me', [
      { request: { name: 'setReminder', args: {} }, result: { status: 'success', message: 'Reminder set' } },
    ]);

    expect(text).toBe('All done, milk reminder set.');
    expect(create.mock.calls[0][0].messages[0].content).toContain('Status: success\nMessage: Reminder set');
  });
});
