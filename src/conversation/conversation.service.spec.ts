import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { DispatchedCall, failure, success } from '../common/types';
import { LlmService } from '../llm/llm.service';
import { UsersService } from '../users/users.service';
import { APOLOGY_REPLY, ConversationService } from './conversation.service';
import { DispatchService } from './dispatch.service';
import { HistoryService } from './history.service';
import { NOT_UNDERSTOOD_REPLY } from './reconcile';

const NOW = new Date(2025, 2, 27, 10, 0);
const ALL_STATES = ['RECEIVED', 'ENRICHED', 'DISPATCHED', 'RECONCILED', 'PERSISTED'];

const reminderCall: DispatchedCall = {
  request: { name: 'setReminder', args: { message: 'buy milk', date: '2025-03-28', time: '08:00' } },
  result: success('Reminder set: "buy milk" on 2025-03-28 08:00.'),
};

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('ConversationService', () => {
  const llm = { converse: jest.fn(), restateResults: jest.fn() };
  const dispatcher = { dispatch: jest.fn() };

  async function createService(config: Record<string, unknown> = {}) {
    const moduleRef = await Test.createTestingModule({
      providers: [
        ConversationService,
        HistoryService,
        UsersService,
        { provide: LlmService, useValue: llm },
        { provide: DispatchService, useValue: dispatcher },
        { provide: ConfigService, useValue: new ConfigService({ HISTORY_WINDOW: 20, ...config }) },
      ],
    }).compile();
    return {
      conversation: moduleRef.get(ConversationService),
      history: moduleRef.get(HistoryService),
      users: moduleRef.get(UsersService),
    };
  }

  beforeEach(() => {
    jest.resetAllMocks();
    dispatcher.dispatch.mockResolvedValue([]);
  });

  it('walks every state and replies from the first result', async () => {
    const { conversation, history } = await createService();
    llm.converse.mockResolvedValue({ replyText: '', functionCalls: [reminderCall.request] });
    dispatcher.dispatch.mockResolvedValue([reminderCall]);

    const outcome = await conversation.handleTurn('100', 'Remind me to buy milk tomorrow at 8am', NOW);

    expect(outcome).toEqual({
      reply: 'Reminder set: "buy milk" on 2025-03-28 08:00.',
      states: ALL_STATES,
      results: [reminderCall],
    });
    expect(history.getRecentTurns('100')).toEqual([
      { role: 'user', content: 'Remind me to buy milk tomorrow at 8am' },
      { role: 'assistant', content: 'Reminder set: "buy milk" on 2025-03-28 08:00.' },
    ]);
  });

  it('builds the dispatch context from the sender account', async () => {
    const { conversation, users } = await createService();
    const user = users.linkWorkspace('100', 'test-token');
    llm.converse.mockResolvedValue({ replyText: '', functionCalls: [reminderCall.request] });

    await conversation.handleTurn('100', 'save a note', NOW);

    expect(dispatcher.dispatch).toHaveBeenCalledWith(
      { userId: user.id, senderId: '100', workspaceLinked: true, text: 'save a note', now: NOW },
      [reminderCall.request],
    );
  });

  it('sends earlier turns but not the current message as history', async () => {
    const { conversation } = await createService();
    llm.converse.mockResolvedValue({ replyText: 'Hello!', functionCalls: [] });

    await conversation.handleTurn('100', 'hi', NOW);
    await conversation.handleTurn('100', 'what can you do?', NOW);

    const secondRequest = llm.converse.mock.calls[1][0];
    expect(secondRequest.history).toEqual([
      { role: 'user', content: 'hi' },
      { role: 'assistant', content: 'Hello!' },
    ]);
    expect(secondRequest.userText).toBe('what can you do?');
    expect(secondRequest.systemPrompt).toContain('Today is Thursday, 2025-03-27.');
  });

  it('annotates the model text with results', async () => {
    const { conversation } = await createService();
    llm.converse.mockResolvedValue({ replyText: 'On it!', functionCalls: [reminderCall.request] });
    dispatcher.dispatch.mockResolvedValue([
      reminderCall,
      { request: { name: 'cancelEvent', args: { event_title: 'gym' } }, result: failure("Event 'gym' not found.") },
    ]);

    const reply = await conversation.processTurn('100', 'remind me and cancel gym');

    expect(reply).toBe('On it!\n\n✅ Reminder set: "buy milk" on 2025-03-28 08:00.\n\n⚠️ Event \'gym\' not found.');
  });

  it('asks to rephrase when the model neither answers nor calls', async () => {
    const { conversation } = await createService();
    llm.converse.mockResolvedValue({ replyText: '', functionCalls: [] });

    expect(await conversation.processTurn('100', 'hmm')).toBe(NOT_UNDERSTOOD_REPLY);
  });

  it('skips the model for an empty message', async () => {
    const { conversation } = await createService();

    const outcome = await conversation.handleTurn('100', '   ', NOW);

    expect(outcome.reply).toBe(NOT_UNDERSTOOD_REPLY);
    expect(outcome.states).toEqual(['RECEIVED', 'PERSISTED']);
    expect(llm.converse).not.toHaveBeenCalled();
  });

  it('apologises and still persists the turn when the model fails', async () => {
    const { conversation, history } = await createService();
    llm.converse.mockRejectedValue(new Error('LLM request timed out after 30000ms'));

    const outcome = await conversation.handleTurn('100', 'hello', NOW);

    expect(outcome).toEqual({ reply: APOLOGY_REPLY, states: ['RECEIVED', 'PERSISTED'], results: [] });
    expect(history.getRecentTurns('100')).toEqual([
      { role: 'user', content: 'hello' },
      { role: 'assistant', content: APOLOGY_REPLY },
    ]);
  });

  it('apologises when dispatch itself fails', async () => {
    const { conversation } = await createService();
    llm.converse.mockResolvedValue({ replyText: '', functionCalls: [reminderCall.request] });
    dispatcher.dispatch.mockRejectedValue(new Error('unexpected'));

    const outcome = await conversation.handleTurn('100', 'remind me', NOW);

    expect(outcome.reply).toBe(APOLOGY_REPLY);
    expect(outcome.states).toEqual(['RECEIVED', 'ENRICHED', 'PERSISTED']);
  });

  describe('with restatement enabled', () => {
    it('uses the restated text', async () => {
      const { conversation } = await createService({ LLM_RESTATE_RESULTS: true });
      llm.converse.mockResolvedValue({ replyText: '', functionCalls: [reminderCall.request] });
      dispatcher.dispatch.mockResolvedValue([reminderCall]);
      llm.restateResults.mockResolvedValue("I'll remind you to buy milk tomorrow at 8. 🥛");

      expect(await conversation.processTurn('100', 'Remind me to buy milk tomorrow at 8am')).toBe(
        "I'll remind you to buy milk tomorrow at 8. 🥛",
      );
      expect(llm.restateResults).toHaveBeenCalledWith('Remind me to buy milk tomorrow at 8am', [reminderCall]);
    });

    it('composes the reply itself when restatement fails', async () => {
      const { conversation } = await createService({ LLM_RESTATE_RESULTS: true });
      llm.converse.mockResolvedValue({ replyText: '', functionCalls: [reminderCall.request] });
      dispatcher.dispatch.mockResolvedValue([reminderCall]);
      llm.restateResults.mockRejectedValue(new Error('LLM restatement timed out after 30000ms'));

      expect(await conversation.processTurn('100', 'remind me')).toBe('Reminder set: "buy milk" on 2025-03-28 08:00.');
    });
  });

  it('serializes turns of one session and lets other sessions through', async () => {
    const { conversation } = await createService();
    const gate = deferred();
    llm.converse
      .mockImplementationOnce(async () => {
        await gate.promise;
        return { replyText: 'first', functionCalls: [] };
      })
      .mockResolvedValue({ replyText: 'later', functionCalls: [] });

    const first = conversation.processTurn('100', 'one');
    const second = conversation.processTurn('100', 'two');
    const other = conversation.processTurn('200', 'three');

    await expect(other).resolves.toBe('later');
    expect(llm.converse).toHaveBeenCalledTimes(2);
    expect(llm.converse.mock.calls.map((call) => call[0].userText)).toEqual(['one', 'three']);

    gate.resolve();
    await expect(first).resolves.toBe('first');
    await expect(second).resolves.toBe('later');
    expect(llm.converse.mock.calls[2][0].history).toEqual([
      { role: 'user', content: 'one' },
      { role: 'assistant', content: 'first' },
    ]);
  });

  it('clears a session on reset', async () => {
    const { conversation, history } = await createService();
    history.appendTurn('100', 'user', 'hi');

    await conversation.resetSession('100');

    expect(history.getRecentTurns('100')).toEqual([]);
  });
});
