import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KeyedMutex } from '../common/concurrency';
import { describeError, errorStack } from '../common/errors';
import { FUNCTION_SCHEMAS } from '../common/function-schemas';
import { DispatchedCall, UserContext } from '../common/types';
import { LlmService } from '../llm/llm.service';
import { buildSystemPrompt } from '../llm/prompts';
import { UsersService } from '../users/users.service';
import { DispatchService } from './dispatch.service';
import { HistoryService } from './history.service';
import { NOT_UNDERSTOOD_REPLY, reconcileReply } from './reconcile';

export const APOLOGY_REPLY = 'Sorry, something went wrong on my side. Please try again in a moment.';

export type TurnState = 'RECEIVED' | 'ENRICHED' | 'DISPATCHED' | 'RECONCILED' | 'PERSISTED';

export interface TurnOutcome {
  reply: string;
  states: TurnState[];
  results: DispatchedCall[];
}

/**
 * Per-message state machine. Turns of one session run strictly one after
 * another; turns of different sessions run concurrently.
 */
@Injectable()
export class ConversationService {
  private readonly logger = new Logger(ConversationService.name);
  private readonly sessions = new KeyedMutex();
  private readonly assistantName: string;
  private readonly restateResults: boolean;

  constructor(
    private readonly llmService: LlmService,
    private readonly dispatcher: DispatchService,
    private readonly history: HistoryService,
    private readonly users: UsersService,
    private readonly configService: ConfigService,
  ) {
    this.assistantName = this.configService.get<string>('ASSISTANT_NAME', 'Tempo');
    this.restateResults = this.configService.get<boolean>('LLM_RESTATE_RESULTS', false);
  }

  async processTurn(senderId: string, text: string): Promise<string> {
    const outcome = await this.handleTurn(senderId, text);
    return outcome.reply;
  }

  handleTurn(senderId: string, text: string, now: Date = new Date()): Promise<TurnOutcome> {
    return this.sessions.runExclusive(senderId, () => this.runTurn(senderId, text, now));
  }

  resetSession(senderId: string): Promise<void> {
    return this.sessions.runExclusive(senderId, async () => {
      this.history.clear(senderId);
      this.logger.log(`[${senderId}] History cleared`);
    });
  }

  private async runTurn(senderId: string, text: string, now: Date): Promise<TurnOutcome> {
    const states: TurnState[] = [];
    const enter = (state: TurnState) => {
      states.push(state);
      this.logger.log(`[${senderId}] ${state}`);
    };

    let results: DispatchedCall[] = [];
    let reply: string;

    enter('RECEIVED');
    try {
      if (text.trim() === '') {
        reply = NOT_UNDERSTOOD_REPLY;
      } else {
        const user = this.users.getOrCreate(senderId);
        const context: UserContext = {
          userId: user.id,
          senderId,
          workspaceLinked: this.users.isWorkspaceLinked(user),
          text,
          now,
        };

        const proposal = await this.llmService.converse({
          systemPrompt: buildSystemPrompt(now, this.assistantName),
          tools: FUNCTION_SCHEMAS,
          history: this.history.getRecentTurns(senderId),
          userText: text,
        });
        this.logger.log(`[${senderId}] Model proposed ${proposal.functionCalls.length} call(s)`);
        enter('ENRICHED');

        results = await this.dispatcher.dispatch(context, proposal.functionCalls);
        enter('DISPATCHED');

        reply = await this.reconcile(text, proposal.replyText, results);
        enter('RECONCILED');
      }
    } catch (error) {
      this.logger.error(`[${senderId}] Turn failed: ${describeError(error)}`, errorStack(error));
      reply = APOLOGY_REPLY;
    }

    this.history.appendTurn(senderId, 'user', text);
    this.history.appendTurn(senderId, 'assistant', reply);
    enter('PERSISTED');

    return { reply, states, results };
  }

  private async reconcile(userText: string, llmText: string, results: DispatchedCall[]): Promise<string> {
    if (this.restateResults && llmText.trim() === '' && results.length > 0) {
      try {
        const restated = await this.llmService.restateResults(userText, results);
        if (restated !== '') {
          return restated;
        }
      } catch (error) {
        this.logger.warn(`Restatement failed, composing the reply from results: ${describeError(error)}`);
      }
    }
    return reconcileReply(llmText, results);
  }
}
