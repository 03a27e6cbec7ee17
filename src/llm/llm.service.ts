import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import type {
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { Semaphore } from '../common/concurrency';
import { describeError } from '../common/errors';
import { FunctionSchema } from '../common/function-schemas';
import { ConversationTurn, DispatchedCall, FunctionCallRequest, isRecord } from '../common/types';
import { withTimeout } from '../common/with-timeout';
import { OPENAI_CLIENT } from './llm.constants';
import { buildRestatePrompt } from './prompts';

export interface ConverseRequest {
  systemPrompt: string;
  tools: FunctionSchema[];
  history: ConversationTurn[];
  userText: string;
}

export interface ConverseResponse {
  replyText: string;
  functionCalls: FunctionCallRequest[];
}

@Injectable()
export class LlmService {
  private readonly logger = new Logger(LlmService.name);
  private readonly limiter: Semaphore;
  private readonly model: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly assistantName: string;

  constructor(
    @Inject(OPENAI_CLIENT) private readonly openai: OpenAI,
    private readonly configService: ConfigService,
  ) {
    this.model = this.configService.get<string>('OPENAI_MODEL', 'gpt-4o-mini');
    this.temperature = this.configService.get<number>('LLM_TEMPERATURE', 0.2);
    this.timeoutMs = this.configService.get<number>('LLM_TIMEOUT_MS', 30000);
    this.assistantName = this.configService.get<string>('ASSISTANT_NAME', 'Tempo');
    this.limiter = new Semaphore(this.configService.get<number>('LLM_MAX_CONCURRENCY', 5));
  }

  /**
   * One stateless round trip: the system prompt, the bounded history and the
   * new message go out, text and zero or more function calls come back.
   */
  async converse(request: ConverseRequest): Promise<ConverseResponse> {
    const messages: ChatCompletionMessageParam[] = [
      { role: 'system', content: request.systemPrompt },
      ...request.history.map((turn): ChatCompletionMessageParam =>
        turn.role === 'user' ? { role: 'user', content: turn.content } : { role: 'assistant', content: turn.content },
      ),
      { role: 'user', content: request.userText },
    ];

    const tools: ChatCompletionTool[] = request.tools.map((schema) => ({
      type: 'function',
      function: {
        name: schema.name,
        description: schema.description,
        parameters: schema.parameters,
      },
    }));

    const startTime = Date.now();
    const completion = await this.limiter.use(() =>
      withTimeout(
        this.openai.chat.completions.create(
          {
            model: this.model,
            messages,
            tools,
            tool_choice: 'auto',
            temperature: this.temperature,
          },
          { timeout: this.timeoutMs },
        ),
        this.timeoutMs,
        'LLM request',
      ),
    );
    this.logger.log(`🧠 LLM responded in ${Date.now() - startTime}ms`);

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new Error('No response from OpenAI');
    }

    return {
      replyText: message.content?.trim() ?? '',
      functionCalls: this.toFunctionCalls(message.tool_calls ?? []),
    };
  }

  /** Asks the model to describe dispatched results in plain language. */
  async restateResults(userText: string, calls: DispatchedCall[]): Promise<string> {
    const completion = await this.limiter.use(() =>
      withTimeout(
        this.openai.chat.completions.create(
          {
            model: this.model,
            messages: [
              { role: 'system', content: buildRestatePrompt(this.assistantName, userText, calls) },
              { role: 'user', content: 'Please reply to me based on these results.' },
            ],
            temperature: 0.7,
          },
          { timeout: this.timeoutMs },
        ),
        this.timeoutMs,
        'LLM restatement',
      ),
    );

    return completion.choices[0]?.message?.content?.trim() ?? '';
  }

  private toFunctionCalls(toolCalls: ChatCompletionMessageToolCall[]): FunctionCallRequest[] {
    const functionCalls: FunctionCallRequest[] = [];

    for (const toolCall of toolCalls) {
      if (toolCall.type !== 'function') {
        continue;
      }
      const { name, arguments: rawArguments } = toolCall.function;
      try {
        const args: unknown = JSON.parse(rawArguments || '{}');
        if (!isRecord(args)) {
          this.logger.warn(`⚠️ Dropping ${name} call: arguments are not an object`);
          continue;
        }
        functionCalls.push({ name, args });
      } catch (error) {
        this.logger.warn(`⚠️ Dropping ${name} call: unparsable arguments (${describeError(error)})`);
      }
    }

    return functionCalls;
  }
}
