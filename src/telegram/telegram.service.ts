import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import { describeError, errorStack } from '../common/errors';
import { AccountLinkService } from '../auth/account-link.service';
import { APOLOGY_REPLY, ConversationService } from '../conversation/conversation.service';
import { TELEGRAF_BOT } from '../messaging/messaging.constants';

export const WELCOME_TEXT =
  '🤖 Hi! I can keep track of reminders and events for you, and save notes to Notion.\n\n' +
  'Just write to me like you would to a friend:\n' +
  '• "Remind me to buy milk tomorrow at 8am"\n' +
  '• "Lunch with Sarah next Wed at 1pm"\n' +
  '• "Drink water every 2 hours"\n\n' +
  'Type /help for more.';

export const HELP_TEXT =
  '📝 Commands:\n\n' +
  '/start - Get started\n' +
  '/help - Show this message\n' +
  '/login - Connect Notion or sign in with Google\n' +
  '/reset - Forget our conversation so far\n\n' +
  '💬 Things you can ask:\n' +
  '• "What do I have this week?"\n' +
  '• "Cancel the dentist appointment"\n' +
  '• "Water the plants every Monday at 9am"\n' +
  '• "Save a note called Ideas under Projects"';

export const AUTH_SUCCESS_TEXT = '✅ Google account connected! What can I do for you?';
export const RESET_TEXT = '🧹 Done, I have forgotten our conversation.';
export const LOGIN_UNAVAILABLE_TEXT = "Sign-in isn't set up on this server yet.";

export interface ChatReplies {
  sendTyping(): Promise<unknown>;
  reply(text: string): Promise<unknown>;
}

@Injectable()
export class TelegramService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TelegramService.name);
  private polling = false;

  constructor(
    @Inject(TELEGRAF_BOT) private readonly bot: Telegraf,
    private readonly configService: ConfigService,
    private readonly conversation: ConversationService,
    private readonly accountLinks: AccountLinkService,
  ) {
    this.setupHandlers();
  }

  onModuleInit() {
    if (!this.configService.get<boolean>('TELEGRAM_USE_POLLING', false)) {
      this.logger.log('Webhook mode, waiting for updates on POST /telegram/webhook');
      return;
    }

    this.polling = true;
    this.bot.launch().catch((error: unknown) => {
      this.polling = false;
      this.logger.warn(`Failed to launch Telegram bot: ${describeError(error)}`);
      this.logger.log('HTTP endpoints are still available');
    });
    this.logger.log('🚀 Telegram bot polling started');
  }

  onModuleDestroy() {
    if (this.polling) {
      this.polling = false;
      this.bot.stop('shutdown');
    }
  }

  getBot(): Telegraf {
    return this.bot;
  }

  startReply(payload: string): string {
    return payload === 'auth_success' ? AUTH_SUCCESS_TEXT : WELCOME_TEXT;
  }

  loginReply(chatId: string): string {
    const links: string[] = [];

    const workspaceUrl = this.accountLinks.workspaceLoginUrl(chatId);
    if (workspaceUrl) {
      links.push(`📒 Connect Notion:\n${workspaceUrl}`);
    }
    const googleUrl = this.accountLinks.googleLoginUrl(chatId);
    if (googleUrl) {
      links.push(`🔐 Sign in with Google:\n${googleUrl}`);
    }

    return links.length > 0 ? links.join('\n\n') : LOGIN_UNAVAILABLE_TEXT;
  }

  async resetReply(chatId: string): Promise<string> {
    await this.conversation.resetSession(chatId);
    return RESET_TEXT;
  }

  /** Reply for a plain text message, or null for commands this bot does not know. */
  async textReply(chatId: string, text: string): Promise<string | null> {
    if (text.startsWith('/')) {
      return null;
    }

    this.logger.log(`📨 New message from ${chatId}`);
    try {
      return await this.conversation.processTurn(chatId, text);
    } catch (error) {
      this.logger.error(`Failed to handle message from ${chatId}: ${describeError(error)}`, errorStack(error));
      return APOLOGY_REPLY;
    }
  }

  async answerText(chatId: string, text: string, chat: ChatReplies): Promise<void> {
    try {
      await chat.sendTyping();
    } catch (error) {
      this.logger.warn(`Typing indicator failed for ${chatId}: ${describeError(error)}`);
    }

    const reply = await this.textReply(chatId, text);
    if (reply !== null) {
      await chat.reply(reply);
    }
  }

  private setupHandlers() {
    this.bot.start(async (ctx) => {
      await ctx.reply(this.startReply(ctx.payload));
    });

    this.bot.help(async (ctx) => {
      await ctx.reply(HELP_TEXT);
    });

    this.bot.command('login', async (ctx) => {
      await ctx.reply(this.loginReply(ctx.chat.id.toString()), { link_preview_options: { is_disabled: true } });
    });

    this.bot.command('reset', async (ctx) => {
      await ctx.reply(await this.resetReply(ctx.chat.id.toString()));
    });

    this.bot.on('text', async (ctx) => {
      await this.answerText(ctx.chat.id.toString(), ctx.message.text, {
        sendTyping: () => ctx.sendChatAction('typing'),
        reply: (text) => ctx.reply(text, { link_preview_options: { is_disabled: true } }),
      });
    });

    this.bot.catch((error, ctx) => {
      this.logger.error(`Update ${ctx.update.update_id} failed: ${describeError(error)}`, errorStack(error));
    });
  }
}
