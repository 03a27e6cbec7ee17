import { Inject, Injectable } from '@nestjs/common';
import { Telegraf } from 'telegraf';
import { Messenger } from '../common/messenger';
import { TELEGRAF_BOT } from './messaging.constants';

@Injectable()
export class TelegramMessenger implements Messenger {
  constructor(@Inject(TELEGRAF_BOT) readonly bot: Telegraf) {}

  async sendMessage(chatId: string, text: string): Promise<void> {
    await this.bot.telegram.sendMessage(chatId, text, { link_preview_options: { is_disabled: true } });
  }
}
