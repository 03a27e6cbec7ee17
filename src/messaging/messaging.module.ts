import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import { MESSENGER } from '../common/messenger';
import { TELEGRAF_BOT } from './messaging.constants';
import { TelegramMessenger } from './telegram.messenger';

@Module({
  providers: [
    {
      provide: TELEGRAF_BOT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const botToken = configService.get<string>('TELEGRAM_BOT_TOKEN');
        if (!botToken) {
          throw new Error('TELEGRAM_BOT_TOKEN is required');
        }
        return new Telegraf(botToken);
      },
    },
    TelegramMessenger,
    { provide: MESSENGER, useExisting: TelegramMessenger },
  ],
  exports: [TELEGRAF_BOT, MESSENGER],
})
export class MessagingModule {}
