import { Body, Controller, Get, Headers, HttpCode, Post, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Telegraf } from 'telegraf';
import { TelegramService } from './telegram.service';

export type TelegramUpdate = Parameters<Telegraf['handleUpdate']>[0];

@Controller('telegram')
export class TelegramController {
  constructor(
    private readonly telegramService: TelegramService,
    private readonly configService: ConfigService,
  ) {}

  @Get('health')
  health() {
    return { status: 'ok', timestamp: new Date().toISOString() };
  }

  @Post('webhook')
  @HttpCode(200)
  async webhook(@Body() update: TelegramUpdate, @Headers('x-telegram-bot-api-secret-token') secretToken?: string) {
    const expectedSecret = this.configService.get<string>('TELEGRAM_WEBHOOK_SECRET');
    if (expectedSecret && secretToken !== expectedSecret) {
      throw new UnauthorizedException('Invalid webhook secret');
    }

    await this.telegramService.getBot().handleUpdate(update);
    return { ok: true };
  }
}
