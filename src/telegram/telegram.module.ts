import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { ConversationModule } from '../conversation/conversation.module';
import { MessagingModule } from '../messaging/messaging.module';
import { TelegramController } from './telegram.controller';
import { TelegramService } from './telegram.service';

@Module({
  imports: [ConversationModule, MessagingModule, AuthModule],
  providers: [TelegramService],
  controllers: [TelegramController],
})
export class TelegramModule {}
