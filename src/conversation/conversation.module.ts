import { Module } from '@nestjs/common';
import { AuthModule } from '../auth/auth.module';
import { CalendarModule } from '../calendar/calendar.module';
import { LlmModule } from '../llm/llm.module';
import { RemindersModule } from '../reminders/reminders.module';
import { UsersModule } from '../users/users.module';
import { WorkspaceModule } from '../workspace/workspace.module';
import { ConversationService } from './conversation.service';
import { DispatchService } from './dispatch.service';
import { HistoryService } from './history.service';

@Module({
  imports: [LlmModule, RemindersModule, CalendarModule, WorkspaceModule, UsersModule, AuthModule],
  providers: [HistoryService, DispatchService, ConversationService],
  exports: [ConversationService],
})
export class ConversationModule {}
