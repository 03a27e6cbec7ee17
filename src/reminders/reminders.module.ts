import { Module } from '@nestjs/common';
import { MessagingModule } from '../messaging/messaging.module';
import { ReminderRepository } from './reminder.repository';
import { ReminderSchedulerService } from './reminder-scheduler.service';
import { ReminderService } from './reminder.service';

@Module({
  imports: [MessagingModule],
  providers: [ReminderRepository, ReminderService, ReminderSchedulerService],
  exports: [ReminderService],
})
export class RemindersModule {}
