import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { describeError, errorStack } from '../common/errors';
import { MESSENGER, Messenger } from '../common/messenger';
import { ReminderService } from './reminder.service';

@Injectable()
export class ReminderSchedulerService {
  private readonly logger = new Logger(ReminderSchedulerService.name);

  constructor(
    private readonly reminderService: ReminderService,
    @Inject(MESSENGER) private readonly messenger: Messenger,
  ) {}

  @Cron(CronExpression.EVERY_MINUTE)
  async deliverDueReminders(now: Date = new Date()): Promise<number> {
    const due = this.reminderService.processDueReminders(now);
    if (due.length === 0) {
      return 0;
    }

    this.logger.log(`🔔 Delivering ${due.length} due reminder(s)`);
    let delivered = 0;
    for (const notification of due) {
      try {
        await this.messenger.sendMessage(notification.chatId, notification.text);
        delivered++;
      } catch (error) {
        this.logger.error(
          `Failed to deliver reminder ${notification.reminderId}: ${describeError(error)}`,
          errorStack(error),
        );
      }
    }
    return delivered;
  }
}
