import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { RecurrenceSpec } from '../common/types';

export interface Reminder {
  id: string;
  userId: string;
  chatId: string;
  message: string;
  scheduledAt: Date;
  recurrence: RecurrenceSpec;
  active: boolean;
  createdAt: Date;
}

export type NewReminder = Omit<Reminder, 'id' | 'active' | 'createdAt'>;

@Injectable()
export class ReminderRepository {
  private reminders: Map<string, Reminder> = new Map();

  create(input: NewReminder, now: Date = new Date()): Reminder {
    const reminder: Reminder = { ...input, id: randomUUID(), active: true, createdAt: now };
    this.reminders.set(reminder.id, reminder);
    return reminder;
  }

  save(reminder: Reminder): void {
    this.reminders.set(reminder.id, reminder);
  }

  /** Active reminders of one user scheduled in `[from, to]`, soonest first. */
  findActiveBetween(userId: string, from: Date, to: Date): Reminder[] {
    return this.sorted(
      [...this.reminders.values()].filter(
        (reminder) => reminder.active && reminder.userId === userId && reminder.scheduledAt >= from && reminder.scheduledAt <= to,
      ),
    );
  }

  findDue(now: Date): Reminder[] {
    return this.sorted([...this.reminders.values()].filter((reminder) => reminder.active && reminder.scheduledAt <= now));
  }

  private sorted(reminders: Reminder[]): Reminder[] {
    return reminders.sort((a, b) => a.scheduledAt.getTime() - b.scheduledAt.getTime());
  }
}
