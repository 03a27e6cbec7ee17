import { Injectable, Logger } from '@nestjs/common';
import { ArgsOf } from '../common/function-schemas';
import { FrequencyClass, FunctionCallResult, RecurrenceSpec, UserContext, failure, success } from '../common/types';
import { parseDateRange } from '../time/date-range';
import { addDays, combineDateAndTime, endOfDay, formatDateTime, parseClockTime } from '../time/date-utils';
import { describeRecurrence, normalizeInterval, recurrenceFromToken } from '../time/recurrence-normalizer';
import { Reminder, ReminderRepository } from './reminder.repository';

export interface DueNotification {
  reminderId: string;
  chatId: string;
  text: string;
}

const DEFAULT_LOOKAHEAD_DAYS = 3;

const RECURRENCE_DAYS: Partial<Record<FrequencyClass, number>> = {
  [FrequencyClass.DAILY]: 1,
  [FrequencyClass.WEEKLY]: 7,
  [FrequencyClass.MONTHLY]: 30,
};

/** First occurrence strictly after `now`, skipping every missed one in a single step. */
export function occurrenceAfter(scheduledAt: Date, recurrence: RecurrenceSpec, now: Date): Date {
  if (scheduledAt > now || recurrence.frequencyClass === FrequencyClass.NONE) {
    return scheduledAt;
  }
  const elapsed = now.getTime() - scheduledAt.getTime();

  const days = RECURRENCE_DAYS[recurrence.frequencyClass];
  if (days === undefined) {
    const step = Math.max(recurrence.intervalMinutes, 1) * 60 * 1000;
    return new Date(scheduledAt.getTime() + (Math.floor(elapsed / step) + 1) * step);
  }

  // Whole calendar days keep the wall-clock time; a DST shift can put the estimate one step off.
  let steps = Math.max(Math.floor(elapsed / (days * 24 * 60 * 60 * 1000)), 1);
  while (steps > 1 && addDays(scheduledAt, (steps - 1) * days) > now) {
    steps--;
  }
  while (addDays(scheduledAt, steps * days) <= now) {
    steps++;
  }
  return addDays(scheduledAt, steps * days);
}

export function describeWindow(days: number): string {
  if (days === 0) {
    return 'today';
  }
  if (days === 1) {
    return 'today or tomorrow';
  }
  return `the next ${days} days`;
}

export function serializeReminder(reminder: Reminder): Record<string, unknown> {
  return {
    id: reminder.id,
    message: reminder.message,
    scheduledAt: formatDateTime(reminder.scheduledAt),
    repeat: describeRecurrence(reminder.recurrence),
  };
}

@Injectable()
export class ReminderService {
  private readonly logger = new Logger(ReminderService.name);

  constructor(private readonly repository: ReminderRepository) {}

  setReminder(context: UserContext, args: ArgsOf<'setReminder'>): FunctionCallResult {
    const scheduledAt = combineDateAndTime(args.date, args.time);
    if (!scheduledAt) {
      return failure('Invalid date or time format. Please use YYYY-MM-DD and HH:MM.');
    }

    const recurrence = recurrenceFromToken(args.repeat);
    const reminder = this.repository.create(
      { userId: context.userId, chatId: context.senderId, message: args.message, scheduledAt, recurrence },
      context.now,
    );
    this.logger.log(`⏰ Reminder ${reminder.id} for ${context.userId} at ${formatDateTime(scheduledAt)}`);

    const repeat = recurrence.frequencyClass === FrequencyClass.NONE ? '' : `, repeating ${describeRecurrence(recurrence)}`;
    return success(`Reminder set: "${args.message}" on ${formatDateTime(scheduledAt)}${repeat}.`, {
      reminder: serializeReminder(reminder),
    });
  }

  setRecurringReminder(context: UserContext, args: ArgsOf<'setRecurringReminder'>): FunctionCallResult {
    const recurrence = normalizeInterval(args.interval);
    const scheduledAt = this.resolveStart(args.start_time, context.now);

    const reminder = this.repository.create(
      { userId: context.userId, chatId: context.senderId, message: args.message, scheduledAt, recurrence },
      context.now,
    );
    this.logger.log(`🔁 Recurring reminder ${reminder.id} for ${context.userId} ${describeRecurrence(recurrence)}`);

    return success(
      `Recurring reminder set: "${args.message}" ${describeRecurrence(recurrence)}, starting ${formatDateTime(scheduledAt)}.`,
      { reminder: serializeReminder(reminder) },
    );
  }

  getUpcomingReminders(context: UserContext, args: ArgsOf<'getReminder'>): FunctionCallResult {
    const days = parseDateRange(args.date_range, DEFAULT_LOOKAHEAD_DAYS);
    const reminders = this.findUpcoming(context.userId, context.now, days);
    const payload = { days, reminders: reminders.map(serializeReminder) };

    if (reminders.length === 0) {
      return success(`You have no reminders for ${describeWindow(days)}.`, payload);
    }

    const lines = reminders.map((reminder) => `• ${formatDateTime(reminder.scheduledAt)} ${reminder.message}`);
    return success(`Your reminders for ${describeWindow(days)}:\n${lines.join('\n')}`, payload);
  }

  findUpcoming(userId: string, now: Date, days: number): Reminder[] {
    return this.repository.findActiveBetween(userId, now, endOfDay(addDays(now, days)));
  }

  /**
   * Collects every reminder due at `now`. Repeating reminders move to their
   * next occurrence after `now`; one-time reminders are deactivated.
   */
  processDueReminders(now: Date): DueNotification[] {
    const notifications: DueNotification[] = [];

    for (const reminder of this.repository.findDue(now)) {
      notifications.push({ reminderId: reminder.id, chatId: reminder.chatId, text: `REMINDER: ${reminder.message}` });

      if (reminder.recurrence.frequencyClass === FrequencyClass.NONE) {
        reminder.active = false;
      } else {
        reminder.scheduledAt = occurrenceAfter(reminder.scheduledAt, reminder.recurrence, now);
      }
      this.repository.save(reminder);
    }

    return notifications;
  }

  private resolveStart(startTime: string | undefined, now: Date): Date {
    const clock = startTime ? parseClockTime(startTime) : null;
    if (!clock) {
      return now;
    }
    const start = new Date(now.getFullYear(), now.getMonth(), now.getDate(), clock.hour, clock.minute);
    return start < now ? addDays(start, 1) : start;
  }
}
