import { Injectable, Logger } from '@nestjs/common';
import { ArgsOf } from '../common/function-schemas';
import { FunctionCallResult, UserContext, failure, success } from '../common/types';
import { ReminderService, describeWindow, serializeReminder } from '../reminders/reminder.service';
import { parseDateRange } from '../time/date-range';
import { addDays, addMinutes, combineDateAndTime, endOfDay, formatDateTime } from '../time/date-utils';
import { CalendarEvent, EventRepository } from './event.repository';

const EVENT_DURATION_MINUTES = 60;
const DEFAULT_LOOKAHEAD_DAYS = 7;

function serializeEvent(event: CalendarEvent): Record<string, unknown> {
  return {
    id: event.id,
    title: event.title,
    start: formatDateTime(event.startsAt),
    end: formatDateTime(event.endsAt),
    location: event.location ?? null,
    participants: event.participants,
  };
}

function describeEvent(event: CalendarEvent): string {
  const where = event.location ? ` (${event.location})` : '';
  return `${formatDateTime(event.startsAt)} ${event.title}${where}`;
}

@Injectable()
export class CalendarService {
  private readonly logger = new Logger(CalendarService.name);

  constructor(
    private readonly events: EventRepository,
    private readonly reminderService: ReminderService,
  ) {}

  scheduleEvent(context: UserContext, args: ArgsOf<'scheduleEvent'>): FunctionCallResult {
    const startsAt = combineDateAndTime(args.date, args.time);
    if (!startsAt) {
      return failure('Invalid date or time format. Please use YYYY-MM-DD and HH:MM.');
    }

    const participants = args.participants ?? [];
    const event = this.events.create(
      {
        userId: context.userId,
        title: args.title,
        startsAt,
        endsAt: addMinutes(startsAt, EVENT_DURATION_MINUTES),
        location: args.location,
        participants,
      },
      context.now,
    );
    this.logger.log(`📅 Event ${event.id} "${event.title}" for ${context.userId} at ${formatDateTime(startsAt)}`);

    const where = args.location ? ` at ${args.location}` : '';
    const who = participants.length > 0 ? ` with ${participants.join(', ')}` : '';
    return success(`Event "${args.title}" scheduled for ${formatDateTime(startsAt)}${where}${who}.`, {
      event: serializeEvent(event),
    });
  }

  getUpcomingEvents(context: UserContext, args: ArgsOf<'getUpcomingEvents'>): FunctionCallResult {
    const days = parseDateRange(args.date_range, DEFAULT_LOOKAHEAD_DAYS);
    const until = endOfDay(addDays(context.now, days));
    const events = this.events.findActiveBetween(context.userId, context.now, until);
    const reminders = this.reminderService.findUpcoming(context.userId, context.now, days);
    const payload = { days, events: events.map(serializeEvent), reminders: reminders.map(serializeReminder) };

    if (events.length === 0 && reminders.length === 0) {
      return success(`Nothing scheduled for ${describeWindow(days)}.`, payload);
    }

    const sections: string[] = [];
    if (events.length > 0) {
      sections.push(`📅 Events:\n${events.map((event) => `• ${describeEvent(event)}`).join('\n')}`);
    }
    if (reminders.length > 0) {
      sections.push(
        `⏰ Reminders:\n${reminders.map((reminder) => `• ${formatDateTime(reminder.scheduledAt)} ${reminder.message}`).join('\n')}`,
      );
    }
    return success(`Here's what's coming up for ${describeWindow(days)}:\n\n${sections.join('\n\n')}`, payload);
  }

  cancelEvent(context: UserContext, args: ArgsOf<'cancelEvent'>): FunctionCallResult {
    const needle = args.event_title.trim().toLowerCase();
    const match = this.events.findActive(context.userId).find((event) => event.title.toLowerCase().includes(needle));
    if (!match) {
      return failure(`Event '${args.event_title}' not found.`);
    }

    match.active = false;
    this.events.save(match);
    this.logger.log(`🗑️ Event ${match.id} cancelled for ${context.userId}`);

    return success(`Event "${match.title}" on ${formatDateTime(match.startsAt)} cancelled.`, { event: serializeEvent(match) });
  }
}
