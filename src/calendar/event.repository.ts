import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';

export interface CalendarEvent {
  id: string;
  userId: string;
  title: string;
  startsAt: Date;
  endsAt: Date;
  location?: string;
  participants: string[];
  active: boolean;
  createdAt: Date;
}

export type NewCalendarEvent = Omit<CalendarEvent, 'id' | 'active' | 'createdAt'>;

@Injectable()
export class EventRepository {
  private events: Map<string, CalendarEvent> = new Map();

  create(input: NewCalendarEvent, now: Date = new Date()): CalendarEvent {
    const event: CalendarEvent = { ...input, id: randomUUID(), active: true, createdAt: now };
    this.events.set(event.id, event);
    return event;
  }

  save(event: CalendarEvent): void {
    this.events.set(event.id, event);
  }

  findActive(userId: string): CalendarEvent[] {
    return [...this.events.values()]
      .filter((event) => event.active && event.userId === userId)
      .sort((a, b) => a.startsAt.getTime() - b.startsAt.getTime());
  }

  findActiveBetween(userId: string, from: Date, to: Date): CalendarEvent[] {
    return this.findActive(userId).filter((event) => event.startsAt >= from && event.startsAt <= to);
  }
}
