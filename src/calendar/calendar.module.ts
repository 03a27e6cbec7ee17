import { Module } from '@nestjs/common';
import { RemindersModule } from '../reminders/reminders.module';
import { CalendarService } from './calendar.service';
import { EventRepository } from './event.repository';

@Module({
  imports: [RemindersModule],
  providers: [CalendarService, EventRepository],
  exports: [CalendarService],
})
export class CalendarModule {}
