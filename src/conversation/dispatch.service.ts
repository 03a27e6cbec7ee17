import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AccountLinkService } from '../auth/account-link.service';
import { CalendarService } from '../calendar/calendar.service';
import {
  PreconditionError,
  UpstreamTimeoutError,
  ValidationError,
  describeError,
  errorStack,
} from '../common/errors';
import { FUNCTION_ARGS, FunctionName, getDescriptor, isFunctionName, validateFunctionCall } from '../common/function-schemas';
import { DispatchedCall, FunctionArgs, FunctionCallRequest, FunctionCallResult, UserContext, failure } from '../common/types';
import { withTimeout } from '../common/with-timeout';
import { ReminderService } from '../reminders/reminder.service';
import { UsersService } from '../users/users.service';
import { WorkspaceService } from '../workspace/workspace.service';
import { enrichRequest } from './enrichment';

export const WORKSPACE_LINK_REQUIRED =
  "You'll need to connect your Notion workspace first. I've sent you a link to do that; once it's connected, just ask me again.";

/**
 * Runs the model's proposed calls one at a time, in order. A failing call
 * yields an error result and the batch continues; a missing workspace link
 * stops the batch.
 */
@Injectable()
export class DispatchService {
  private readonly logger = new Logger(DispatchService.name);
  private readonly timeoutMs: number;

  constructor(
    private readonly reminderService: ReminderService,
    private readonly calendarService: CalendarService,
    private readonly workspaceService: WorkspaceService,
    private readonly users: UsersService,
    private readonly accountLinks: AccountLinkService,
    private readonly configService: ConfigService,
  ) {
    this.timeoutMs = this.configService.get<number>('SERVICE_TIMEOUT_MS', 15000);
  }

  async dispatch(context: UserContext, requests: FunctionCallRequest[]): Promise<DispatchedCall[]> {
    const dispatched: DispatchedCall[] = [];

    for (const proposed of requests) {
      if (!isFunctionName(proposed.name)) {
        this.logger.warn(`[${context.senderId}] Rejected unknown function ${proposed.name}`);
        dispatched.push({
          request: proposed,
          result: failure(`I can't do "${proposed.name}"; that isn't something I know how to do.`, { error_type: 'validation' }),
        });
        continue;
      }

      const { request, filled } = enrichRequest(proposed, context.text, context.now);
      if (filled.length > 0) {
        this.logger.log(`[${context.senderId}] ${request.name}: filled ${filled.join(', ')} from the message`);
      }

      try {
        this.checkPreconditions(context, proposed.name);
        this.validate(request);
        const result = await withTimeout(this.invoke(context, proposed.name, request.args), this.timeoutMs, request.name);
        this.logger.log(`[${context.senderId}] ${request.name} → ${result.status}`);
        dispatched.push({ request, result });
      } catch (error) {
        if (error instanceof PreconditionError) {
          this.logger.warn(`[${context.senderId}] ${request.name} needs ${error.requirement}; stopping the batch`);
          dispatched.push({ request, result: failure(error.message, { error_type: 'precondition', requirement: error.requirement }) });
          await this.sendWorkspaceLink(context);
          break;
        }
        dispatched.push({ request, result: this.toFailure(context, request.name, error) });
      }
    }

    return dispatched;
  }

  private validate(request: FunctionCallRequest): void {
    const problem = validateFunctionCall(request.name, request.args);
    if (problem) {
      throw new ValidationError(problem);
    }
  }

  private checkPreconditions(context: UserContext, name: FunctionName): void {
    if (getDescriptor(name).requiresWorkspace && !context.workspaceLinked) {
      throw new PreconditionError(WORKSPACE_LINK_REQUIRED, 'workspace_link');
    }
  }

  private async invoke(context: UserContext, name: FunctionName, args: FunctionArgs): Promise<FunctionCallResult> {
    switch (name) {
      case 'setReminder':
        return this.reminderService.setReminder(context, FUNCTION_ARGS.setReminder.parse(args));
      case 'getReminder':
        return this.reminderService.getUpcomingReminders(context, FUNCTION_ARGS.getReminder.parse(args));
      case 'setRecurringReminder':
        return this.reminderService.setRecurringReminder(context, FUNCTION_ARGS.setRecurringReminder.parse(args));
      case 'getUpcomingEvents':
        return this.calendarService.getUpcomingEvents(context, FUNCTION_ARGS.getUpcomingEvents.parse(args));
      case 'scheduleEvent':
        return this.calendarService.scheduleEvent(context, FUNCTION_ARGS.scheduleEvent.parse(args));
      case 'cancelEvent':
        return this.calendarService.cancelEvent(context, FUNCTION_ARGS.cancelEvent.parse(args));
      case 'createExternalNote':
        return this.workspaceService.createNote(context, FUNCTION_ARGS.createExternalNote.parse(args));
      case 'createExternalTable':
        return this.workspaceService.createTable(context, FUNCTION_ARGS.createExternalTable.parse(args));
      case 'addExternalTableRow':
        return this.workspaceService.addTableRow(context, FUNCTION_ARGS.addExternalTableRow.parse(args));
    }
  }

  private toFailure(context: UserContext, name: string, error: unknown): FunctionCallResult {
    if (error instanceof ValidationError) {
      this.logger.warn(`[${context.senderId}] ${error.message}`);
      return failure(error.message, { error_type: 'validation' });
    }
    if (error instanceof UpstreamTimeoutError) {
      this.logger.error(`[${context.senderId}] ${error.message}`);
      return failure(`That took too long (${name}). Please try again in a moment.`, { error_type: 'timeout' });
    }
    this.logger.error(`[${context.senderId}] ${name} failed: ${describeError(error)}`, errorStack(error));
    return failure(`Something went wrong while running ${name}. Please try again.`, { error_type: 'execution' });
  }

  private async sendWorkspaceLink(context: UserContext): Promise<void> {
    try {
      await this.accountLinks.sendWorkspaceLoginLink(this.users.getOrCreate(context.senderId));
    } catch (error) {
      this.logger.error(`[${context.senderId}] Could not send the workspace login link: ${describeError(error)}`, errorStack(error));
    }
  }
}
