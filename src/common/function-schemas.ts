import { z } from 'zod';

const dateArg = z.string().describe('Calendar date as YYYY-MM-DD');
const timeArg = z.string().describe('Time of day as HH:MM, 24-hour');
const dateRangeArg = z
  .string()
  .describe('How far ahead to look, e.g. "today", "tomorrow", "this week", "3 days" (default: a few days)')
  .optional();

/**
 * Argument contracts of every callable operation. The tool definitions sent to
 * the model and the validation of what it sends back are both derived from here.
 */
export const FUNCTION_ARGS = {
  setReminder: z.object({
    message: z.string().min(1).describe('What to remind the user about'),
    time: timeArg,
    date: dateArg,
    repeat: z
      .string()
      .describe('How often it repeats: "none", "daily", "weekly", "monthly", "weekly-monday", "every-2-days"')
      .optional(),
  }),
  getReminder: z.object({ date_range: dateRangeArg }),
  getUpcomingEvents: z.object({ date_range: dateRangeArg }),
  scheduleEvent: z.object({
    title: z.string().min(1).describe('Event title'),
    date: dateArg,
    time: timeArg,
    location: z.string().describe('Where the event takes place').optional(),
    participants: z.array(z.string()).describe('Names of other attendees').optional(),
  }),
  cancelEvent: z.object({
    event_title: z.string().min(1).describe('Title, or part of the title, of the event to cancel'),
  }),
  setRecurringReminder: z.object({
    message: z.string().min(1).describe('What to remind the user about'),
    interval: z.string().min(1).describe('How often, e.g. "every 2 hours", "every 30 minutes", "daily", "weekly"'),
    start_time: z.string().describe('First occurrence as HH:MM, 24-hour (default: now)').optional(),
  }),
  createExternalNote: z.object({
    title: z.string().min(1).describe('Page title'),
    content: z.string().describe('Page body text'),
    parent_reference: z.string().min(1).describe('Parent page id, or the exact title of an existing page'),
  }),
  createExternalTable: z.object({
    title: z.string().min(1).describe('Database title'),
    parent_reference: z.string().min(1).describe('Parent page id, or the exact title of an existing page'),
    column_schema: z
      .record(z.string())
      .describe('Column name to column type ("rich_text", "number", "checkbox", "date", "select", "url", "email")'),
  }),
  addExternalTableRow: z.object({
    table_reference: z.string().min(1).describe('Database id, or the exact title of an existing database'),
    row_data: z
      .record(z.union([z.string(), z.number(), z.boolean()]))
      .describe('Column name to value; a "Name", "Title" or "Task" key becomes the row title'),
  }),
};

export type FunctionName = keyof typeof FUNCTION_ARGS;

export type ArgsOf<N extends FunctionName> = z.infer<(typeof FUNCTION_ARGS)[N]>;

/** Which argument receives each field the temporal extractor finds. */
export interface TemporalSlots {
  date?: string;
  time?: string;
  recurrence?: string;
}

export interface FunctionDescriptor {
  name: FunctionName;
  description: string;
  temporalSlots?: TemporalSlots;
  requiresWorkspace?: boolean;
}

export const FUNCTION_DESCRIPTORS: FunctionDescriptor[] = [
  {
    name: 'setReminder',
    description: 'Set a reminder at a specific date and time, optionally repeating',
    temporalSlots: { date: 'date', time: 'time', recurrence: 'repeat' },
  },
  {
    name: 'getReminder',
    description: "List the user's upcoming reminders",
  },
  {
    name: 'getUpcomingEvents',
    description: "List the user's upcoming calendar events and reminders",
  },
  {
    name: 'scheduleEvent',
    description: 'Add a one-hour event to the calendar',
    temporalSlots: { date: 'date', time: 'time' },
  },
  {
    name: 'cancelEvent',
    description: 'Cancel the soonest upcoming event whose title contains the given text',
  },
  {
    name: 'setRecurringReminder',
    description: 'Set a reminder that repeats at a fixed interval, e.g. every 2 hours',
    temporalSlots: { time: 'start_time' },
  },
  {
    name: 'createExternalNote',
    description: "Create a note page in the user's connected Notion workspace",
    requiresWorkspace: true,
  },
  {
    name: 'createExternalTable',
    description: "Create a table (database) in the user's connected Notion workspace",
    requiresWorkspace: true,
  },
  {
    name: 'addExternalTableRow',
    description: "Add a row to a table in the user's connected Notion workspace",
    requiresWorkspace: true,
  },
];

export interface JsonSchemaProperty {
  type?: 'string' | 'number' | 'boolean' | 'array' | 'object';
  description?: string;
  items?: JsonSchemaProperty;
  additionalProperties?: JsonSchemaProperty;
  anyOf?: JsonSchemaProperty[];
}

export interface FunctionSchema {
  name: FunctionName;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, JsonSchemaProperty>;
    required: string[];
  };
}

function toJsonSchema(schema: z.ZodTypeAny): JsonSchemaProperty {
  const described = (property: JsonSchemaProperty): JsonSchemaProperty =>
    schema.description ? { ...property, description: schema.description } : property;

  if (schema instanceof z.ZodOptional) {
    return described(toJsonSchema(schema.unwrap()));
  }
  if (schema instanceof z.ZodString) {
    return described({ type: 'string' });
  }
  if (schema instanceof z.ZodNumber) {
    return described({ type: 'number' });
  }
  if (schema instanceof z.ZodBoolean) {
    return described({ type: 'boolean' });
  }
  if (schema instanceof z.ZodArray) {
    return described({ type: 'array', items: toJsonSchema(schema.element) });
  }
  if (schema instanceof z.ZodRecord) {
    return described({ type: 'object', additionalProperties: toJsonSchema(schema.valueSchema) });
  }
  if (schema instanceof z.ZodUnion) {
    const options: z.ZodTypeAny[] = schema.options;
    return described({ anyOf: options.map(toJsonSchema) });
  }
  throw new Error(`Unsupported argument type ${schema.constructor.name}`);
}

export function buildFunctionSchema(descriptor: FunctionDescriptor): FunctionSchema {
  const shape: Record<string, z.ZodTypeAny> = FUNCTION_ARGS[descriptor.name].shape;
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: string[] = [];

  for (const [key, field] of Object.entries(shape)) {
    properties[key] = toJsonSchema(field);
    if (!field.isOptional()) {
      required.push(key);
    }
  }

  return {
    name: descriptor.name,
    description: descriptor.description,
    parameters: { type: 'object', properties, required },
  };
}

export const FUNCTION_SCHEMAS: FunctionSchema[] = FUNCTION_DESCRIPTORS.map(buildFunctionSchema);

export function isFunctionName(name: string): name is FunctionName {
  return Object.prototype.hasOwnProperty.call(FUNCTION_ARGS, name);
}

export function getDescriptor(name: FunctionName): FunctionDescriptor {
  const descriptor = FUNCTION_DESCRIPTORS.find((entry) => entry.name === name);
  if (!descriptor) {
    throw new Error(`No descriptor registered for ${name}`);
  }
  return descriptor;
}

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

/** Returns a message describing why the call cannot be dispatched, or null when it can. */
export function validateFunctionCall(name: string, args: Record<string, unknown>): string | null {
  if (!isFunctionName(name)) {
    return `Unknown function "${name}".`;
  }

  const schema = buildFunctionSchema(getDescriptor(name));
  const missing = schema.parameters.required.filter((key) => isMissing(args[key]));
  if (missing.length > 0) {
    const noun = missing.length === 1 ? 'argument' : 'arguments';
    return `${name} is missing required ${noun}: ${missing.join(', ')}.`;
  }

  const parsed = FUNCTION_ARGS[name].safeParse(args);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'args'} ${issue.message.toLowerCase()}`);
    return `Invalid arguments for ${name}: ${problems.join('; ')}.`;
  }
  return null;
}
