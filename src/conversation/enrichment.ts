import { getDescriptor, isFunctionName } from '../common/function-schemas';
import { FunctionArgs, FunctionCallRequest, TemporalExtractionResult } from '../common/types';
import { extractTemporal } from '../time/temporal-extractor';

export interface EnrichmentOutcome {
  request: FunctionCallRequest;
  filled: string[];
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

function enrichmentText(args: FunctionArgs, userText: string): string {
  return [args.message, args.title, userText].filter((part): part is string => typeof part === 'string').join(' ');
}

/**
 * Fills the date, time and recurrence arguments of time-sensitive calls from
 * the temporal extractor. Values the model supplied are never replaced.
 */
export function enrichRequest(request: FunctionCallRequest, userText: string, now: Date): EnrichmentOutcome {
  if (!isFunctionName(request.name)) {
    return { request, filled: [] };
  }
  const slots = getDescriptor(request.name).temporalSlots;
  if (!slots) {
    return { request, filled: [] };
  }

  const found: TemporalExtractionResult = extractTemporal(enrichmentText(request.args, userText), now);
  const args: FunctionArgs = { ...request.args };
  const filled: string[] = [];

  const fields: Array<keyof TemporalExtractionResult> = ['date', 'time', 'recurrence'];
  for (const field of fields) {
    const slot = slots[field];
    const value = found[field];
    if (slot && value !== null && isBlank(args[slot])) {
      args[slot] = value;
      filled.push(slot);
    }
  }

  return { request: { name: request.name, args }, filled };
}
