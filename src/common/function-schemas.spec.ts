import { FUNCTION_ARGS, FUNCTION_DESCRIPTORS, FUNCTION_SCHEMAS, getDescriptor, validateFunctionCall } from './function-schemas';

describe('function schemas', () => {
  it('describes every operation exactly once', () => {
    const names = FUNCTION_DESCRIPTORS.map((descriptor) => descriptor.name);

    expect(new Set(names).size).toBe(names.length);
    expect(names.sort()).toEqual(Object.keys(FUNCTION_ARGS).sort());
  });

  it('derives required and optional parameters from the argument contracts', () => {
    const setReminder = FUNCTION_SCHEMAS.find((schema) => schema.name === 'setReminder');
    const scheduleEvent = FUNCTION_SCHEMAS.find((schema) => schema.name === 'scheduleEvent');
    const getReminder = FUNCTION_SCHEMAS.find((schema) => schema.name === 'getReminder');

    expect(setReminder?.parameters.required).toEqual(['message', 'time', 'date']);
    expect(setReminder?.parameters.properties.repeat.type).toBe('string');
    expect(scheduleEvent?.parameters.required).toEqual(['title', 'date', 'time']);
    expect(scheduleEvent?.parameters.properties.participants).toEqual({
      type: 'array',
      items: { type: 'string' },
      description: 'Names of other attendees',
    });
    expect(getReminder?.parameters.required).toEqual([]);
  });

  it('maps records to objects', () => {
    const addRow = FUNCTION_SCHEMAS.find((schema) => schema.name === 'addExternalTableRow');

    expect(addRow?.parameters.properties.row_data.type).toBe('object');
    expect(addRow?.parameters.properties.row_data.additionalProperties).toEqual({
      anyOf: [{ type: 'string' }, { type: 'number' }, { type: 'boolean' }],
    });
  });

  it('flags workspace operations', () => {
    expect(getDescriptor('createExternalNote').requiresWorkspace).toBe(true);
    expect(getDescriptor('addExternalTableRow').requiresWorkspace).toBe(true);
    expect(getDescriptor('setReminder').requiresWorkspace).toBeUndefined();
  });
});

describe('validateFunctionCall', () => {
  it('accepts a complete call', () => {
    expect(validateFunctionCall('setReminder', { message: 'buy milk', date: '2025-03-28', time: '08:00' })).toBeNull();
  });

  it('rejects an unknown function', () => {
    expect(validateFunctionCall('deleteEverything', {})).toBe('Unknown function "deleteEverything".');
  });

  it('does not treat inherited properties as functions', () => {
    expect(validateFunctionCall('toString', {})).toBe('Unknown function "toString".');
  });

  it('names the missing required arguments', () => {
    expect(validateFunctionCall('setReminder', { message: 'buy milk', date: '' })).toBe(
      'setReminder is missing required arguments: time, date.',
    );
    expect(validateFunctionCall('cancelEvent', {})).toBe('cancelEvent is missing required argument: event_title.');
  });

  it('reports arguments of the wrong type', () => {
    expect(validateFunctionCall('scheduleEvent', { title: 'Lunch', date: '2025-03-26', time: '13:00', participants: 'Sarah' })).toBe(
      'Invalid arguments for scheduleEvent: participants expected array, received string.',
    );
  });
});
