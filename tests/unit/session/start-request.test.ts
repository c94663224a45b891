import { describe, it, expect } from 'vitest';
import { parseLocalDate, parseStartRequest } from '../../../src/session/start-request.js';
import { ValidationError } from '../../../src/shared/errors.js';
import { startRequestBody } from '../../fixtures/start-request.js';
import type { JsonObject } from '../../../src/backend/store.js';

function withServerData(changes: JsonObject): JsonObject {
  const body = startRequestBody({ startDate: 1_700_000_000, slotLength: 120 });
  const serverData = body.server_initial_data;
  if (typeof serverData !== 'object' || serverData === null || Array.isArray(serverData)) {
    throw new Error('fixture without server_initial_data');
  }
  const merged: JsonObject = { ...serverData, ...changes };
  for (const [key, value] of Object.entries(changes)) {
    if (value === null) delete merged[key];
  }
  return { ...body, server_initial_data: merged };
}

describe('parseStartRequest', () => {
  it('parses a scheduler payload', () => {
    const request = parseStartRequest(startRequestBody({ startDate: 1_700_000_000, slotLength: 120 }));

    expect(request.back).toBe('http://scheduler.test/back');
    expect(request.clientData).toEqual({ mode: 'demo' });
    expect(request.startDate).toBe(1_700_000_000);
    expect(request.slotLength).toBe(120);
    expect(request.maxDate).toBe(1_700_000_120);
    expect(request.username).toBe('jdoe');
    expect(request.usernameUnique).toBe('jdoe@campus');
    expect(request.fullName).toBe('Jane Doe');
    expect(request.locale).toBe('es');
    expect(request.experimentName).toBe('robot');
    expect(request.categoryName).toBe('robotics');
    expect(request.experimentId).toBe('robot@robotics');
  });

  it('accepts numbers sent as strings', () => {
    const request = parseStartRequest(
      withServerData({ 'priority.queue.slot.length': '90', 'priority.queue.slot.start.timestamp': '1700000000.5' }),
    );
    expect(request.slotLength).toBe(90);
    expect(request.maxDate).toBe(1_700_000_090.5);
  });

  it('falls back to the local start date without a timestamp', () => {
    const request = parseStartRequest(
      withServerData({
        'priority.queue.slot.start.timestamp': '',
        'priority.queue.slot.start': '2026-03-02 10:15:30.250000',
      }),
    );
    expect(request.startDate).toBe(new Date(2026, 2, 2, 10, 15, 30).getTime() / 1000 + 0.25);
  });

  it('leaves the locale empty when absent', () => {
    expect(parseStartRequest(withServerData({ 'request.locale': null })).locale).toBeNull();
  });

  it('rejects bodies that are not objects', () => {
    expect(() => parseStartRequest([])).toThrow('Request body must be a JSON object');
    expect(() => parseStartRequest('x')).toThrow(ValidationError);
  });

  it('requires the client data, server data and back URL', () => {
    const body = startRequestBody();
    expect(() => parseStartRequest({ ...body, client_initial_data: 'x' })).toThrow('Missing client_initial_data');
    expect(() => parseStartRequest({ ...body, server_initial_data: null })).toThrow('Missing server_initial_data');
    expect(() => parseStartRequest({ ...body, back: 3 })).toThrow('Missing back');
  });

  it('names the missing server field', () => {
    expect(() => parseStartRequest(withServerData({ 'request.username': null }))).toThrow(
      'Missing or invalid request.username in server_initial_data',
    );
    expect(() => parseStartRequest(withServerData({ 'priority.queue.slot.length': 'long' }))).toThrow(
      'Missing or invalid priority.queue.slot.length in server_initial_data',
    );
  });
});

describe('parseLocalDate', () => {
  it('reads whole seconds', () => {
    expect(parseLocalDate('2026-01-31 23:59:59')).toBe(new Date(2026, 0, 31, 23, 59, 59).getTime() / 1000);
  });

  it('rejects other formats', () => {
    expect(() => parseLocalDate('yesterday')).toThrow('Invalid priority.queue.slot.start: "yesterday"');
  });
});
