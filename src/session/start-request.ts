import { ValidationError } from '../shared/errors.js';
import { isJsonObject } from '../backend/store.js';
import type { JsonObject, JsonValue } from '../backend/store.js';

/** A slot assignment from the scheduler, parsed and checked. */
export interface StartRequest {
  back: string;
  clientData: JsonObject;
  serverData: JsonObject;
  /** Epoch seconds. */
  startDate: number;
  slotLength: number;
  maxDate: number;
  username: string;
  usernameUnique: string;
  fullName: string;
  locale: string | null;
  experimentName: string;
  categoryName: string;
  experimentId: string;
}

function requireString(data: JsonObject, key: string): string {
  const value: JsonValue | undefined = data[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`Missing or invalid ${key} in server_initial_data`);
  }
  return value;
}

function requireNumber(data: JsonObject, key: string): number {
  const value: JsonValue | undefined = data[key];
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new ValidationError(`Missing or invalid ${key} in server_initial_data`);
  }
  return parsed;
}

const LOCAL_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))?$/;

/** `YYYY-MM-DD HH:MM:SS.ffffff` in the server's local time zone, to epoch seconds. */
export function parseLocalDate(raw: string): number {
  const match = LOCAL_DATE_PATTERN.exec(raw.trim());
  if (!match) {
    throw new ValidationError(`Invalid priority.queue.slot.start: ${JSON.stringify(raw)}`);
  }

  const [, year, month, day, hours, minutes, seconds, fraction = '0'] = match;
  const date = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds),
  );
  const microseconds = Number(fraction.padEnd(6, '0'));
  return date.getTime() / 1000 + microseconds / 1_000_000;
}

function parseStartDate(serverData: JsonObject): number {
  const timestamp = serverData['priority.queue.slot.start.timestamp'];
  if (timestamp !== undefined && timestamp !== null && timestamp !== '') {
    return requireNumber(serverData, 'priority.queue.slot.start.timestamp');
  }
  return parseLocalDate(requireString(serverData, 'priority.queue.slot.start'));
}

export function parseStartRequest(body: unknown): StartRequest {
  if (!isJsonObject(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const clientData = body.client_initial_data;
  const serverData = body.server_initial_data;
  const back = body.back;
  if (!isJsonObject(clientData)) throw new ValidationError('Missing client_initial_data');
  if (!isJsonObject(serverData)) throw new ValidationError('Missing server_initial_data');
  if (typeof back !== 'string') throw new ValidationError('Missing back');

  const startDate = parseStartDate(serverData);
  const slotLength = requireNumber(serverData, 'priority.queue.slot.length');
  const experimentName = requireString(serverData, 'request.experiment_id.experiment_name');
  const categoryName = requireString(serverData, 'request.experiment_id.category_name');
  const locale = serverData['request.locale'];

  return {
    back,
    clientData,
    serverData,
    startDate,
    slotLength,
    maxDate: startDate + slotLength,
    username: requireString(serverData, 'request.username'),
    usernameUnique: requireString(serverData, 'request.username.unique'),
    fullName: requireString(serverData, 'request.full_name'),
    locale: typeof locale === 'string' ? locale : null,
    experimentName,
    categoryName,
    experimentId: `${experimentName}@${categoryName}`,
  };
}
