import { TextDecoder } from 'util';
import { DecodeError } from './errors.js';
import type { JsonValue, Reading } from './types.js';

const DEVICE_CAPTURE = '{deviceId}';
const ENVELOPE_VERSION = 1;
// Trailing `DATE:YYYY-MM-DD,HH:MM:SS` of the key/value line format
const KV_DATE = /(?:^|,)DATE:(\d{4}-\d{2}-\d{2}),(\d{2}:\d{2}:\d{2})\s*$/;
// Names may hold inner spaces, e.g. `AIR TEMP`
const KV_NAME = /^[A-Za-z][\w. -]*$/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

export interface TopicPattern {
  source: string;
  levels: string[];
}

export interface DecodeContext {
  receivedAt: Date;
  messageId?: number | null;
}

export type DecodeResult = { ok: true; reading: Reading } | { ok: false; error: DecodeError };

export function compilePattern(source: string): TopicPattern {
  const levels = source.split('/');
  levels.forEach((level, i) => {
    if (level === '#' && i !== levels.length - 1) throw new Error(`invalid topic pattern ${source}: '#' must be last`);
    if (level !== DEVICE_CAPTURE && level.length > 1 && /[+#{}]/.test(level)) {
      throw new Error(`invalid topic pattern ${source}: bad level '${level}'`);
    }
  });
  if (levels.filter((l) => l === DEVICE_CAPTURE).length > 1) {
    throw new Error(`invalid topic pattern ${source}: more than one ${DEVICE_CAPTURE}`);
  }
  return { source, levels };
}

/** Returns the captured device id (or null when the pattern has none), or undefined on no match. */
export function matchTopic(pattern: TopicPattern, topic: string): string | null | undefined {
  const parts = topic.split('/');
  let deviceId: string | null = null;
  for (let i = 0; i < pattern.levels.length; i++) {
    const level = pattern.levels[i];
    // Wildcards never match $-prefixed system topics at the first level
    if (i === 0 && topic.startsWith('$') && (level === '#' || level === '+' || level === DEVICE_CAPTURE)) return undefined;
    if (level === '#') return deviceId;
    if (i >= parts.length) return undefined;
    const part = parts[i];
    if (level === DEVICE_CAPTURE) {
      if (!part) return undefined;
      deviceId = part;
    } else if (level !== '+' && level !== part) {
      return undefined;
    }
  }
  return parts.length === pattern.levels.length ? deviceId : undefined;
}

/**
 * Parse `NAME:value,NAME:value,...[,DATE:YYYY-MM-DD,HH:MM:SS]`.
 * Numeric values become numbers. The date is read as UTC.
 */
export function parseKeyValueLine(text: string): { values: Record<string, JsonValue>; date: string | null } | null {
  let body = text.trim();
  let date: string | null = null;
  const m = KV_DATE.exec(body);
  if (m) {
    date = `${m[1]}T${m[2]}Z`;
    body = body.slice(0, m.index);
  }
  if (!body) return null;
  const values: Record<string, JsonValue> = {};
  for (const part of body.split(',')) {
    const idx = part.indexOf(':');
    if (idx <= 0) return null;
    const name = part.slice(0, idx).trim();
    const raw = part.slice(idx + 1).trim();
    if (!KV_NAME.test(name)) return null;
    const num = Number(raw);
    values[name] = raw !== '' && Number.isFinite(num) ? num : raw;
  }
  return { values, date };
}

function isObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** An object carrying both `v` and `data`; anything else is a plain payload, `{"v":3.3}` included. */
function isEnvelope(value: JsonValue): value is { [key: string]: JsonValue } {
  return isObject(value) && Object.prototype.hasOwnProperty.call(value, 'v') && Object.prototype.hasOwnProperty.call(value, 'data');
}

function parseJson(text: string): { ok: true; value: JsonValue } | { ok: false } {
  try {
    const value: JsonValue = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function toInstant(value: JsonValue): string | null {
  let ms: number;
  if (typeof value === 'number') ms = value;
  else if (typeof value === 'string') ms = Date.parse(value);
  else return null;
  if (!Number.isFinite(ms)) return null;
  const d = new Date(ms);
  return Number.isNaN(d.getTime()) ? null : d.toISOString();
}

/**
 * Turns a raw publish into a Reading. Holds only the compiled topic patterns,
 * so `decode` depends on nothing but its arguments.
 */
export class Decoder {
  readonly patterns: readonly TopicPattern[];

  constructor(patterns: readonly string[]) {
    if (patterns.length === 0) throw new Error('decoder needs at least one topic pattern');
    this.patterns = patterns.map(compilePattern);
  }

  decode(topic: string, payload: Uint8Array, context: DecodeContext): DecodeResult {
    const fail = (reason: DecodeError['reason'], detail?: string): DecodeResult => ({ ok: false, error: new DecodeError(reason, topic, detail) });

    let matched = false;
    let topicDeviceId: string | null = null;
    for (const pattern of this.patterns) {
      const m = matchTopic(pattern, topic);
      if (m !== undefined) {
        matched = true;
        topicDeviceId = m;
        break;
      }
    }
    if (!matched) return fail('unrecognized_topic');
    if (payload.length === 0) return fail('empty_payload');

    let text: string;
    try {
      text = utf8.decode(payload);
    } catch {
      return fail('malformed_payload', 'invalid utf-8');
    }

    let value: JsonValue;
    let bodyDeviceId: string | null = null;
    let timestamp: string | null = context.receivedAt.toISOString();

    const json = parseJson(text);
    if (json.ok) {
      value = json.value;
      if (isEnvelope(json.value)) {
        const envelope = json.value;
        if (envelope.v !== ENVELOPE_VERSION) return fail('unsupported_version', `v=${JSON.stringify(envelope.v)}`);
        value = envelope.data;
        if (envelope.deviceId !== undefined) {
          if (typeof envelope.deviceId !== 'string' || !envelope.deviceId) return fail('malformed_payload', 'deviceId must be a non-empty string');
          bodyDeviceId = envelope.deviceId;
        }
        if (envelope.ts !== undefined) {
          timestamp = toInstant(envelope.ts);
          if (!timestamp) return fail('invalid_timestamp', JSON.stringify(envelope.ts));
        }
      }
    } else {
      const line = parseKeyValueLine(text);
      if (!line) return fail('malformed_payload', 'neither JSON nor key/value line');
      value = line.values;
      if (line.date) {
        timestamp = toInstant(line.date);
        if (!timestamp) return fail('invalid_timestamp', line.date);
      }
    }

    const deviceId = topicDeviceId ?? bodyDeviceId;
    if (!deviceId) return fail('missing_device_id');

    const reading: Reading = Object.freeze({
      topic,
      deviceId,
      timestamp,
      payload: value,
      messageId: context.messageId ?? null,
    });
    return { ok: true, reading };
  }
}
