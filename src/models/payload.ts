/**
 * Payload Model
 *
 * Payloads cross the pipeline as JSON-like values so adapters can
 * branch on shape instead of downcasting.
 */

export type PayloadPrimitive = string | number | boolean | null;

export interface PayloadObject {
  [key: string]: Payload;
}

export type Payload = PayloadPrimitive | Payload[] | PayloadObject;

/**
 * Shape tag of a payload
 */
export type PayloadKind = 'text' | 'number' | 'boolean' | 'null' | 'list' | 'object';

export function payloadKind(payload: Payload): PayloadKind {
  if (payload === null) return 'null';
  if (Array.isArray(payload)) return 'list';
  switch (typeof payload) {
    case 'string':
      return 'text';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'object';
  }
}

export function isPayloadObject(payload: Payload): payload is PayloadObject {
  return payloadKind(payload) === 'object';
}

/**
 * Dates, maps and class instances are not JSON-like even when they have no
 * own keys
 */
function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Check an arbitrary value (e.g. parsed YAML or a backend body) is a Payload
 */
export function isPayload(value: unknown): value is Payload {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isPayload);
      }
      return isPlainObject(value) && Object.values(value).every(isPayload);
    default:
      return false;
  }
}

/**
 * Render a payload as prompt text.
 * Text passes through unchanged; everything else is JSON.
 */
export function payloadToText(payload: Payload): string {
  return typeof payload === 'string' ? payload : JSON.stringify(payload);
}

/**
 * Deterministic serialization (object keys sorted) for hashing
 */
export function canonicalize(payload: Payload): string {
  if (payload === null || typeof payload !== 'object') {
    return JSON.stringify(payload);
  }
  if (Array.isArray(payload)) {
    return `[${payload.map(canonicalize).join(',')}]`;
  }
  const keys = Object.keys(payload).sort();
  return `{${keys.map((key) => `${JSON.stringify(key)}:${canonicalize(payload[key])}`).join(',')}}`;
}
