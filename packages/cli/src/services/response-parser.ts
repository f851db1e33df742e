import { invalidServerResponse, serverError } from '../errors.js';
import type { UploadConfirmation, UploadTicket } from '../types.js';
import { isObjectRecord } from '../utils.js';

/**
 * 필드 하나를 디코딩한 결과
 */
export type Decoded<T> = { ok: true; value: T } | { ok: false; reason: string };

export function decoded<T>(value: T): Decoded<T> {
  return { ok: true, value };
}

export function rejected<T>(reason: string): Decoded<T> {
  return { ok: false, reason };
}

export function decodeString(value: unknown): Decoded<string> {
  return typeof value === 'string' ? decoded(value) : rejected('expected a string');
}

export function decodeRecord(value: unknown): Decoded<Record<string, unknown>> {
  return isObjectRecord(value) ? decoded(value) : rejected('expected an object');
}

export function decodeStringRecord(value: unknown): Decoded<Record<string, string>> {
  if (!isObjectRecord(value)) {
    return rejected('expected an object');
  }

  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      return rejected(`expected "${key}" to be a string`);
    }
    result[key] = entry;
  }
  return decoded(result);
}

export function decodeUrl(value: unknown): Decoded<URL> {
  const text = decodeString(value);
  if (!text.ok) {
    return rejected(text.reason);
  }
  if (!URL.canParse(text.value)) {
    return rejected('expected an absolute URL');
  }
  const url = new URL(text.value);
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return rejected('expected an http(s) URL');
  }
  return decoded(url);
}

/**
 * 실패한 디코딩은 원본 본문을 담은 INVALID_SERVER_RESPONSE 가 된다.
 */
export function unwrap<T>(result: Decoded<T>, body: string): T {
  if (!result.ok) {
    throw invalidServerResponse(body);
  }
  return result.value;
}

export function parseJsonBody(body: string): Record<string, unknown> {
  let value: unknown;
  try {
    value = JSON.parse(body);
  } catch {
    throw invalidServerResponse(body);
  }
  return unwrap(decodeRecord(value), body);
}

export function expectField(map: Record<string, unknown>, key: string, body: string): unknown {
  if (!Object.hasOwn(map, key)) {
    throw invalidServerResponse(body);
  }
  return map[key];
}

function decodeErrorMessage(map: Record<string, unknown>): Decoded<string> {
  const error = decodeRecord(map['error']);
  if (!error.ok) {
    return rejected(error.reason);
  }
  return decodeString(error.value['message']);
}

/**
 * `{ error: { message } }` 에서 메시지를 꺼내 SERVER_ERROR 로 던진다.
 */
export function extractError(map: Record<string, unknown>, body: string): never {
  throw serverError(unwrap(decodeErrorMessage(map), body));
}

export function parseUploadTicket(map: Record<string, unknown>, body: string): UploadTicket {
  const uploadUrl = unwrap(decodeUrl(expectField(map, 'url', body)), body);
  const formFields = unwrap(decodeStringRecord(expectField(map, 'fields', body)), body);
  return { uploadUrl, formFields };
}

export function parseConfirmation(map: Record<string, unknown>, body: string): UploadConfirmation {
  if (Object.hasOwn(map, 'error')) {
    return { kind: 'failure', message: unwrap(decodeErrorMessage(map), body) };
  }

  const success = unwrap(decodeRecord(map['success']), body);
  return { kind: 'success', message: unwrap(decodeString(success['message']), body) };
}
