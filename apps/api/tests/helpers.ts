/**
 * Shared test helpers for API route tests.
 *
 * WHY: createMockReq and createMockRes are used by every route test file.
 *      Centralizing them keeps behavior consistent.
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { BodyParser } from '../src/types.js';

export function createMockReq(method: string, url = ''): IncomingMessage {
  return { method, url } as IncomingMessage;
}

export function createMockRes(): ServerResponse & { _body: string; _statusCode: number } {
  const res = {
    statusCode: 200,
    writableEnded: false,
    _body: '',
    _statusCode: 200,
    end(this: { statusCode: number; writableEnded: boolean; _body: string; _statusCode: number }, body?: string) {
      this._body = body ?? '';
      this._statusCode = this.statusCode;
      this.writableEnded = true;
    },
  } as unknown as ServerResponse & { _body: string; _statusCode: number };
  return res;
}

/** A BodyParser that resolves to a fixed body. */
export function bodyOf(body: Record<string, unknown>): BodyParser {
  return () => Promise.resolve(body);
}
