import { describe, it, expect } from 'vitest';
import {
  EMPTY_CREATE_FIELDS,
  EMPTY_UPDATE_BODY,
  MISSING_CREATE_FIELDS,
  MISSING_UPDATE_BODY,
  messageCreateSchema,
  messageIdParamsSchema,
  messageUpdateSchema,
} from './message.js';

function firstError(result: { success: boolean; error?: { issues: { message: string }[] } }) {
  return result.error?.issues[0]?.message;
}

describe('messageCreateSchema', () => {
  it('accepts body and username and drops unknown keys', () => {
    const parsed = messageCreateSchema.safeParse({ body: 'hi', username: 'ana', id: 7 });
    expect(parsed.success).toBe(true);
    expect(parsed.data).toEqual({ body: 'hi', username: 'ana' });
  });

  it('reports a missing field', () => {
    expect(firstError(messageCreateSchema.safeParse({ username: 'bob' }))).toBe(MISSING_CREATE_FIELDS);
    expect(firstError(messageCreateSchema.safeParse({ body: 'hi' }))).toBe(MISSING_CREATE_FIELDS);
  });

  it('reports a missing object', () => {
    expect(firstError(messageCreateSchema.safeParse(undefined))).toBe(MISSING_CREATE_FIELDS);
    expect(firstError(messageCreateSchema.safeParse(null))).toBe(MISSING_CREATE_FIELDS);
  });

  it('reports empty fields', () => {
    expect(firstError(messageCreateSchema.safeParse({ body: '', username: 'x' }))).toBe(EMPTY_CREATE_FIELDS);
    expect(firstError(messageCreateSchema.safeParse({ body: 'x', username: '' }))).toBe(EMPTY_CREATE_FIELDS);
  });

  it('rejects non-string values', () => {
    expect(firstError(messageCreateSchema.safeParse({ body: 1, username: 'x' }))).toBe("'body' must be a string");
  });
});

describe('messageUpdateSchema', () => {
  it('accepts a body and ignores username', () => {
    const parsed = messageUpdateSchema.safeParse({ body: 'new text', username: 'mallory' });
    expect(parsed.success).toBe(true);
    expect(parsed.data).toEqual({ body: 'new text' });
  });

  it('reports missing and empty bodies', () => {
    expect(firstError(messageUpdateSchema.safeParse({}))).toBe(MISSING_UPDATE_BODY);
    expect(firstError(messageUpdateSchema.safeParse({ body: '' }))).toBe(EMPTY_UPDATE_BODY);
  });
});

describe('messageIdParamsSchema', () => {
  it('coerces positive integers', () => {
    expect(messageIdParamsSchema.parse({ id: '42' })).toEqual({ id: 42 });
  });

  it.each(['abc', '0', '-3', '1.5', '1.0', '1e0', '0x1', ' 1', '01', '99999999999999999999'])('rejects %s', (id) => {
    expect(messageIdParamsSchema.safeParse({ id }).success).toBe(false);
  });
});
