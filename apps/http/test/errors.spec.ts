/* apps/http/test/errors.spec.ts */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { Errors } from '@erdbase/core';
import { classifyError } from '../src/errors';

describe('classifyError', () => {
  it('keeps domain codes and field errors', () => {
    expect(classifyError(Errors.VALIDATION({ name: ["can't be blank"] }))).toEqual({
      code: 'VALIDATION', status: 400, message: 'Invalid attributes', errors: { name: ["can't be blank"] },
    });
    expect(classifyError(Errors.FORBIDDEN())).toEqual({ code: 'FORBIDDEN', status: 403, message: 'not allowed' });
  });

  it('turns zod issues into path details', () => {
    const res = z.object({ email: z.string() }).safeParse({});
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(classifyError(res.error)).toEqual({
        code: 'VALIDATION', status: 400, message: 'Invalid request', details: [{ path: 'email', msg: 'Required' }],
      });
    }
  });

  it('maps framework 4xx errors by status', () => {
    expect(classifyError({ statusCode: 429, message: 'Rate limit exceeded' })).toEqual({
      code: 'RATE_LIMITED', status: 429, message: 'Rate limit exceeded',
    });
    expect(classifyError(Object.assign(new Error('Body is not valid JSON'), { statusCode: 400 }))).toMatchObject({
      code: 'VALIDATION', status: 400,
    });
  });

  it('blames the database for connection failures', () => {
    expect(classifyError(new Error('connect ECONNREFUSED 127.0.0.1:3306'))).toMatchObject({ code: 'ADAPTER', status: 502 });
    expect(classifyError(new Error('boom'))).toEqual({ code: 'INTERNAL', status: 500, message: 'boom' });
  });
});
