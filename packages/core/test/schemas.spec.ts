/* packages/core/test/schemas.spec.ts */
import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  AppError, Errors, MemberAttrsSchema, OrganizationAttrsSchema, ProjectAttrsSchema,
  addError, assertValid, fieldErrorsFromZod, normalizeEmail, parseAttrs, text, type FieldErrors,
} from '../src';
import { thrown } from '../../../tests/helpers';

describe('parseAttrs', () => {
  it('reports blank required fields', () => {
    const e = thrown(() => parseAttrs(OrganizationAttrsSchema, { name: '   ' }));
    expect(e).toBeInstanceOf(AppError);
    expect(e).toMatchObject({ code: 'VALIDATION', status: 400, details: { name: ["can't be blank"] } });
  });

  it('reports length limits', () => {
    const e = thrown(() => parseAttrs(OrganizationAttrsSchema, { name: 'x'.repeat(121) }));
    expect(e).toMatchObject({ details: { name: ['should be at most 120 character(s)'] } });
  });

  it('measures length in characters, not UTF-16 units', () => {
    const name = text({ min: 2, max: 3 });
    expect(name.safeParse('😀😀😀').success).toBe(true);
    const short = name.safeParse('😀');
    expect(short.success ? [] : short.error.issues.map((i) => i.message)).toEqual(['should be at least 2 character(s)']);
    const long = name.safeParse('😀😀😀😀');
    expect(long.success ? [] : long.error.issues.map((i) => i.message)).toEqual(['should be at most 3 character(s)']);
  });

  it('drops blank optional fields', () => {
    expect(parseAttrs(OrganizationAttrsSchema, { name: 'Acme', logo: '' })).toEqual({ name: 'Acme' });
  });

  it('checks email format and enumerated values', () => {
    const e = thrown(() => parseAttrs(MemberAttrsSchema, { email: 'ada at example', role: 'boss' }));
    expect(e).toMatchObject({
      details: {
        email: ['must have the @ sign and no spaces'],
        role: ['is invalid'],
      },
    });
  });

  it('normalizes emails for lookups', () => {
    expect(normalizeEmail(' Ada@Example.COM ')).toBe('ada@example.com');
  });

  it('reports a missing choice as blank', () => {
    const e = thrown(() => parseAttrs(ProjectAttrsSchema, { name: 'Billing' }));
    expect(e).toMatchObject({ details: { storageKind: ["can't be blank"] } });
  });
});

describe('errors', () => {
  it('maps codes to statuses', () => {
    expect(Errors.NOT_FOUND('project billing')).toMatchObject({
      code: 'NOT_FOUND', status: 404, message: 'project billing not found',
    });
    expect(Errors.UNAUTHORIZED().status).toBe(401);
    expect(Errors.CONFLICT('taken').status).toBe(409);
    expect(new AppError('RATE_LIMITED', 'slow down').status).toBe(429);
  });

  it('collects messages per field', () => {
    const errors: FieldErrors = {};
    assertValid(errors);
    addError(errors, 'email', "can't be blank");
    addError(errors, 'email', 'is invalid');
    expect(errors).toEqual({ email: ["can't be blank", 'is invalid'] });
    expect(thrown(() => assertValid(errors))).toMatchObject({ code: 'VALIDATION', details: errors });
  });

  it('files root-level zod issues under base', () => {
    const res = z.string().safeParse(1);
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(fieldErrorsFromZod(res.error)).toEqual({ base: ['Expected string, received number'] });
    }
  });
});
