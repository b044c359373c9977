// packages/core/src/schemas.ts
import { z, type ZodError } from 'zod';
import { addError, Errors, type FieldErrors } from './errors';

// ---- attribute helpers ----
// Blank strings and null are treated as "not given", so required rules
// report them as blank and optional ones drop them.
const blankToUndefined = (v: unknown): unknown =>
  v === null || (typeof v === 'string' && v.trim() === '') ? undefined : v;

/** length in code points, so a character outside the BMP counts once */
export const charLength = (s: string): number => [...s].length;

export function text(opts: { min?: number; max?: number } = {}) {
  const { min, max } = opts;
  return z.string({ required_error: "can't be blank", invalid_type_error: 'is invalid' })
    .superRefine((s, ctx) => {
      const n = charLength(s);
      if (min !== undefined && n < min) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `should be at least ${min} character(s)` });
      }
      if (max !== undefined && n > max) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `should be at most ${max} character(s)` });
      }
    });
}

export function choice<T extends readonly [string, ...string[]]>(values: T) {
  return z.enum(values, {
    errorMap: (issue, ctx) => ({
      message: issue.code === 'invalid_type' && ctx.data === undefined ? "can't be blank" : 'is invalid',
    }),
  });
}

export const required = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema);
export const optional = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema.optional());

export const EMAIL_FORMAT = /^[^\s]+@[^\s]+$/;

/** emails are case-insensitive; every store keeps and looks them up in this form */
export const normalizeEmail = (email: string): string => email.trim().toLowerCase();
export const EmailSchema = text({ max: 160 })
  .refine((s) => EMAIL_FORMAT.test(s), 'must have the @ sign and no spaces');

export function fieldErrorsFromZod(err: ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of err.issues) {
    addError(errors, issue.path.length ? issue.path.join('.') : 'base', issue.message);
  }
  return errors;
}

// ---- request bodies ----
export const LoginSchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
}).strict();
export type LoginBody = z.infer<typeof LoginSchema>;

export const OrganizationAttrsSchema = z.object({
  name: required(text({ max: 120 })),
  logo: optional(text({ max: 255 })),
  description: optional(text({ max: 2000 })),
});
export type OrganizationAttrs = z.infer<typeof OrganizationAttrsSchema>;

export const OrganizationPatchSchema = z.object({
  name: optional(text({ max: 120 })),
  logo: optional(text({ max: 255 })),
  description: optional(text({ max: 2000 })),
});
export type OrganizationPatch = z.infer<typeof OrganizationPatchSchema>;

export const MemberAttrsSchema = z.object({
  email: required(EmailSchema),
  role: required(choice(['owner', 'writer', 'reader'] as const)),
});
export type MemberAttrs = z.infer<typeof MemberAttrsSchema>;

export const ProjectAttrsSchema = z.object({
  name: required(text({ max: 120 })),
  description: optional(text({ max: 2000 })),
  storageKind: required(choice(['local', 'remote'] as const)),
  content: optional(text()),
});
export type ProjectAttrs = z.infer<typeof ProjectAttrsSchema>;

export const ProjectPatchSchema = z.object({
  name: optional(text({ max: 120 })),
  description: optional(text({ max: 2000 })),
  content: optional(text()),
});
export type ProjectPatch = z.infer<typeof ProjectPatchSchema>;

/** parse or throw VALIDATION with per-field messages */
export function parseAttrs<T extends z.ZodTypeAny>(schema: T, attrs: unknown): z.output<T> {
  const res = schema.safeParse(attrs ?? {});
  if (!res.success) throw Errors.VALIDATION(fieldErrorsFromZod(res.error));
  return res.data;
}
