// Raw configuration value schemas using Zod
import { z } from 'zod';
import { parseDurationNanos } from '@querylog/shared';

export const BooleanValueSchema = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false']))
    .transform((value) => value === 'true'),
]);

export const IntegerValueSchema = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/)
    .transform((value) => parseInt(value, 10)),
]);

// Numbers are nanoseconds; strings carry a unit ("250ms", "2 seconds")
export const DurationValueSchema = z.union([
  z.number().nonnegative(),
  z.string().transform((value, ctx) => {
    const nanos = parseDurationNanos(value);
    if (nanos === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid duration: ${value}` });
      return z.NEVER;
    }
    return nanos;
  }),
]);
