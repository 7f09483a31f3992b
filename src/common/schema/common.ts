import { z } from 'zod';
import { ValidationError } from '../../errors';
import { isCalendarDate } from '../date';

export const identityKeySchema = z.string().trim().min(1);

export const calendarDateSchema = z.string().refine(isCalendarDate, {
  error: 'Dates must use the YYYY-MM-DD format',
});

export const parseInput = <T extends z.ZodType>(
  schema: T,
  input: unknown,
): z.output<T> => {
  const result = schema.safeParse(input);

  if (!result.success) {
    throw new ValidationError(result.error.issues[0].message);
  }

  return result.data;
};
