import { format, isValid, parseISO } from 'date-fns';
import { documentDateFormat } from '../config';

export const calendarDateFormat = 'yyyy-MM-dd';

export const formatDocumentDate = (date: Date): string =>
  format(date, documentDateFormat);

export const formatCalendarDate = (date: Date): string =>
  format(date, calendarDateFormat);

export const isCalendarDate = (value: string): boolean =>
  /^\d{4}-\d{2}-\d{2}$/.test(value) && isValid(parseISO(value));
