import { addDays, firstOfMonth, firstOfNextMonth } from '../../../common/utils/dates.js';
import { RENEWAL_LOOKAHEAD_DAYS, type RenewalWindow } from './types.js';

/**
 * The calendar month about five months ahead: the month containing
 * (first of the current month + 155 days).
 *
 * @param today - 'YYYY-MM-DD'
 */
export const computeRenewalWindow = (today: string): RenewalWindow => {
  const shifted = addDays(firstOfMonth(today), RENEWAL_LOOKAHEAD_DAYS) ?? today;
  const start = firstOfMonth(shifted);
  return { start, end: firstOfNextMonth(start) };
};
