import { UTCDate } from '@date-fns/utc';
import { format } from 'date-fns';

/** `Mar 05, 2024 14:03:09 UTC` */
export function formatUtc(date: Date): string {
  return format(new UTCDate(date.getTime()), "MMM dd, yyyy HH:mm:ss 'UTC'");
}
