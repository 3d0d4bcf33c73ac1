/**
 * Date Utilities for the Perp Liquidity Analyzer
 */

import { format } from 'date-fns';

export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

/**
 * Format a date for display, e.g. 2024-05-01 14:03:59
 */
export function formatTimestamp(date: Date, formatStr = TIMESTAMP_FORMAT): string {
  return format(date, formatStr);
}

/**
 * "Last updated" caption shown under rankings
 */
export function lastUpdatedCaption(date: Date): string {
  return `Last updated: ${formatTimestamp(date)}`;
}
