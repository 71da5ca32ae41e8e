import { HistoryRecord } from './types';

export interface HistoryWindow {
  /** How many years before the reference year still exclude pairs. All years when omitted. */
  lookbackYears?: number;
  /** Year being drawn. Defaults to the year after the newest record. */
  currentYear?: number;
}

/**
 * Pick the history records whose pairs should be forbidden in the next draw,
 * newest first. Looking back too far can leave small groups with no valid
 * draw at all, so the window is left to the caller.
 */
export const selectActiveHistory = (
  records: HistoryRecord[],
  window: HistoryWindow = {}
): HistoryRecord[] => {
  const excluding = records
    .filter((record) => record.exclude_pairs)
    .sort((a, b) => b.year - a.year);

  if (window.lookbackYears === undefined || excluding.length === 0) {
    return excluding;
  }

  // Released years still count towards the window
  const reference = window.currentYear ?? Math.max(...records.map((record) => record.year)) + 1;
  const oldest = reference - window.lookbackYears;
  return excluding.filter((record) => record.year >= oldest && record.year < reference);
};
