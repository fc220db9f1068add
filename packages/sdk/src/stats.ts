/**
 * Statistics over study sessions
 */

import type { StudySession } from "./session.js";
import type { DateRange, SessionStats } from "./types.js";

/**
 * Keep sessions whose date falls inside an inclusive range
 *
 * YYYY-MM-DD strings order the same way as the dates they name.
 */
export function filterByDateRange(
  sessions: readonly StudySession[],
  range: DateRange = {}
): StudySession[] {
  return sessions.filter(
    (session) =>
      (range.from === undefined || session.date >= range.from) &&
      (range.to === undefined || session.date <= range.to)
  );
}

/**
 * Total minutes, count, mean duration and per-subject totals
 */
export function computeStats(sessions: readonly StudySession[]): SessionStats {
  const bySubject = new Map<string, number>();
  let totalMinutes = 0;

  for (const session of sessions) {
    totalMinutes += session.durationMinutes;
    bySubject.set(session.subject, (bySubject.get(session.subject) ?? 0) + session.durationMinutes);
  }

  return {
    totalMinutes,
    sessionCount: sessions.length,
    averageMinutes: sessions.length === 0 ? 0 : totalMinutes / sessions.length,
    bySubject: Object.fromEntries(bySubject),
  };
}

/**
 * Format minutes as "45m", "2h" or "2h 30m"
 */
export function formatDuration(minutes: number): string {
  if (minutes < 60) {
    return `${minutes}m`;
  }
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  if (remainingMinutes === 0) {
    return `${hours}h`;
  }
  return `${hours}h ${remainingMinutes}m`;
}
