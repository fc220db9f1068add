/**
 * Output rendering helpers
 */

import { formatDuration, type SessionStats, type StudySession } from "@studylog/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Print JSON to stdout
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  const json = options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2);
  console.log(json);
}

/**
 * Print lines to stdout (one per line)
 */
export function printLines(lines: string[]): void {
  lines.forEach((line) => console.log(line));
}

/**
 * Apply ANSI color only if output stream is a TTY
 */
export function colorize(
  text: string,
  color: Color,
  stream: NodeJS.WriteStream = process.stdout
): string {
  if (!(stream.isTTY ?? false)) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  return `${codes[color]}${text}\x1b[0m`;
}

/**
 * One-line summary: `2024-10-04  45m  Math  [id]`, with the time span when known
 */
export function formatSessionLine(session: StudySession): string {
  const parts = [session.date, formatDuration(session.durationMinutes), session.subject];

  if (session.startTime !== null || session.endTime !== null) {
    parts.push(`${session.startTime ?? "?"}-${session.endTime ?? "?"}`);
  }

  parts.push(`[${session.id}]`);
  return parts.join("  ");
}

/**
 * Human-readable statistics
 */
export function formatStatsLines(stats: SessionStats): string[] {
  const lines = [
    `Sessions: ${stats.sessionCount}`,
    `Total: ${formatDuration(stats.totalMinutes)}`,
    `Average: ${formatDuration(Math.round(stats.averageMinutes))}`,
  ];

  const subjects = Object.entries(stats.bySubject);
  if (subjects.length > 0) {
    lines.push("", "By subject:");
    for (const [subject, minutes] of subjects) {
      lines.push(`  ${subject}: ${formatDuration(minutes)}`);
    }
  }

  return lines;
}
