/**
 * Basic Usage Example
 *
 * Records a few study sessions, queries them, and moves them through the wire format.
 * Run with: npm run example
 */

import { rm } from "node:fs/promises";
import { decodeCollectionWithReport, formatDuration, openTracker } from "@studylog/sdk";

async function main() {
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });

  console.log("📂 Opening tracker...");
  const tracker = await openTracker({ root: dataDir });

  // CREATE
  console.log("\n✏️  Recording sessions...");
  const algebra = await tracker.addSession({
    subject: "Algebra",
    durationMinutes: 45,
    date: "2024-10-04",
    startTime: "09:00",
    endTime: "09:45",
  });
  await tracker.addSession({ subject: "Physics", durationMinutes: 90, date: "2024-10-05" });
  await tracker.addSession({
    subject: "Algebra",
    durationMinutes: 30,
    date: "2024-10-06",
    notes: 'Chapter 4, "quadratics"',
  });
  console.log(`✅ Recorded ${tracker.listSessions().length} sessions`);

  // UPDATE
  console.log("\n✏️  Updating a session...");
  const updated = await tracker.updateSession(algebra.id, { notes: "Warm-up drills" });
  console.log(`✅ ${updated.toString()}`);

  // QUERY
  console.log("\n🔍 Newest first:");
  for (const session of tracker.listSessions({ sort: "date-desc" })) {
    console.log(`   ${session.date}  ${formatDuration(session.durationMinutes)}  ${session.subject}`);
  }

  const stats = tracker.stats();
  console.log(`\n📊 ${stats.sessionCount} sessions, ${formatDuration(stats.totalMinutes)} total`);
  for (const [subject, minutes] of Object.entries(stats.bySubject)) {
    console.log(`   ${subject}: ${formatDuration(minutes)}`);
  }

  // WIRE FORMAT
  console.log("\n📦 Compact payload:");
  const payload = tracker.exportSessions({ layout: "compact" });
  console.log(payload);

  // A damaged record is skipped; the others survive
  const damaged = payload.replace('"durationMinutes":90', '"durationMinutes":"ninety"');
  const report = decodeCollectionWithReport(damaged);
  console.log(`\n🩹 Decoded ${report.sessions.length} sessions, skipped ${report.skipped.length}`);
  for (const span of report.skipped) {
    console.log(`   #${span.index}: ${span.reason}`);
  }

  // DELETE
  await tracker.clear();
  console.log(`\n🗑️  Cleared; ${tracker.listSessions().length} sessions left`);

  await tracker.close();
  await rm(dataDir, { recursive: true, force: true });
}

main().catch((error: unknown) => {
  console.error("❌ Example failed:", error);
  process.exitCode = 1;
});
