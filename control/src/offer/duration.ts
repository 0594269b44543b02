// offer/duration.ts - Billable run duration
//
// A run is billed from start to end (or now, while running) minus every
// interval it spent pausing or paused.

import type { RunRecord, RunStatus } from "@offerdesk/contracts";

const PAUSE_STATUSES: ReadonlySet<RunStatus> = new Set(["PAUSING", "PAUSED"]);
const ACTIVE_STATUSES: ReadonlySet<RunStatus> = new Set(["RESUMING", "RUNNING"]);

export function getBillableDurationMs(run: RunRecord, now: number = Date.now()): number {
  const end = run.endedAt ?? now;
  if (end <= run.startedAt) return 0;

  let paused = 0;
  let pausedSince: number | null = null;
  const changes = [...run.statusChanges].sort((a, b) => a.at - b.at);

  for (const change of changes) {
    const at = Math.min(Math.max(change.at, run.startedAt), end);
    if (PAUSE_STATUSES.has(change.status)) {
      pausedSince ??= at;
    } else if (ACTIVE_STATUSES.has(change.status) && pausedSince !== null) {
      paused += at - pausedSince;
      pausedSince = null;
    }
  }
  if (pausedSince !== null) {
    paused += end - pausedSince;
  }

  return Math.max(0, end - run.startedAt - paused);
}
