/**
 * History compaction sweep: "history_compact"
 *
 * Run from the worker crontab. Compacts every actor whose event threshold
 * or wall-clock interval has been reached; each compaction is queued into
 * the actor's own mailbox, so it never interleaves with an event.
 */

import type { TracingLogger } from "@aether/shared/tracing"
import type { Task } from "graphile-worker"

import type { FleetManager } from "../../fleet/manager.js"

export const HISTORY_COMPACT_TASK = "history_compact"

export function createHistoryCompactTask(fleet: Pick<FleetManager, "compactDue">, logger: TracingLogger): Task {
  return async (): Promise<void> => {
    const sweep = await fleet.compactDue()
    if (sweep.compacted > 0 || sweep.failed > 0) {
      logger.info("history_compact: sweep finished", { ...sweep })
    }
  }
}
