import type { ID, TaskMap } from "@therapydrift/architecture";

/** Telemetry keeps at most this many follow-up ids; counts use the full set. */
export const MAX_TRACKED_FOLLOWUPS = 50;

const OPEN_STATUSES: ReadonlySet<string> = new Set(["open", "in-progress"]);

export interface OpenFollowups {
  /** Sorted, de-duplicated, capped to MAX_TRACKED_FOLLOWUPS. */
  ids: ID[];
  total: number;
}

/**
 * Open drift follow-ups of a task: open or in-progress tasks blocked by it
 * whose id carries one of the follow-up prefixes.
 */
export function findOpenFollowups(
  tasks: TaskMap,
  taskId: ID,
  followupPrefixes: readonly string[],
): OpenFollowups {
  const found = new Set<ID>();

  for (const task of Object.values(tasks)) {
    const id = task.id;
    if (!id || id === taskId) continue;
    if (!OPEN_STATUSES.has(task.status)) continue;
    if (!task.blockedBy.includes(taskId)) continue;
    if (followupPrefixes.some((prefix) => id.startsWith(prefix))) found.add(id);
  }

  const sorted = [...found].sort();
  return {
    ids: sorted.slice(0, MAX_TRACKED_FOLLOWUPS),
    total: sorted.length,
  };
}
