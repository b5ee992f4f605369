/** A single tracked task, as held in memory between load and rewrite. */
export interface Task {
  readonly name: string;
  readonly tags: string[] | null; // null and [] mean the same thing
  readonly complete: boolean;
  readonly deadline: Date | null; // UTC instant
}

/** Input accepted by the add operation; new tasks always start incomplete. */
export interface NewTask {
  readonly name: string;
  readonly tags?: readonly string[] | null;
  readonly deadline?: Date | null;
}

/**
 * A task as it appears in a listing. `id` is the task's position among the
 * incomplete tasks of the sorted collection, or null when the listing
 * includes completed tasks.
 */
export interface ListedTask {
  readonly id: number | null;
  readonly task: Task;
}
