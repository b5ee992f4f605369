/** Outcome of a mutation that may legitimately change nothing */
export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'no-change'; readonly message: string };

export function isSuccess(r: TaskResult): r is Extract<TaskResult, { type: 'success' }> {
  return r.type === 'success';
}
