/** Backing file used when neither the command line nor the environment names one */
export const DEFAULT_TASK_FILE = './database';

/** Environment variable that overrides the default task file */
export const TASK_FILE_ENV = 'PLAINTASK_FILE';

/**
 * Resolve the task file path.
 * Priority: explicit path > PLAINTASK_FILE > ./database.
 */
export function resolveTaskFilePath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  if (explicit?.trim()) return explicit;

  const fromEnv = env[TASK_FILE_ENV];
  if (fromEnv?.trim()) return fromEnv;

  return DEFAULT_TASK_FILE;
}
