/**
 * Environment helpers - merge ambient variables with operation overrides
 *
 * Nothing here reads or writes `process.env`; callers pass a snapshot.
 */

export type EnvironmentSnapshot = Readonly<Record<string, string>>;

/**
 * Variables set by common CI providers
 */
const CI_VARIABLES = ['CI', 'GITHUB_ACTIONS', 'GITLAB_CI', 'NODE_NAME'];

/**
 * Copy an env-like object, dropping unset entries
 */
export function snapshotEnvironment(
  source: Record<string, string | undefined>
): EnvironmentSnapshot {
  const snapshot: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined) {
      snapshot[key] = value;
    }
  }
  return snapshot;
}

/**
 * Build the `KEY=VALUE` list for an operation.
 *
 * Overrides are appended after the ambient entries. A key present in both
 * appears twice and the later (override) entry wins when the list is
 * applied, see {@link toEnvRecord}.
 */
export function buildEnvironment(
  ambient: EnvironmentSnapshot,
  overrides: Readonly<Record<string, string>> = {}
): string[] {
  const env = Object.entries(ambient).map(([key, value]) => `${key}=${value}`);
  for (const [key, value] of Object.entries(overrides)) {
    env.push(`${key}=${value}`);
  }
  return env;
}

/**
 * Collapse a `KEY=VALUE` list into a record, last entry wins.
 * Entries without `=` are ignored.
 */
export function toEnvRecord(env: readonly string[]): Record<string, string> {
  const record: Record<string, string> = {};
  for (const entry of env) {
    const separator = entry.indexOf('=');
    if (separator <= 0) continue;
    record[entry.slice(0, separator)] = entry.slice(separator + 1);
  }
  return record;
}

/**
 * Check whether the snapshot looks like a CI runner
 */
export function isRunningInCI(env: EnvironmentSnapshot): boolean {
  return CI_VARIABLES.some((name) => Boolean(env[name]));
}
