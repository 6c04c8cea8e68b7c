/**
 * Access to process-wide state used for metadata defaults.
 * Passed explicitly so callers can substitute fixed values.
 */
export interface EnvironmentProvider {
  get(name: string): string | undefined;
  now(): Date;
}

export const processEnvironment: EnvironmentProvider = {
  get: (name) => process.env[name],
  now: () => new Date(),
};

/**
 * Build a provider from a fixed variable map and clock.
 */
export function staticEnvironment(
  vars: Record<string, string | undefined>,
  now: Date = new Date(),
): EnvironmentProvider {
  return {
    get: (name) => vars[name],
    now: () => new Date(now.getTime()),
  };
}

/**
 * First variable with a non-empty value, in order.
 */
export function firstDefined(env: EnvironmentProvider, names: readonly string[]): string | undefined {
  for (const name of names) {
    const value = env.get(name);
    if (value) return value;
  }
  return undefined;
}
