/**
 * Merge options over defaults, skipping keys set to undefined.
 */
export function withDefaults<T extends object>(defaults: Required<T>, overrides?: T): Required<T> {
  const defined = Object.fromEntries(
    Object.entries(overrides ?? {}).filter(([, value]) => value !== undefined),
  );
  return { ...defaults, ...defined };
}
