/**
 * Single source of truth for "did anything change". The hash comes from the
 * capture server and is trusted as-is; an empty last hash means nothing has
 * been applied yet, so the first frame always propagates.
 */
export function hasChanged(newHash: string, lastHash: string): boolean {
  if (lastHash === '') return true;
  return newHash !== lastHash;
}
