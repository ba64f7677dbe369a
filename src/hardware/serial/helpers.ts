/**
 * Serial transport helpers
 */

/**
 * Order device paths for discovery: the configured path first, then the
 * defaults without duplicates
 *
 * @param configured - Path from config, or null
 * @param defaults - Built-in candidate paths
 * @returns Ranked candidate list
 */
export function rankCandidates(configured: string | null, defaults: readonly string[]): string[] {
  const ranked = configured ? [configured] : [];
  for (const path of defaults) {
    if (!ranked.includes(path)) {
      ranked.push(path);
    }
  }
  return ranked;
}
