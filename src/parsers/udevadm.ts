/**
 * Parsers for udevadm output.
 */

/**
 * Parse `udevadm info --query=property` output ("KEY=VALUE" per line).
 * Values keep everything after the first '='.
 */
export function parseUdevProperties(rawOutput: string): Map<string, string> {
  const properties = new Map<string, string>();

  for (const line of rawOutput.split("\n")) {
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    if (!/^[A-Za-z0-9_]+$/.test(key)) continue;
    properties.set(key, line.slice(eq + 1).replace(/\r$/, ""));
  }

  return properties;
}

/**
 * Parse `udevadm trigger --dry-run --verbose` output: one syspath per line.
 * Duplicates are dropped, order is kept.
 */
export function parseTriggerSyspaths(rawOutput: string): string[] {
  const seen = new Set<string>();
  for (const line of rawOutput.split("\n")) {
    const path = line.trim();
    if (path.startsWith("/sys/")) {
      seen.add(path);
    }
  }
  return [...seen];
}
