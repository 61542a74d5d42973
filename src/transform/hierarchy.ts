/**
 * Logger-name hierarchy helpers.
 *
 * InfluxQL reserves "." as a name separator, so hierarchical logger names
 * are stored with a different delimiter (":" by default).
 */

export const ROOT_MEASUREMENT = 'root';

/** "a.b.c" → "a:b:c". An empty name maps to "root". */
export function rewriteHierarchy(name: string, from = '.', to = ':'): string {
  if (name === '') return ROOT_MEASUREMENT;
  if (from === to) return name;
  return name.split(from).join(to);
}

/**
 * Ordered prefixes of a delimited name, itself first:
 * "a:b:c" → ["a:b:c", "a:b", "a"].
 */
export function ancestors(name: string, delimiter = ':'): string[] {
  const segments = name.split(delimiter);
  const result: string[] = [];
  for (let i = segments.length; i > 0; i--) {
    result.push(segments.slice(0, i).join(delimiter));
  }
  return result;
}
