/**
 * Turn a raw header row into unique column names.
 *
 * Leading whitespace is trimmed, an empty name becomes `Unnamed: <position>`,
 * and repeated names get a `.1`, `.2`, ... suffix in order of appearance.
 */
export function normalizeColumnNames(header: readonly string[]): string[] {
  const counts = new Map<string, number>();

  return header.map((raw, position) => {
    let name = raw.trimStart() || `Unnamed: ${String(position)}`;
    let seen = counts.get(name) ?? 0;

    while (seen > 0) {
      counts.set(name, seen + 1);
      name = `${name}.${String(seen)}`;
      seen = counts.get(name) ?? 0;
    }

    counts.set(name, seen + 1);
    return name;
  });
}
