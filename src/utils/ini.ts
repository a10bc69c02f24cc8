/**
 * Minimal INI reader/writer for "[Section]" / "Key=Value" documents.
 * Values are flattened to "Section.Key"; keys before any section have no prefix.
 */

export function parseIni(text: string): Map<string, string> {
  const values = new Map<string, string>();
  let section = '';
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith(';') || line.startsWith('#')) {
      continue;
    }
    if (line.startsWith('[') && line.endsWith(']')) {
      section = line.slice(1, -1).trim();
      continue;
    }
    const eq = line.indexOf('=');
    if (eq === -1) {
      continue;
    }
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();
    values.set(section ? `${section}.${key}` : key, value);
  }
  return values;
}

/**
 * Serializes flattened values, grouping keys by section in first-seen order.
 */
export function serializeIni(values: ReadonlyMap<string, string>): string {
  const sections = new Map<string, [string, string][]>();
  for (const [fullKey, value] of values) {
    const dot = fullKey.indexOf('.');
    const section = dot === -1 ? '' : fullKey.slice(0, dot);
    const key = dot === -1 ? fullKey : fullKey.slice(dot + 1);
    const pairs = sections.get(section) ?? [];
    pairs.push([key, value]);
    sections.set(section, pairs);
  }

  const lines: string[] = [];
  const unsectioned = sections.get('');
  if (unsectioned) {
    for (const [key, value] of unsectioned) {
      lines.push(`${key}=${value}`);
    }
  }
  for (const [section, pairs] of sections) {
    if (section === '') {
      continue;
    }
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(`[${section}]`);
    for (const [key, value] of pairs) {
      lines.push(`${key}=${value}`);
    }
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
