/**
 * Parsed config file: top-level section name → key → value.
 * Values are strings, booleans or string lists; zod coerces the rest.
 */
export type ConfigSections = Record<string, Record<string, unknown>>;

/**
 * Minimal YAML reader for the flat layout of config/pipeline.yaml:
 * top-level section keys, indented `key: value` scalars, and lists written
 * either inline (`[a, b]`, `[]`) or as `- item` lines under an empty key.
 *
 * Not a general-purpose YAML parser: nesting stops at one level.
 */
export function parseSections(content: string): ConfigSections {
  const result: ConfigSections = {};
  let section: Record<string, unknown> | undefined;
  let listKey: string | undefined;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      const name = trimmed.endsWith(':') ? trimmed.slice(0, -1).trim() : trimmed;
      section = {};
      result[name] = section;
      listKey = undefined;
      continue;
    }

    if (!section) continue;

    // "  - item" under the last empty key
    if (trimmed.startsWith('- ') || trimmed === '-') {
      const list = listKey === undefined ? undefined : section[listKey];
      if (Array.isArray(list)) {
        list.push(unquote(trimmed.slice(1).trim()));
      }
      continue;
    }

    const colonIdx = trimmed.indexOf(':');
    if (colonIdx <= 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const rawValue = trimmed.slice(colonIdx + 1).trim();

    if (rawValue === '') {
      section[key] = [];
      listKey = key;
    } else {
      section[key] = parseScalar(rawValue);
      listKey = undefined;
    }
  }

  return result;
}

function parseScalar(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value.startsWith('[') && value.endsWith(']')) {
    const inner = value.slice(1, -1).trim();
    return inner === '' ? [] : inner.split(',').map((item) => unquote(item.trim()));
  }
  return unquote(value);
}

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}
