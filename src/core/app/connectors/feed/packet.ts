/**
 * File: src/core/app/connectors/feed/packet.ts
 * Summary: Field-level helpers for the comma-separated, `$`-tagged timing feed records.
 */

/**
 * Splits a single record into trimmed fields. Double quotes group a field and
 * `""` inside a quoted field is a literal quote. Returns `null` when a quoted
 * field is never closed.
 */
export const splitFeedRecord = (line: string): string[] | null => {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let index = 0; index < line.length; index += 1) {
    const char = line[index];

    if (inQuotes) {
      if (char !== '"') {
        current += char;
      } else if (line[index + 1] === '"') {
        current += '"';
        index += 1;
      } else {
        inQuotes = false;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  if (inQuotes) {
    return null;
  }

  fields.push(current.trim());
  return fields;
};

const BLANK_TIME = /^[0:.]*$/;
const WHOLE_NUMBER = /^\d+$/;
const SECONDS = /^(\d+)(?:\.(\d{1,3}))?$/;

/** Empty and all-zero times mean "no time" in the feed. */
export const isBlankFeedTime = (value: string): boolean => BLANK_TIME.test(value.trim());

/**
 * Parses `HH:MM:SS.mmm`, `MM:SS.mmm` or `SS.mmm` into milliseconds. Returns
 * `null` when the value is not a time.
 */
export const parseFeedTime = (value: string): number | null => {
  const parts = value.trim().split(':');
  if (parts.length > 3) {
    return null;
  }

  const secondsMatch = SECONDS.exec(parts[parts.length - 1]);
  if (!secondsMatch) {
    return null;
  }

  const leading = parts.slice(0, -1);
  if (!leading.every((part) => WHOLE_NUMBER.test(part))) {
    return null;
  }

  const [hours, minutes] = leading.length === 2 ? leading.map(Number) : [0, Number(leading[0] ?? 0)];
  const seconds = Number(secondsMatch[1]);
  const millis = Number((secondsMatch[2] ?? '').padEnd(3, '0'));

  return hours * 3_600_000 + minutes * 60_000 + seconds * 1000 + millis;
};

export const parseFeedInteger = (value: string): number | null => {
  const trimmed = value.trim();
  return WHOLE_NUMBER.test(trimmed) ? Number(trimmed) : null;
};
