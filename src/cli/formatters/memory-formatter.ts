import type { LongTermEntry } from '@domain/types/long-term.js';

/**
 * Format one long-term entry: the key line, then the value as indented JSON.
 */
export function formatLongTermEntry(entry: LongTermEntry): string {
  return [
    `${entry.category}/${entry.key} (updated ${entry.updatedAt})`,
    JSON.stringify(entry.value, null, 2),
  ].join('\n');
}

/**
 * Format a category's entries as a key/value table with values on one line.
 */
export function formatLongTermTable(entries: LongTermEntry[]): string {
  if (entries.length === 0) {
    return 'No entries found.';
  }

  const keyWidth = Math.max(3, ...entries.map((e) => e.key.length));
  const header = `${'Key'.padEnd(keyWidth)}  Value`;
  const rows = entries.map((e) => {
    const value = JSON.stringify(e.value);
    return `${e.key.padEnd(keyWidth)}  ${value.length > 60 ? value.slice(0, 57) + '...' : value}`;
  });

  return [header, '-'.repeat(header.length), ...rows].join('\n');
}

export function formatLongTermJson(entries: LongTermEntry | LongTermEntry[]): string {
  return JSON.stringify(entries, null, 2);
}
