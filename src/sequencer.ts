/**
 * Sequencer: canonical ordering of a bucket.
 *
 * Stems sharing a literal prefix and suffix ("IMG_0012_edit", "IMG_0003_edit") are ordered by
 * the integer left over once the affixes are stripped. A single stem that does not reduce to an
 * integer sends the whole bucket to plain path order.
 */

import { stem } from './grouper.js';
import type { Entry } from './types.js';

export interface Affixes {
  prefix: string;
  suffix: string;
}

const DIGIT = /\d/;

function commonPrefix(values: string[]): string {
  let prefix = values[0] ?? '';
  for (const value of values) {
    while (!value.startsWith(prefix)) {
      prefix = prefix.slice(0, -1);
    }
  }
  return prefix;
}

function commonSuffix(values: string[]): string {
  let suffix = values[0] ?? '';
  for (const value of values) {
    while (!value.endsWith(suffix)) {
      suffix = suffix.slice(1);
    }
  }
  return suffix;
}

/**
 * Longest literal prefix and suffix shared by every stem. The suffix is taken from what remains
 * after the prefix, so the two never overlap, and neither keeps a digit that touches the
 * numeric remainder ("page10", "page11" share "page", not "page1").
 */
export function commonAffixes(stems: string[]): Affixes {
  let prefix = commonPrefix(stems);
  while (prefix && DIGIT.test(prefix.slice(-1))) {
    prefix = prefix.slice(0, -1);
  }

  const remainders = stems.map(value => value.slice(prefix.length));
  let suffix = commonSuffix(remainders);
  while (suffix && DIGIT.test(suffix.charAt(0))) {
    suffix = suffix.slice(1);
  }

  return { prefix, suffix };
}

export function parseSerial(value: string): number | null {
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

function byPath(a: Entry, b: Entry): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

export function sequence(entries: Entry[]): Entry[] {
  const stems = entries.map(entry => stem(entry.path));
  const { prefix, suffix } = commonAffixes(stems);

  const keyed: { entry: Entry; serial: number }[] = [];
  for (const [index, entry] of entries.entries()) {
    const core = stems[index].slice(prefix.length, stems[index].length - suffix.length);
    const serial = parseSerial(core);
    if (serial === null) {
      return [...entries].sort(byPath);
    }
    keyed.push({ entry, serial });
  }

  // Array.prototype.sort is stable, so equal serials keep their bucket order.
  return keyed.sort((a, b) => a.serial - b.serial).map(({ entry }) => entry);
}
