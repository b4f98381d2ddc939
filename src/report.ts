/**
 * Terminal rendering of rename pairs and log history.
 */

import type { LogEntry, PairReporter } from './types.js';

const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const DIM = '\x1b[2m';
const RESET = '\x1b[0m';

export interface ReportStyle {
  color: boolean;
}

function paint(text: string, code: string, style: ReportStyle): string {
  return style.color ? `${code}${text}${RESET}` : text;
}

/**
 * Two diff-style lines: "- source" then "+ destination".
 */
export function formatPair(source: string, destination: string, style: ReportStyle): string {
  return `${paint(`- ${source}`, RED, style)}\n${paint(`+ ${destination}`, GREEN, style)}`;
}

export function createPairReporter(write: (line: string) => void, style: ReportStyle): PairReporter {
  return (source, destination) => write(formatPair(source, destination, style));
}

export function formatHistory(label: string, entries: LogEntry[], style: ReportStyle): string[] {
  if (entries.length === 0) {
    return [`No entries in "${label}" log`];
  }

  const lines: string[] = [];
  entries.forEach((entry, index) => {
    const pairs = Object.entries(entry);
    lines.push(paint(`#${index + 1} (${pairs.length} pair${pairs.length === 1 ? '' : 's'})`, DIM, style));
    for (const [source, destination] of pairs) {
      lines.push(formatPair(source, destination, style));
    }
  });
  return lines;
}
