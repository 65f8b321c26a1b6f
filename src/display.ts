// Display (toString) for schedules: produces canonical rule text for roundtrip.

import { ALL, type Entry } from "./entry.js";

/** Render one entry as `<size>:<pattern>:<minutes>`. */
export function displayEntry(entry: Entry): string {
  const size = entry.size === ALL ? "*" : String(entry.size);
  return `${size}:${entry.pattern.source}:${entry.durationMinutes}`;
}

/** Render entries one per line. Comments and blank lines are not kept. */
export function display(entries: readonly Entry[]): string {
  return entries.map(displayEntry).join("\n");
}
