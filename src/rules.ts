// Rule parser: `<size>:<cron-pattern>:<duration-minutes>` lines into entries.

import { ALL, Entry, type ReservationSize } from "./entry.js";
import { InvalidPatternError, MalformedRuleError, type Span } from "./error.js";
import type { PatternOptions } from "./options.js";
import { CronPattern, MINUTE_MS } from "./pattern.js";

interface RuleField {
  text: string;
  span: Span;
}

/** Split a trimmed rule line on `:`, trimming each field and keeping its span. */
function splitFields(line: string): RuleField[] {
  const fields: RuleField[] = [];
  let offset = 0;
  for (const part of line.split(":")) {
    const lead = part.length - part.trimStart().length;
    const text = part.trim();
    fields.push({
      text,
      span: { start: offset + lead, end: offset + lead + text.length },
    });
    offset += part.length + 1;
  }
  return fields;
}

function isCount(text: string): boolean {
  return /^\d+$/.test(text) && Number.isSafeInteger(Number(text));
}

/**
 * Parse schedule text into entries, in textual order.
 *
 * Blank lines and lines starting with `#` are skipped. The first malformed
 * line aborts the whole parse with a `MalformedRuleError`.
 */
export function parseRules(text: string, options?: PatternOptions): Entry[] {
  const entries: Entry[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const lineNumber = index + 1;
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) return;

    const fields = splitFields(line);
    if (fields.length !== 3) {
      throw new MalformedRuleError(
        lineNumber,
        `3 fields separated by ':' are expected, but found ${fields.length}`,
        line,
        { span: { start: 0, end: line.length }, fieldCount: fields.length },
      );
    }
    const [sizeField, patternField, durationField] = fields;

    let size: ReservationSize;
    if (sizeField.text === "*") {
      size = ALL;
    } else if (isCount(sizeField.text)) {
      size = Number(sizeField.text);
    } else {
      throw new MalformedRuleError(
        lineNumber,
        `invalid reservation size "${sizeField.text}": expected a non-negative integer or "*"`,
        line,
        { span: sizeField.span },
      );
    }

    let pattern: CronPattern;
    try {
      pattern = CronPattern.parse(patternField.text, options);
    } catch (error) {
      if (error instanceof InvalidPatternError) {
        throw new MalformedRuleError(
          lineNumber,
          `invalid cron pattern "${patternField.text}": ${error.message}`,
          line,
          { span: patternField.span, cause: error },
        );
      }
      throw error;
    }

    const minutes = Number(durationField.text);
    if (
      !isCount(durationField.text) ||
      !Number.isSafeInteger(minutes * MINUTE_MS)
    ) {
      throw new MalformedRuleError(
        lineNumber,
        `invalid duration "${durationField.text}": expected a non-negative number of minutes`,
        line,
        { span: durationField.span },
      );
    }

    entries.push(new Entry(size, pattern, minutes * MINUTE_MS));
  });

  return entries;
}
