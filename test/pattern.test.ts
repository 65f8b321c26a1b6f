import { describe, expect, it } from "vitest";
import { ConfigurationError, InvalidPatternError } from "../src/error.js";
import { CronPattern, MINUTE_MS, truncateToMinute } from "../src/pattern.js";

function at(iso: string): number {
  return Date.parse(iso);
}

// =============================================================================
// Floor / ceil
// =============================================================================

describe("floor and ceil", () => {
  const weekdays = CronPattern.parse("0 9 * * 1-5");

  it("brackets a timestamp between occurrences", () => {
    // 2026-02-11 is a Wednesday
    const t = at("2026-02-11T10:00:00Z");
    expect(weekdays.floor(t)).toBe(at("2026-02-11T09:00:00Z"));
    expect(weekdays.ceil(t)).toBe(at("2026-02-12T09:00:00Z"));
  });

  it("is inclusive at an exact occurrence", () => {
    const t = at("2026-02-11T09:00:00Z");
    expect(weekdays.floor(t)).toBe(t);
    expect(weekdays.ceil(t)).toBe(t);
  });

  it("truncates seconds and milliseconds before comparing", () => {
    const t = at("2026-02-11T09:00:45.500Z");
    expect(weekdays.floor(t)).toBe(at("2026-02-11T09:00:00Z"));
    expect(weekdays.ceil(t)).toBe(at("2026-02-11T09:00:00Z"));
  });

  it("skips the weekend", () => {
    expect(weekdays.ceil(at("2026-02-13T18:00:00Z"))).toBe(
      at("2026-02-16T09:00:00Z"),
    );
    expect(weekdays.floor(at("2026-02-15T12:00:00Z"))).toBe(
      at("2026-02-13T09:00:00Z"),
    );
  });

  it("crosses year boundaries", () => {
    const yearly = CronPattern.parse("@yearly");
    const t = at("2026-06-15T00:00:00Z");
    expect(yearly.floor(t)).toBe(at("2026-01-01T00:00:00Z"));
    expect(yearly.ceil(t)).toBe(at("2027-01-01T00:00:00Z"));
  });

  it("steps within and across hours", () => {
    const quarter = CronPattern.parse("*/15 * * * *");
    expect(quarter.floor(at("2026-02-11T10:07:00Z"))).toBe(
      at("2026-02-11T10:00:00Z"),
    );
    expect(quarter.ceil(at("2026-02-11T10:07:00Z"))).toBe(
      at("2026-02-11T10:15:00Z"),
    );
    expect(quarter.ceil(at("2026-02-11T23:50:00Z"))).toBe(
      at("2026-02-12T00:00:00Z"),
    );
  });

  it("rolls back to the previous hour and day", () => {
    expect(
      CronPattern.parse("45 * * * *").floor(at("2026-02-11T10:07:00Z")),
    ).toBe(at("2026-02-11T09:45:00Z"));
    expect(
      CronPattern.parse("30 23 * * *").floor(at("2026-02-11T00:10:00Z")),
    ).toBe(at("2026-02-10T23:30:00Z"));
  });

  it("finds leap days", () => {
    const leap = CronPattern.parse("0 0 29 2 *");
    const t = at("2026-03-01T00:00:00Z");
    expect(leap.ceil(t)).toBe(at("2028-02-29T00:00:00Z"));
    expect(leap.floor(t)).toBe(at("2024-02-29T00:00:00Z"));
  });

  it("requires day-of-month and day-of-week to match together", () => {
    // Feb 29th that is also a Monday: 2016 and 2044
    const rare = CronPattern.parse("0 0 29 2 1");
    const t = at("2026-02-11T10:00:00Z");
    expect(rare.floor(t)).toBe(at("2016-02-29T00:00:00Z"));
    expect(rare.ceil(t)).toBe(at("2044-02-29T00:00:00Z"));
  });
});

// =============================================================================
// Search horizon
// =============================================================================

describe("search horizon", () => {
  const t = at("2026-02-11T10:00:00Z");

  it("accepts patterns that can never match", () => {
    expect(() => CronPattern.parse("0 0 31 2 *")).not.toThrow();
  });

  it("fails instead of looping when no occurrence exists", () => {
    const never = CronPattern.parse("0 0 31 2 *", { searchHorizonYears: 2 });
    expect(() => never.ceil(t)).toThrow(
      'pattern "0 0 31 2 *" has no occurrence within 2 years after 2026-02-11T10:00:00Z',
    );
    expect(() => never.floor(t)).toThrow(InvalidPatternError);
  });

  it("gives up on rare patterns beyond a short horizon", () => {
    const rare = CronPattern.parse("0 0 29 2 1", { searchHorizonYears: 10 });
    expect(() => rare.ceil(t)).toThrow(InvalidPatternError);
    expect(rare.floor(t)).toBe(at("2016-02-29T00:00:00Z"));
  });
});

// =============================================================================
// Time zones
// =============================================================================

describe("time zones", () => {
  it("reads wall-clock fields in the configured zone", () => {
    const nine = CronPattern.parse("0 9 * * *", {
      timeZone: "America/New_York",
    });
    const t = at("2026-02-11T12:00:00Z"); // 07:00 EST
    expect(nine.ceil(t)).toBe(at("2026-02-11T14:00:00Z"));
    expect(nine.floor(t)).toBe(at("2026-02-10T14:00:00Z"));
  });

  it("shifts wall times in a skipped hour forward", () => {
    // 2026-03-08: clocks jump from 02:00 EST (07:00Z) to 03:00 EDT
    const gap = CronPattern.parse("30 2 * * *", {
      timeZone: "America/New_York",
    });
    expect(gap.ceil(at("2026-03-08T05:00:00Z"))).toBe(
      at("2026-03-08T07:30:00Z"),
    );
    expect(gap.ceil(at("2026-03-08T07:10:00Z"))).toBe(
      at("2026-03-08T07:30:00Z"),
    );
    expect(gap.ceil(at("2026-03-08T07:31:00Z"))).toBe(
      at("2026-03-09T06:30:00Z"),
    );
    expect(gap.floor(at("2026-03-08T07:45:00Z"))).toBe(
      at("2026-03-08T07:30:00Z"),
    );
    // 03:15 EDT is before the shifted occurrence (03:30 EDT)
    expect(gap.floor(at("2026-03-08T07:15:00Z"))).toBe(
      at("2026-03-07T07:30:00Z"),
    );
    expect(gap.matches(at("2026-03-08T07:30:00Z"))).toBe(true);
    expect(gap.matches(at("2026-03-08T07:45:00Z"))).toBe(false);
  });

  describe("repeated hour", () => {
    // 2026-11-01: 01:00-01:59 New York time happens twice, first at
    // 05:00Z (EDT) and again at 06:00Z (EST)
    const zone = { timeZone: "America/New_York" };
    const hourly = CronPattern.parse("0 * * * *", zone);

    it("matches both passes", () => {
      expect(hourly.matches(at("2026-11-01T05:00:00Z"))).toBe(true);
      expect(hourly.matches(at("2026-11-01T06:00:00Z"))).toBe(true);
    });

    it("floors to the latest pass", () => {
      expect(hourly.floor(at("2026-11-01T05:10:00Z"))).toBe(
        at("2026-11-01T05:00:00Z"),
      );
      expect(hourly.floor(at("2026-11-01T06:10:00Z"))).toBe(
        at("2026-11-01T06:00:00Z"),
      );
      expect(
        CronPattern.parse("45 * * * *", zone).floor(at("2026-11-01T06:10:00Z")),
      ).toBe(at("2026-11-01T05:45:00Z"));
    });

    it("ceils to the next pass", () => {
      expect(hourly.ceil(at("2026-11-01T05:10:00Z"))).toBe(
        at("2026-11-01T06:00:00Z"),
      );
      expect(hourly.ceil(at("2026-11-01T06:10:00Z"))).toBe(
        at("2026-11-01T07:00:00Z"),
      );
    });

    it("yields every quarter hour of both passes", () => {
      const quarter = CronPattern.parse("*/15 * * * *", zone);
      const results: number[] = [];
      for (const t of quarter.occurrences(at("2026-11-01T05:40:00Z"))) {
        results.push(t);
        if (results.length >= 6) break;
      }
      expect(results).toEqual([
        at("2026-11-01T05:45:00Z"),
        at("2026-11-01T06:00:00Z"),
        at("2026-11-01T06:15:00Z"),
        at("2026-11-01T06:30:00Z"),
        at("2026-11-01T06:45:00Z"),
        at("2026-11-01T07:00:00Z"),
      ]);
      expect(quarter.floor(at("2026-11-01T06:10:00Z"))).toBe(
        at("2026-11-01T06:00:00Z"),
      );
    });
  });

  it("rejects unknown zones", () => {
    expect(() =>
      CronPattern.parse("* * * * *", { timeZone: "Mars/Olympus" }),
    ).toThrow(ConfigurationError);
  });
});

// =============================================================================
// Matching and iteration
// =============================================================================

describe("matches", () => {
  const weekdays = CronPattern.parse("0 9 * * 1-5");

  it("matches the minute containing the timestamp", () => {
    expect(weekdays.matches(at("2026-02-11T09:00:30Z"))).toBe(true);
    expect(weekdays.matches(at("2026-02-11T09:01:00Z"))).toBe(false);
  });

  it("does not match on Saturday", () => {
    expect(weekdays.matches(at("2026-02-14T09:00:00Z"))).toBe(false);
  });
});

describe("occurrences", () => {
  it("yields successive occurrences lazily", () => {
    const sixHourly = CronPattern.parse("0 */6 * * *");
    const results: number[] = [];
    for (const t of sixHourly.occurrences(at("2026-02-11T05:00:00Z"))) {
      results.push(t);
      if (results.length >= 3) break;
    }
    expect(results).toEqual([
      at("2026-02-11T06:00:00Z"),
      at("2026-02-11T12:00:00Z"),
      at("2026-02-11T18:00:00Z"),
    ]);
  });
});

describe("validate", () => {
  it("reports whether a pattern parses", () => {
    expect(CronPattern.validate("0 9 * * 1-5")).toBe(true);
    expect(CronPattern.validate("0 9 * *")).toBe(false);
  });
});

describe("source", () => {
  it("keeps the trimmed text", () => {
    const pattern = CronPattern.parse("  @daily ");
    expect(pattern.source).toBe("@daily");
    expect(pattern.toString()).toBe("@daily");
    expect(pattern.timeZone).toBe("UTC");
    expect(pattern.searchHorizonYears).toBe(30);
    expect(Object.isFrozen(pattern)).toBe(true);
  });
});

// =============================================================================
// Properties
// =============================================================================

describe("floor/ceil properties", () => {
  const patterns = [
    "0 9 * * 1-5",
    "*/7 * * * *",
    "30 2 1,15 * *",
    "0 0 * JUN-AUG SAT",
    "@hourly",
  ].map((p) => CronPattern.parse(p));

  // A spread of instants, including sub-minute offsets
  const samples: number[] = [];
  for (let i = 0; i < 40; i++) {
    samples.push(at("2026-01-01T00:00:00Z") + i * 7_919_123);
  }

  it("floor is a matching instant at or before t", () => {
    for (const pattern of patterns) {
      for (const t of samples) {
        const floor = pattern.floor(t);
        expect(floor).toBeLessThanOrEqual(t);
        expect(pattern.matches(floor)).toBe(true);
      }
    }
  });

  it("ceil is a matching instant at or after the truncated t", () => {
    for (const pattern of patterns) {
      for (const t of samples) {
        const ceil = pattern.ceil(t);
        expect(ceil).toBeGreaterThanOrEqual(truncateToMinute(t));
        expect(pattern.matches(ceil)).toBe(true);
      }
    }
  });

  it("floor and ceil agree when t matches", () => {
    for (const pattern of patterns) {
      for (const t of samples) {
        const occurrence = pattern.ceil(t);
        expect(pattern.floor(occurrence)).toBe(occurrence);
        expect(pattern.ceil(occurrence + MINUTE_MS - 1)).toBe(occurrence);
      }
    }
  });
});

describe("floor/ceil properties across offset changes", () => {
  const zone = { timeZone: "America/New_York" };
  const patterns = ["*/15 * * * *", "30 2 * * *", "45 1 * * *", "@hourly"].map(
    (p) => CronPattern.parse(p, zone),
  );

  // Every 7 minutes through both 2026 transition nights
  const samples: number[] = [];
  for (const start of ["2026-03-08T04:00:00Z", "2026-11-01T03:00:00Z"]) {
    for (let i = 0; i < 60; i++) {
      samples.push(at(start) + i * 7 * MINUTE_MS);
    }
  }

  it("floor and ceil bracket t with matching instants", () => {
    for (const pattern of patterns) {
      for (const t of samples) {
        const floor = pattern.floor(t);
        const ceil = pattern.ceil(t);
        expect(floor).toBeLessThanOrEqual(t);
        expect(ceil).toBeGreaterThanOrEqual(t);
        expect(pattern.matches(floor)).toBe(true);
        expect(pattern.matches(ceil)).toBe(true);
      }
    }
  });
});
