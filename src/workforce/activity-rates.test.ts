import { describe, expect, it } from "vitest";
import {
  DEFAULT_ACTIVITY_RATE,
  DEPARTMENT_ACTIVITY_RATES,
  DEPARTMENTS,
  isWithinWorkHours,
  lookupActivityRate,
  validateActivityRate,
} from "./activity-rates.js";

describe("department activity rates", () => {
  it("maps every department exactly once", () => {
    expect(Object.keys(DEPARTMENT_ACTIVITY_RATES).sort()).toEqual([...DEPARTMENTS].sort());
  });

  it("keeps every work window ordered and every model valid", () => {
    for (const department of DEPARTMENTS) {
      const model = lookupActivityRate(department);
      expect(model.workStartHour).toBeLessThan(model.workEndHour);
      expect(validateActivityRate(model)).toEqual([]);
    }
    expect(validateActivityRate(DEFAULT_ACTIVITY_RATE)).toEqual([]);
  });

  it("returns the department-specific rates", () => {
    expect(lookupActivityRate("engineering").chatMessagesPerHour).toBe(15);
    expect(lookupActivityRate("sales").messagesPerHour).toBe(12);
    expect(lookupActivityRate("finance").documentsPerDay).toBe(8);
    expect(lookupActivityRate("executive").meetingsPerDay).toBe(10);
  });

  it("normalizes case and whitespace", () => {
    expect(lookupActivityRate("  Sales ")).toBe(DEPARTMENT_ACTIVITY_RATES.sales);
  });

  it("falls back to the default model for unmapped departments", () => {
    expect(lookupActivityRate("legal")).toBe(DEFAULT_ACTIVITY_RATE);
    expect(lookupActivityRate("")).toBe(DEFAULT_ACTIVITY_RATE);
  });

  it("rejects inverted windows and out-of-range values", () => {
    const problems = validateActivityRate({
      ...DEFAULT_ACTIVITY_RATE,
      messagesPerHour: -1,
      varianceFraction: 1,
      workStartHour: 18,
      workEndHour: 9,
    });
    expect(problems).toEqual([
      "'messagesPerHour' must be a non-negative number",
      "'varianceFraction' must be in [0, 1)",
      "'workStartHour' must be earlier than 'workEndHour'",
    ]);
  });

  it("treats the window as start-inclusive and end-exclusive", () => {
    expect(isWithinWorkHours(DEFAULT_ACTIVITY_RATE, 7)).toBe(false);
    expect(isWithinWorkHours(DEFAULT_ACTIVITY_RATE, 8)).toBe(true);
    expect(isWithinWorkHours(DEFAULT_ACTIVITY_RATE, 16)).toBe(true);
    expect(isWithinWorkHours(DEFAULT_ACTIVITY_RATE, 17)).toBe(false);
  });
});
