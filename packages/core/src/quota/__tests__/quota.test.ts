import { describe, expect, it } from "vitest";
import { canCallApi, createQuotaState, isLaterDay, recordApiCall, remainingCalls } from "../quota.js";
import type { QuotaState } from "../types.js";

const at = (y: number, m: number, d: number, h = 12): Date => new Date(y, m - 1, d, h);

describe("isLaterDay", () => {
  it("compares local calendar days, not times", () => {
    expect(isLaterDay(at(2026, 10, 19, 23), at(2026, 10, 19, 1))).toBe(false);
    expect(isLaterDay(at(2026, 10, 20, 0), at(2026, 10, 19, 23))).toBe(true);
  });

  it("handles the turn of the year", () => {
    // Day-of-year alone would say 1 < 365
    expect(isLaterDay(at(2027, 1, 1), at(2026, 12, 31))).toBe(true);
  });

  it("is false when the clock moved backwards", () => {
    expect(isLaterDay(at(2026, 10, 18), at(2026, 10, 19))).toBe(false);
  });
});

describe("canCallApi", () => {
  const today = at(2026, 10, 19, 15);

  it("returns true for an uninitialized quota", () => {
    expect(canCallApi(createQuotaState(0), today)).toBe(true);
  });

  it("returns true while calls made today are under the limit", () => {
    const quota: QuotaState = { lastAccess: at(2026, 10, 19, 9), callsMadeToday: 1, dailyLimit: 2 };
    expect(canCallApi(quota, today)).toBe(true);
  });

  it("returns false once today's limit is reached", () => {
    const quota: QuotaState = { lastAccess: at(2026, 10, 19, 9), callsMadeToday: 2, dailyLimit: 2 };
    expect(canCallApi(quota, today)).toBe(false);
  });

  it("returns true on a later day even if the counter is over the limit", () => {
    const quota: QuotaState = { lastAccess: at(2026, 10, 18, 22), callsMadeToday: 5, dailyLimit: 2 };
    expect(canCallApi(quota, today)).toBe(true);
  });

  it("matches date(now) > date(lastAccess) OR calls < limit across a grid", () => {
    const lastDays = [at(2026, 10, 18), at(2026, 10, 19), at(2026, 10, 20)];
    for (const lastAccess of lastDays) {
      for (const callsMadeToday of [0, 1, 2, 3]) {
        const quota: QuotaState = { lastAccess, callsMadeToday, dailyLimit: 2 };
        const expected = lastAccess.getDate() < today.getDate() || callsMadeToday < 2;
        expect(canCallApi(quota, today)).toBe(expected);
      }
    }
  });
});

describe("recordApiCall", () => {
  it("starts counting at 1 for an uninitialized quota", () => {
    const now = at(2026, 10, 19);
    expect(recordApiCall(createQuotaState(3), now)).toEqual({
      lastAccess: now,
      callsMadeToday: 1,
      dailyLimit: 3,
    });
  });

  it("increments within the same day", () => {
    const quota: QuotaState = { lastAccess: at(2026, 10, 19, 8), callsMadeToday: 1, dailyLimit: 3 };
    const now = at(2026, 10, 19, 9);
    expect(recordApiCall(quota, now)).toEqual({ lastAccess: now, callsMadeToday: 2, dailyLimit: 3 });
  });

  it("restarts the counter on a new day", () => {
    const quota: QuotaState = { lastAccess: at(2026, 10, 18), callsMadeToday: 3, dailyLimit: 3 };
    const now = at(2026, 10, 19);
    expect(recordApiCall(quota, now).callsMadeToday).toBe(1);
  });

  it("does not mutate the input state", () => {
    const quota = createQuotaState(3);
    recordApiCall(quota, at(2026, 10, 19));
    expect(quota).toEqual({ lastAccess: null, callsMadeToday: 0, dailyLimit: 3 });
  });
});

describe("remainingCalls", () => {
  const today = at(2026, 10, 19, 15);

  it("reports the full limit for a fresh or stale quota", () => {
    expect(remainingCalls(createQuotaState(10), today)).toBe(10);
    expect(
      remainingCalls({ lastAccess: at(2026, 10, 18), callsMadeToday: 10, dailyLimit: 10 }, today)
    ).toBe(10);
  });

  it("subtracts today's calls and never goes negative", () => {
    expect(
      remainingCalls({ lastAccess: at(2026, 10, 19, 9), callsMadeToday: 4, dailyLimit: 10 }, today)
    ).toBe(6);
    expect(
      remainingCalls({ lastAccess: at(2026, 10, 19, 9), callsMadeToday: 12, dailyLimit: 10 }, today)
    ).toBe(0);
  });
});
