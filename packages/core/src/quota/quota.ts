import type { QuotaState } from "./types.js";

/**
 * Local calendar day as a sortable number, e.g. 20261019.
 */
function dayKey(date: Date): number {
  return date.getFullYear() * 10_000 + (date.getMonth() + 1) * 100 + date.getDate();
}

/**
 * True when `now` falls on a later local calendar day than `then`.
 */
export function isLaterDay(now: Date, then: Date): boolean {
  return dayKey(now) > dayKey(then);
}

/**
 * An uninitialized quota with the given limit.
 */
export function createQuotaState(dailyLimit: number): QuotaState {
  return { lastAccess: null, callsMadeToday: 0, dailyLimit };
}

/**
 * Whether another remote call fits in today's allowance.
 *
 * True if the quota was never used, if the last call was on an earlier day,
 * or if fewer than `dailyLimit` calls were made today.
 */
export function canCallApi(quota: QuotaState, now: Date = new Date()): boolean {
  if (quota.lastAccess === null) {
    return true;
  }
  return isLaterDay(now, quota.lastAccess) || quota.callsMadeToday < quota.dailyLimit;
}

/**
 * Count one remote call made at `now`. The counter restarts at 1 on a new day.
 */
export function recordApiCall(quota: QuotaState, now: Date = new Date()): QuotaState {
  const newDay = quota.lastAccess === null || isLaterDay(now, quota.lastAccess);
  return {
    ...quota,
    lastAccess: now,
    callsMadeToday: newDay ? 1 : quota.callsMadeToday + 1,
  };
}

/**
 * Calls still available today, never negative.
 */
export function remainingCalls(quota: QuotaState, now: Date = new Date()): number {
  if (quota.lastAccess === null || isLaterDay(now, quota.lastAccess)) {
    return quota.dailyLimit;
  }
  return Math.max(0, quota.dailyLimit - quota.callsMadeToday);
}
