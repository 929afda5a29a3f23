// ============================================
// Quota Types
// ============================================

/**
 * Daily API call allowance and how much of it has been used.
 *
 * `callsMadeToday` belongs to the calendar day of `lastAccess`; once the
 * local date moves past that day the counter is treated as zero.
 */
export interface QuotaState {
  /** Time of the last counted call, or null if the API was never called */
  readonly lastAccess: Date | null;
  /** Calls counted on the day of lastAccess */
  readonly callsMadeToday: number;
  /** Maximum calls per calendar day */
  readonly dailyLimit: number;
}

/**
 * Scalar values a settings store can hold.
 */
export type SettingValue = string | number | boolean | null;

/**
 * Minimal persisted key-value store.
 */
export interface SettingsStore {
  get(key: string): SettingValue | undefined;
  set(key: string, value: SettingValue): void;
  /** Persist pending changes */
  save(): Promise<void>;
}

/**
 * Names of the persisted quota settings.
 */
export const QUOTA_SETTING_KEYS = {
  lastAccess: "lastAccess",
  callsMade: "numApiCallsMadeSinceLastAccess",
  callLimit: "apiCallLimit",
} as const;
