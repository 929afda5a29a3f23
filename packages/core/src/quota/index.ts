export {
  canCallApi,
  createQuotaState,
  isLaterDay,
  recordApiCall,
  remainingCalls,
} from "./quota.js";
export { QuotaStore } from "./quota-store.js";
export { JsonSettingsStore, MemorySettingsStore } from "./settings-store.js";
export { QUOTA_SETTING_KEYS, type QuotaState, type SettingsStore, type SettingValue } from "./types.js";
