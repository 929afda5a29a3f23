import { z } from "zod";
import { createQuotaState } from "./quota.js";
import { QUOTA_SETTING_KEYS, type QuotaState, type SettingsStore } from "./types.js";

const LastAccessSetting = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));
const CallsMadeSetting = z.number().int().min(0);
const CallLimitSetting = z.number().int().positive();

/**
 * Maps QuotaState onto the three persisted quota settings.
 * Missing or malformed settings fall back to an unused quota under the
 * configured default limit.
 */
export class QuotaStore {
  constructor(
    private readonly settings: SettingsStore,
    private readonly defaultLimit: number
  ) {}

  load(): QuotaState {
    const fallback = createQuotaState(this.defaultLimit);

    const lastAccess = LastAccessSetting.safeParse(this.settings.get(QUOTA_SETTING_KEYS.lastAccess));
    const callsMade = CallsMadeSetting.safeParse(this.settings.get(QUOTA_SETTING_KEYS.callsMade));
    const callLimit = CallLimitSetting.safeParse(this.settings.get(QUOTA_SETTING_KEYS.callLimit));

    return {
      lastAccess: lastAccess.success ? lastAccess.data : fallback.lastAccess,
      callsMadeToday: callsMade.success ? callsMade.data : fallback.callsMadeToday,
      dailyLimit: callLimit.success ? callLimit.data : fallback.dailyLimit,
    };
  }

  /**
   * Persist today's usage. The daily limit is only written by `setDailyLimit`,
   * so a limit from configuration keeps applying until one is set explicitly.
   */
  async saveUsage(quota: QuotaState): Promise<void> {
    this.settings.set(QUOTA_SETTING_KEYS.lastAccess, quota.lastAccess?.toISOString() ?? null);
    this.settings.set(QUOTA_SETTING_KEYS.callsMade, quota.callsMadeToday);
    await this.settings.save();
  }

  /**
   * Persist a new daily limit, keeping today's usage.
   */
  async setDailyLimit(dailyLimit: number): Promise<QuotaState> {
    const limit = CallLimitSetting.parse(dailyLimit);
    this.settings.set(QUOTA_SETTING_KEYS.callLimit, limit);
    await this.settings.save();
    return { ...this.load(), dailyLimit: limit };
  }

  /**
   * Forget usage history; the limit is kept.
   */
  async reset(): Promise<QuotaState> {
    const next = createQuotaState(this.load().dailyLimit);
    await this.saveUsage(next);
    return next;
  }
}
