import { settingValueSchemas, type CombustionSettingsValues, type SettingKey } from "@shared/schema";
import type { IStorage } from "./storage";

export const DEFAULT_SETTINGS: CombustionSettingsValues = {
  unreachableTargetPolicy: "error",
  compositionSumTolerance: 1e-6,
};

export const SETTING_DESCRIPTIONS: Record<SettingKey, string> = {
  unreachableTargetPolicy: "\"error\" rejects targets outside 1-5× stoichiometric O2; \"clamp\" returns the bracket end",
  compositionSumTolerance: "Allowed deviation of the mole fraction total from 1",
};

const CACHE_TTL_MS = 30000;

let cachedSettings: Partial<CombustionSettingsValues> = {};
let cacheTimestamp = 0;

function isSettingKey(key: string): key is SettingKey {
  return Object.hasOwn(settingValueSchemas, key);
}

function assignSetting(target: Partial<CombustionSettingsValues>, key: SettingKey, value: unknown): void {
  if (key === "unreachableTargetPolicy") {
    const parsed = settingValueSchemas.unreachableTargetPolicy.safeParse(value);
    if (parsed.success) target.unreachableTargetPolicy = parsed.data;
    else console.warn(`[settings] Ignoring invalid ${key}:`, value);
  } else {
    const parsed = settingValueSchemas.compositionSumTolerance.safeParse(value);
    if (parsed.success) target.compositionSumTolerance = parsed.data;
    else console.warn(`[settings] Ignoring invalid ${key}:`, value);
  }
}

export async function getSettings(store: IStorage): Promise<CombustionSettingsValues> {
  const now = Date.now();
  if (now - cacheTimestamp > CACHE_TTL_MS) {
    try {
      const rows = await store.getAllSettings();
      const loaded: Partial<CombustionSettingsValues> = {};
      for (const row of rows) {
        if (isSettingKey(row.key)) assignSetting(loaded, row.key, row.value);
      }
      cachedSettings = loaded;
      cacheTimestamp = now;
    } catch (err) {
      console.error("Failed to load combustion settings from DB, using defaults:", err);
    }
  }

  return { ...DEFAULT_SETTINGS, ...cachedSettings };
}

export function invalidateSettingsCache() {
  cacheTimestamp = 0;
}

export { isSettingKey };
