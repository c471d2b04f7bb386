import type { Setting, SettingInput } from '../types';
import { SettingSchema, validateDomain } from '../schemas/domainSchemas';

export function createSetting(input: SettingInput): Setting {
  const parsed = validateDomain(SettingSchema, 'Setting', {
    id: input.id ?? 0,
    key: input.key,
    value: input.value,
    description: input.description ?? null,
    timestamp: input.timestamp ?? new Date(),
  });
  return Object.freeze(parsed);
}

export function updateSettingValue(setting: Setting, value: string, now: Date = new Date()): Setting {
  return createSetting({ ...setting, value, timestamp: now });
}

export function withSettingId(setting: Setting, id: number): Setting {
  return createSetting({ ...setting, id });
}

export function settingAsBoolean(setting: Setting): boolean {
  return setting.value.trim().toLowerCase() === 'true';
}

export function settingAsInt(setting: Setting): number | null {
  const trimmed = setting.value.trim();
  return /^[-+]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

export function settingAsFloat(setting: Setting): number | null {
  const trimmed = setting.value.trim();
  if (trimmed === '') {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function settingAsDate(setting: Setting): Date | null {
  const value = new Date(setting.value.trim());
  return Number.isNaN(value.getTime()) ? null : value;
}
