import type { DeviceAttributes } from '@/ports/DeviceStatePort';
import { normalizeString } from '@/shared/utils/guards';

export type ClassificationRules = {
  namePatterns: readonly string[];
  integrations: readonly string[];
};

export type DeviceCapabilities = {
  isQuirky: boolean;
};

const INTEGRATION_ATTRIBUTES = ['integration', 'platform', 'device_class'] as const;

/**
 * Decides from observable metadata whether a player needs snapshot/restore and
 * content-type negotiation. Anything unknown gets standard single-shot playback.
 */
export function classifyDevice(
  deviceId: string,
  attributes: DeviceAttributes | null | undefined,
  rules: ClassificationRules,
): DeviceCapabilities {
  const attrs = attributes ?? {};
  const names = [deviceId, normalizeString(attrs.friendly_name) ?? '']
    .map((value) => value.toLowerCase())
    .filter(Boolean);
  if (rules.namePatterns.some((pattern) => pattern && names.some((name) => name.includes(pattern)))) {
    return { isQuirky: true };
  }

  const tags = INTEGRATION_ATTRIBUTES.map((key) => normalizeString(attrs[key])?.toLowerCase()).filter(
    (tag): tag is string => Boolean(tag),
  );
  if (tags.some((tag) => rules.integrations.includes(tag))) {
    return { isQuirky: true };
  }

  const members = attrs.group_members;
  if (Array.isArray(members) && members.length > 0) {
    return { isQuirky: true };
  }

  return { isQuirky: false };
}

export class DeviceCapabilityClassifier {
  constructor(private readonly rules: () => ClassificationRules) {}

  public classify(deviceId: string, attributes: DeviceAttributes | null | undefined): DeviceCapabilities {
    return classifyDevice(deviceId, attributes, this.rules());
  }
}
