import type { DeviceState, DeviceStatePort } from '@/ports/DeviceStatePort';
import type { EntityState, HomeAssistantClient } from '@/adapters/homeassistant/homeAssistantClient';
import { isFiniteNumber, normalizeString } from '@/shared/utils/guards';

const UNAVAILABLE_STATES = new Set(['unavailable']);

export function toDeviceState(entity: EntityState): DeviceState {
  const attrs = entity.attributes;
  return {
    deviceId: entity.entity_id,
    name: normalizeString(attrs.friendly_name) ?? entity.entity_id,
    state: entity.state,
    available: !UNAVAILABLE_STATES.has(entity.state),
    reportedVolume: isFiniteNumber(attrs.volume_level) ? attrs.volume_level : null,
    reportedPlayingRef: normalizeString(attrs.media_content_id) ?? null,
    attributes: attrs,
  };
}

export class HomeAssistantDeviceState implements DeviceStatePort {
  constructor(private readonly client: HomeAssistantClient) {}

  public async getState(deviceId: string): Promise<DeviceState | null> {
    const entity = await this.client.getState(deviceId);
    return entity ? toDeviceState(entity) : null;
  }

  public async listDevices(prefix: string): Promise<DeviceState[]> {
    const entities = await this.client.listStates();
    return entities.filter((entity) => entity.entity_id.startsWith(prefix)).map(toDeviceState);
  }
}
