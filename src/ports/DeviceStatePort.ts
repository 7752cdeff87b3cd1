export type DeviceAttributes = Record<string, unknown>;

export interface DeviceState {
  deviceId: string;
  name: string;
  /** Raw host state, e.g. `playing`, `idle`, `unavailable`. */
  state: string;
  available: boolean;
  reportedVolume: number | null;
  reportedPlayingRef: string | null;
  attributes: DeviceAttributes;
}

/**
 * Polled view of device state; `null` when the id does not resolve.
 */
export interface DeviceStatePort {
  getState(deviceId: string): Promise<DeviceState | null>;
  listDevices(prefix: string): Promise<DeviceState[]>;
}
