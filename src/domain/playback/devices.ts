export interface PlayerDevice {
  id: string;
  name: string;
  /** Device class reported by the service, e.g. `Smartphone` or `Computer`. */
  type: string;
  isActive: boolean;
}

function isHandheld(device: PlayerDevice): boolean {
  const type = device.type.toLowerCase();
  return type === 'smartphone' || type === 'mobile';
}

/**
 * Picks the device playback should run on: the configured name first, then
 * whichever device is already active, then a handheld, then anything listed.
 */
export function choosePlaybackDevice(devices: readonly PlayerDevice[], preferredName = ''): PlayerDevice | null {
  const wanted = preferredName.trim().toLowerCase();
  if (wanted) {
    const named = devices.find((device) => device.name.toLowerCase() === wanted);
    if (named) {
      return named;
    }
  }
  return devices.find((device) => device.isActive) ?? devices.find(isHandheld) ?? devices[0] ?? null;
}
