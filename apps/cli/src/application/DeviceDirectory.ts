/**
 * Device lookup against the Spotify devices endpoint
 */

import type { Logger } from 'pino';
import { IDeviceDirectory, PlaybackDevice } from '../domain/controller';
import { ISpotifyWebApi, SpotifyDevice } from '../infrastructure/spotify';
import { describeError } from './errorMapping';

export class DeviceDirectory implements IDeviceDirectory {
  constructor(
    private readonly api: ISpotifyWebApi,
    private readonly logger: Logger
  ) {}

  /**
   * Find a device by name: exact (case-insensitive) match first, then substring
   */
  async findDevice(deviceName: string): Promise<PlaybackDevice | null> {
    const needle = deviceName.trim().toLowerCase();
    if (needle.length === 0) {
      return null;
    }

    const devices = await this.api.getDevices();
    const addressable = devices.filter((device): device is SpotifyDevice & { id: string } => device.id !== null);

    const match =
      addressable.find(device => device.name.toLowerCase() === needle) ??
      addressable.find(device => device.name.toLowerCase().includes(needle));

    if (!match) {
      this.logger.debug({ deviceName, available: devices.map(d => d.name) }, 'Device not listed');
      return null;
    }

    return {
      id: match.id,
      name: match.name,
      isActive: match.is_active,
      volume: match.volume_percent
    };
  }

  /**
   * Lookup failures count as "not visible yet"
   */
  async isDeviceVisible(deviceName: string): Promise<boolean> {
    try {
      return (await this.findDevice(deviceName)) !== null;
    } catch (error) {
      this.logger.debug({ deviceName, error: describeError(error) }, 'Device lookup failed');
      return false;
    }
  }
}
