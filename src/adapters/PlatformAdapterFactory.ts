import { IPlatformAdapter, Platform } from './interfaces/IPlatformAdapter';
import { AdapterOptions } from './base/BaseAdapter';
import { InstagramAdapter } from './instagram/InstagramAdapter';

/**
 * Factory class for creating platform adapters
 */
export class PlatformAdapterFactory {
  /**
   * Creates a platform adapter bound to one page of an account session
   * @throws Error if the platform is not supported
   */
  static create(platform: Platform, options: AdapterOptions): IPlatformAdapter {
    switch (platform) {
      case 'instagram':
        return new InstagramAdapter(options);
      default:
        throw new Error(`Unsupported platform: ${String(platform)}`);
    }
  }
}
