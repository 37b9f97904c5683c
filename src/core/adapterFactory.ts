import { AdapterContext } from '../adapters/common';
import { FacebookAdapter } from '../adapters/facebook';
import { GoogleMapsAdapter } from '../adapters/google_maps';
import { InstagramAdapter } from '../adapters/instagram';
import { LinkedInAdapter } from '../adapters/linkedin';
import { MediumAdapter } from '../adapters/medium';
import { XAdapter } from '../adapters/x';
import { PlatformAdapter } from './capabilities';
import { ConfigurationError } from './errors';
import { SupportedPlatform } from './types';

export type AdapterFactory = (context: AdapterContext) => PlatformAdapter;

export const ADAPTER_FACTORIES: Record<SupportedPlatform, AdapterFactory> = {
  linkedin: (context) => new LinkedInAdapter(context),
  x: (context) => new XAdapter(context),
  google_maps: (context) => new GoogleMapsAdapter(context),
  facebook: (context) => new FacebookAdapter(context),
  instagram: (context) => new InstagramAdapter(context),
  medium: (context) => new MediumAdapter(context),
};

export const isSupportedPlatform = (platform: string): platform is SupportedPlatform =>
  Object.prototype.hasOwnProperty.call(ADAPTER_FACTORIES, platform);

/** Builds adapters on first use, so a platform nobody asked for never reads its credentials. */
export class AdapterRegistry {
  private readonly instances = new Map<SupportedPlatform, PlatformAdapter>();

  constructor(
    private readonly context: AdapterContext,
    private readonly factories: Partial<Record<SupportedPlatform, AdapterFactory>> = ADAPTER_FACTORIES,
  ) {}

  has(platform: SupportedPlatform): boolean {
    return this.factories[platform] !== undefined;
  }

  get(platform: SupportedPlatform): PlatformAdapter {
    const cached = this.instances.get(platform);
    if (cached) return cached;

    const factory = this.factories[platform];
    if (!factory) throw new ConfigurationError(`No adapter registered for ${platform}`, { platform });
    const adapter = factory(this.context);
    this.instances.set(platform, adapter);
    return adapter;
  }
}
