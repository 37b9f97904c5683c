import { FingerprintGenerator } from 'fingerprint-generator';
import { FingerprintInjector } from 'fingerprint-injector';
import { BrowserContext } from 'playwright';

const BLOCKED_RESOURCE_TYPES = ['image', 'font', 'stylesheet', 'media'];

const generator = new FingerprintGenerator({
  browsers: [{ name: 'chrome', minVersion: 120 }],
  devices: ['desktop'],
  operatingSystems: ['windows', 'linux', 'macos'],
});

const injector = new FingerprintInjector();

export interface StealthOptions {
  blockResources: boolean;
}

export const applyStealthToContext = async (context: BrowserContext, { blockResources }: StealthOptions): Promise<void> => {
  const fingerprint = generator.getFingerprint();
  await injector.attachFingerprintToPlaywright(context, fingerprint);
  await context.setExtraHTTPHeaders({
    'accept-language': 'en-US,en;q=0.9',
    'sec-ch-ua-mobile': '?0',
    'upgrade-insecure-requests': '1',
  });
  if (blockResources) await blockHeavyResources(context);
};

export const blockHeavyResources = (context: BrowserContext): Promise<void> =>
  context.route('**/*', (route) => {
    if (BLOCKED_RESOURCE_TYPES.includes(route.request().resourceType())) {
      return route.abort();
    }
    return route.continue();
  });
