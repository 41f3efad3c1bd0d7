import {
  type NormalizedDevice,
  type VendorCapabilities,
  BaseMockAdapter,
} from '@growatt-dashboard/integrations-core';
import { hasDeviceHistory } from './adapter.js';
import { GROWATT_CAPABILITIES } from './capabilities.js';

export { GrowattAdapter, DEFAULT_GROWATT_BASE_URL, hasDeviceHistory, sessionCookie } from './adapter.js';
export type { GrowattAdapterOptions } from './adapter.js';
export { GROWATT_CAPABILITIES } from './capabilities.js';

/**
 * Growatt Mock Adapter (Fixture-based)
 *
 * Loads data from fixtures/growatt/mock-data.json
 * NO external API calls
 */
export class MockGrowattAdapter extends BaseMockAdapter {
  constructor(fixturesBasePath?: string) {
    super('GROWATT', fixturesBasePath);
  }

  protected hasHistory(device: NormalizedDevice): boolean {
    return hasDeviceHistory(device);
  }

  getCapabilities(): VendorCapabilities {
    return GROWATT_CAPABILITIES;
  }
}
