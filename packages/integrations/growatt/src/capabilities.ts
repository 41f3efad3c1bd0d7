import type { VendorCapabilities } from '@growatt-dashboard/integrations-core';

export const GROWATT_CAPABILITIES: VendorCapabilities = {
  brand: 'GROWATT',
  polling: {
    maxRequestsPerMinute: 30,
    recommendedMinIntervalSeconds: 300, // charts move in 5 minute slots
    powerSlotMinutes: 5,
  },
  features: {
    supportsPowerSeries: true,
    supportsEnergySeries: true,
    supportsDeviceHistory: true,
    supportsDeviceList: true,
  },
};
