/**
 * Vendor Integration Contracts
 *
 * Every vendor adapter the collector can poll implements these interfaces.
 * Values leaving an adapter are already normalized: timestamps are Dates,
 * readings are plain numbers.
 */

// ============================================================================
// VENDOR ADAPTER INTERFACE
// ============================================================================

export interface VendorAdapter {
  /**
   * Log in with account credentials and return the session to reuse
   */
  login(creds: VendorCredentials): Promise<VendorSession>;

  /**
   * List plants owned by the authenticated account
   */
  listPlants(session: VendorSession): Promise<PlantListing[]>;

  /**
   * List devices (inverters, storage units) attached to a plant
   */
  getPlantDevices(ref: PlantReference, session: VendorSession): Promise<NormalizedDevice[]>;

  /**
   * Get the intraday power curve of a plant for one local calendar day
   */
  getPowerSeries(
    ref: PlantReference,
    session: VendorSession,
    day: string
  ): Promise<NormalizedSeries>;

  /**
   * Get the daily energy totals of a plant for one local calendar month
   */
  getEnergySeries(
    ref: PlantReference,
    session: VendorSession,
    month: string
  ): Promise<NormalizedSeries>;

  /**
   * Get the raw history logs of one device for one local calendar day
   */
  getDeviceHistory(
    ref: PlantReference,
    device: NormalizedDevice,
    session: VendorSession,
    day: string
  ): Promise<NormalizedSeries>;

  /**
   * Get adapter capabilities (rate limits, features)
   */
  getCapabilities(): VendorCapabilities;
}

// ============================================================================
// INPUT TYPES
// ============================================================================

export interface VendorCredentials {
  username: string;
  password: string;
}

export interface VendorSession {
  /** Opaque credential sent back with every request */
  token: string;
  acquiredAt: Date;
}

export interface PlantReference {
  /** Plant external ID from vendor */
  vendorPlantId: string;
  /** IANA zone the vendor reports the plant's charts in */
  timezone: string;
}

// ============================================================================
// OUTPUT TYPES (NORMALIZED)
// ============================================================================

export interface PlantListing {
  id: string;
  name: string;
}

export interface NormalizedDevice {
  sn: string;
  /** Vendor device family, e.g. "tlx" or "inv" */
  type: string;
  alias?: string;
}

export interface TelemetrySample {
  timestamp: Date;
  /** Numeric readings keyed by field name */
  values: Record<string, number>;
  /** Set when the sample belongs to one device rather than the whole plant */
  deviceSn?: string;
}

export interface NormalizedSeries {
  samples: TelemetrySample[];
}

// ============================================================================
// CAPABILITIES
// ============================================================================

export interface VendorCapabilities {
  brand: 'GROWATT';

  polling: {
    /** Maximum requests per minute */
    maxRequestsPerMinute: number;
    /** Recommended minimum interval in seconds */
    recommendedMinIntervalSeconds: number;
    /** Width of one intraday power slot in minutes */
    powerSlotMinutes: number;
  };

  features: {
    supportsPowerSeries: boolean;
    supportsEnergySeries: boolean;
    supportsDeviceHistory: boolean;
    supportsDeviceList: boolean;
  };
}

// ============================================================================
// ERROR TYPES
// ============================================================================

export enum AdapterErrorType {
  AUTH_FAILED = 'AUTH_FAILED',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  NETWORK_TIMEOUT = 'NETWORK_TIMEOUT',
  INVALID_DATA_FORMAT = 'INVALID_DATA_FORMAT',
  VENDOR_ERROR = 'VENDOR_ERROR',
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export class AdapterError extends Error {
  constructor(
    public type: AdapterErrorType,
    message: string,
    public httpStatus?: number,
    public retryAfterSeconds?: number
  ) {
    super(message);
    this.name = 'AdapterError';
  }
}

export function isAuthError(error: unknown): error is AdapterError {
  return error instanceof AdapterError && error.type === AdapterErrorType.AUTH_FAILED;
}
