import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import {
  type VendorAdapter,
  type VendorCredentials,
  type VendorSession,
  type PlantReference,
  type PlantListing,
  type NormalizedDevice,
  type NormalizedSeries,
  type TelemetrySample,
  type VendorCapabilities,
  AdapterError,
  AdapterErrorType,
} from './contracts.js';
import { daysInMonth, existsOnWallClock, parseDay, slotTime } from './dates.js';

const mockDataSchema = z.object({
  plants: z.array(z.object({ id: z.string(), name: z.string() })),
  devices: z.array(
    z.object({ sn: z.string(), type: z.string(), alias: z.string().optional() })
  ),
  power_slot_minutes: z.number().int().positive(),
  power_day: z.array(z.number().nullable()),
  energy_month: z.array(z.number().nullable()),
  device_history: z.array(
    z.object({
      minutes_after_midnight: z.number().int().nonnegative(),
      values: z.record(z.number()),
    })
  ),
});

export type MockData = z.infer<typeof mockDataSchema>;

/**
 * Base Mock Adapter
 *
 * Fixture-backed adapter used in mock mode: every requested day replays the
 * same recorded curve, so the pipeline runs end to end without the network.
 */
export abstract class BaseMockAdapter implements VendorAdapter {
  protected mockData: MockData;
  protected fixturesPath: string;

  constructor(
    protected brand: VendorCapabilities['brand'],
    fixturesBasePath?: string
  ) {
    // Default to fixtures/ in the working directory
    const brandLower = brand.toLowerCase();
    this.fixturesPath = fixturesBasePath || path.join(process.cwd(), `fixtures/${brandLower}`);
    this.mockData = this.loadMockData();
  }

  private loadMockData(): MockData {
    try {
      const dataPath = path.join(this.fixturesPath, 'mock-data.json');
      const rawData = fs.readFileSync(dataPath, 'utf-8');
      return mockDataSchema.parse(JSON.parse(rawData));
    } catch (error) {
      throw new AdapterError(
        AdapterErrorType.INVALID_DATA_FORMAT,
        `Failed to load ${this.brand} mock data: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  async login(creds: VendorCredentials): Promise<VendorSession> {
    if (!creds.username || !creds.password) {
      throw new AdapterError(AdapterErrorType.AUTH_FAILED, `Mock login rejected (${this.brand})`, 401);
    }
    return { token: `mock-${this.brand.toLowerCase()}-session`, acquiredAt: new Date() };
  }

  async listPlants(_session: VendorSession): Promise<PlantListing[]> {
    return this.mockData.plants.map((plant) => ({ ...plant }));
  }

  async getPlantDevices(_ref: PlantReference, _session: VendorSession): Promise<NormalizedDevice[]> {
    return this.mockData.devices.map((device) => ({ ...device }));
  }

  async getPowerSeries(
    ref: PlantReference,
    _session: VendorSession,
    day: string
  ): Promise<NormalizedSeries> {
    const date = parseDay(day);
    const slotMinutes = this.mockData.power_slot_minutes;
    const samples: TelemetrySample[] = [];

    this.mockData.power_day.forEach((power, index) => {
      if (power === null || !existsOnWallClock(date, ref.timezone, index * slotMinutes)) return;
      samples.push({
        timestamp: slotTime(date, ref.timezone, index * slotMinutes),
        values: { power },
      });
    });

    return { samples };
  }

  async getEnergySeries(
    ref: PlantReference,
    _session: VendorSession,
    month: string
  ): Promise<NormalizedSeries> {
    const first = parseDay(`${month}-01`);
    const days = daysInMonth(first);
    const samples: TelemetrySample[] = [];

    this.mockData.energy_month.slice(0, days).forEach((energy, index) => {
      if (energy === null) return;
      samples.push({
        timestamp: slotTime(first.add({ days: index }), ref.timezone, 0),
        values: { energy },
      });
    });

    return { samples };
  }

  async getDeviceHistory(
    ref: PlantReference,
    device: NormalizedDevice,
    _session: VendorSession,
    day: string
  ): Promise<NormalizedSeries> {
    if (!this.hasHistory(device)) {
      return { samples: [] };
    }

    const date = parseDay(day);

    return {
      samples: this.mockData.device_history.map((log) => ({
        timestamp: slotTime(date, ref.timezone, log.minutes_after_midnight),
        values: { ...log.values },
        deviceSn: device.sn,
      })),
    };
  }

  /**
   * Whether the vendor keeps history for this kind of device
   */
  protected hasHistory(_device: NormalizedDevice): boolean {
    return true;
  }

  abstract getCapabilities(): VendorCapabilities;
}
