import type { CalendarDate } from '@internationalized/date';
import {
  type VendorAdapter,
  type VendorCredentials,
  type VendorSession,
  type PlantReference,
  isAuthError,
  eachDay,
  eachMonth,
  earlierDay,
  lastDayOfMonth,
  laterDay,
  monthKey,
  parseDay,
  plantToday,
  slotTime,
} from '@growatt-dashboard/integrations-core';
import { AuthenticationError, describeError } from './errors.js';
import { type MetricPoint, toPoints } from './points.js';
import { CollectorStatus, type CollectorState } from './status.js';
import type { MetricStore } from './store.js';

/**
 * Everything a poll needs, handed down the call chain instead of living in
 * module state. `session` is replaced in place when the collector logs in
 * again.
 */
export interface CollectorContext {
  session: VendorSession;
  plant: PlantReference;
}

/** Inclusive range of plant-local days */
export interface DayRange {
  start: CalendarDate;
  end: CalendarDate;
}

export interface CollectorSettings {
  credentials: VendorCredentials;
  plant: PlantReference;
  /** First plant-local day (YYYY-MM-DD) the collector is responsible for */
  startDate: string;
  collectDeviceHistory?: boolean;
}

export interface CollectorOptions {
  status?: CollectorStatus;
  /** Clock override */
  now?: () => Date;
}

export interface WriteResult {
  written: number;
  error?: string;
}

export interface CycleResult {
  ok: boolean;
  pointsWritten: number;
  error?: string;
}

/**
 * Collector
 *
 * Logs in once, then on every cycle fetches the plant's telemetry from the
 * vendor and writes it to the metric store. A cycle whose fetch fails writes
 * nothing; the next cycle starts over.
 */
export class Collector {
  readonly status: CollectorStatus;
  private now: () => Date;
  private startDate: CalendarDate;

  constructor(
    private adapter: VendorAdapter,
    private store: MetricStore,
    private settings: CollectorSettings,
    options: CollectorOptions = {}
  ) {
    this.status = options.status ?? new CollectorStatus();
    this.now = options.now ?? (() => new Date());
    this.startDate = parseDay(settings.startDate);
  }

  get state(): CollectorState {
    return this.status.state;
  }

  // ============================================================================
  // AUTHENTICATION
  // ============================================================================

  async authenticate(): Promise<CollectorContext> {
    const session = await this.login();
    return { session, plant: this.settings.plant };
  }

  private async login(): Promise<VendorSession> {
    try {
      const session = await this.adapter.login(this.settings.credentials);
      this.status.state = 'polling';
      return session;
    } catch (error) {
      // Only a rejection ends the session; a failed attempt keeps the current one
      if (isAuthError(error)) {
        this.status.state = 'unauthenticated';
        throw new AuthenticationError(`Login rejected: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }

  /**
   * Run a vendor call; when the vendor no longer accepts the session, log in
   * again and retry once. A rejected re-login is fatal.
   */
  async withSession<T>(ctx: CollectorContext, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (!isAuthError(error)) throw error;

      console.warn(`[Collector] Session rejected (${error.message}), logging in again`);
      ctx.session = await this.login();
      return call();
    }
  }

  /**
   * Warn when the configured plant is not one of the account's plants
   */
  async verifyPlant(ctx: CollectorContext): Promise<boolean> {
    const plantId = ctx.plant.vendorPlantId;
    try {
      const plants = await this.withSession(ctx, () => this.adapter.listPlants(ctx.session));
      if (plants.some((plant) => plant.id === plantId)) {
        return true;
      }
      console.warn(
        `[Collector] Plant ${plantId} not found on this account (found: ${plants.map((p) => p.id).join(', ') || 'none'})`
      );
      return false;
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;
      console.warn(`[Collector] Could not list plants: ${describeError(error)}`);
      return false;
    }
  }

  // ============================================================================
  // RANGES
  // ============================================================================

  today(): CalendarDate {
    return plantToday(this.settings.plant.timezone, this.now());
  }

  /**
   * Days a steady-state cycle covers: yesterday (to complete its tail) and
   * today, never before the start date. Null while the start date is ahead.
   */
  currentRange(): DayRange | null {
    const today = this.today();
    const start = laterDay(this.startDate, today.subtract({ days: 1 }));
    return start.compare(today) > 0 ? null : { start, end: today };
  }

  /**
   * Days before today that the loop never covers, from the start date on
   */
  backfillRange(): DayRange | null {
    const yesterday = this.today().subtract({ days: 1 });
    return this.startDate.compare(yesterday) > 0 ? null : { start: this.startDate, end: yesterday };
  }

  // ============================================================================
  // FETCH
  // ============================================================================

  async fetchPower(ctx: CollectorContext, day: CalendarDate): Promise<MetricPoint[]> {
    const series = await this.adapter.getPowerSeries(ctx.plant, ctx.session, day.toString());
    return toPoints('power', ctx.plant.vendorPlantId, series.samples);
  }

  /**
   * Daily energy totals of every day in the range
   */
  async fetchEnergy(ctx: CollectorContext, range: DayRange): Promise<MetricPoint[]> {
    const { timezone } = ctx.plant;
    const from = slotTime(range.start, timezone, 0).getTime();
    const until = slotTime(range.end.add({ days: 1 }), timezone, 0).getTime();
    const points: MetricPoint[] = [];

    for (const month of eachMonth(range.start, range.end)) {
      const series = await this.adapter.getEnergySeries(ctx.plant, ctx.session, monthKey(month));
      const inRange = series.samples.filter((sample) => {
        const time = sample.timestamp.getTime();
        return time >= from && time < until;
      });
      points.push(...toPoints('energy', ctx.plant.vendorPlantId, inRange));
    }

    return points;
  }

  async fetchDeviceHistory(ctx: CollectorContext, range: DayRange): Promise<MetricPoint[]> {
    const devices = await this.adapter.getPlantDevices(ctx.plant, ctx.session);
    const points: MetricPoint[] = [];

    for (const device of devices) {
      for (const day of eachDay(range.start, range.end)) {
        const series = await this.adapter.getDeviceHistory(ctx.plant, device, ctx.session, day.toString());
        points.push(...toPoints('device', ctx.plant.vendorPlantId, series.samples));
      }
    }

    return points;
  }

  /**
   * Fetch everything for a range. Either every request succeeds and all
   * points come back, or the error propagates and nothing is returned.
   */
  async fetchTelemetry(ctx: CollectorContext, range: DayRange): Promise<MetricPoint[]> {
    const points: MetricPoint[] = [];

    for (const day of eachDay(range.start, range.end)) {
      points.push(...(await this.fetchPower(ctx, day)));
    }
    points.push(...(await this.fetchEnergy(ctx, range)));

    if (this.settings.collectDeviceHistory) {
      points.push(...(await this.fetchDeviceHistory(ctx, range)));
    }

    return points;
  }

  // ============================================================================
  // WRITE
  // ============================================================================

  writeTelemetry(points: MetricPoint[]): WriteResult {
    if (points.length === 0) {
      return { written: 0 };
    }

    try {
      return { written: this.store.writePoints(points) };
    } catch (error) {
      const message = `Failed to write ${points.length} points: ${describeError(error)}`;
      console.error(`[Store] ${message}`);
      return { written: 0, error: message };
    }
  }

  // ============================================================================
  // CYCLE
  // ============================================================================

  async runCycle(ctx: CollectorContext): Promise<CycleResult> {
    const plantId = ctx.plant.vendorPlantId;
    const startTime = Date.now();
    const range = this.currentRange();

    if (!range) {
      console.log(`[Collector] Start date ${this.startDate.toString()} is ahead, nothing to poll yet`);
      this.status.recordSuccess(0, this.now());
      return { ok: true, pointsWritten: 0 };
    }

    console.log(`[Collector] Polling plant ${plantId} (${range.start.toString()}..${range.end.toString()})...`);

    let points: MetricPoint[];
    try {
      points = await this.withSession(ctx, () => this.fetchTelemetry(ctx, range));
    } catch (error) {
      if (error instanceof AuthenticationError) throw error;

      const message = describeError(error);
      console.error(`[Collector] Error polling plant ${plantId}, skipping cycle: ${message}`);
      this.status.recordFailure(message, this.now());
      return { ok: false, pointsWritten: 0, error: message };
    }

    const result = this.writeTelemetry(points);
    if (result.error) {
      this.status.recordFailure(result.error, this.now());
      return { ok: false, pointsWritten: 0, error: result.error };
    }

    this.status.recordSuccess(result.written, this.now());
    console.log(
      `[Collector] Plant ${plantId} polled successfully: ${result.written} points in ${Date.now() - startTime}ms`
    );
    return { ok: true, pointsWritten: result.written };
  }
}

/**
 * Clip a range to the days of one month
 */
export function monthSlice(range: DayRange, month: CalendarDate): DayRange {
  return {
    start: laterDay(range.start, month),
    end: earlierDay(range.end, lastDayOfMonth(month)),
  };
}
