import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';
import type { z } from 'zod';
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
  existsOnWallClock,
  localDateTime,
  parseDay,
  slotTime,
} from '@growatt-dashboard/integrations-core';
import {
  chartResponseSchema,
  deviceHistoryResponseSchema,
  loginResponseSchema,
  plantDevicesResponseSchema,
  plantListResponseSchema,
  reading,
} from './schemas.js';
import { GROWATT_CAPABILITIES } from './capabilities.js';

export const DEFAULT_GROWATT_BASE_URL = 'https://server-api.growatt.com';

const ENDPOINTS = {
  login: '/login',
  listPlants: '/selectPlant/getPlantList',
  plantDevices: '/panel/getDevicesByPlantList',
  tlxHistory: '/device/getTLXHistory',
  invHistory: '/device/getInverterHistory',
  monthChart: '/energy/compare/getDevicesMonthChart',
  dayChart: '/energy/compare/getDevicesDayChart',
} as const;

// The web API only answers requests that look like they come from its own UI
const BROWSER_HEADERS = {
  'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'X-Requested-With': 'XMLHttpRequest',
};

// History endpoint and serial parameter per device family; other families have none
const HISTORY_ROUTES: Record<string, { endpoint: string; key: string }> = {
  tlx: { endpoint: ENDPOINTS.tlxHistory, key: 'tlxSn' },
  inv: { endpoint: ENDPOINTS.invHistory, key: 'invSn' },
};

export function hasDeviceHistory(device: NormalizedDevice): boolean {
  return Object.hasOwn(HISTORY_ROUTES, device.type);
}

// Keys of a history log that identify the record rather than measure anything
const HISTORY_NON_READINGS = new Set(['id', 'time', 'calendar', 'serialNum', 'dataLogSn', 'alias']);

const MAX_PAGES = 100;

type FormValue = string | number;

export interface GrowattAdapterOptions {
  baseUrl?: string;
  timeoutMs?: number;
  /** Replaces axios' HTTP transport; lets tests answer requests in process */
  transport?: AxiosAdapter;
}

/**
 * Growatt Adapter
 *
 * Talks to the Growatt web portal API: form-encoded POSTs authorized by the
 * session cookies handed out at login.
 */
export class GrowattAdapter implements VendorAdapter {
  private http: AxiosInstance;

  constructor(options: GrowattAdapterOptions = {}) {
    this.http = axios.create({
      baseURL: options.baseUrl ?? DEFAULT_GROWATT_BASE_URL,
      timeout: options.timeoutMs ?? 30000,
      headers: BROWSER_HEADERS,
      adapter: options.transport,
      // Status handling lives in post()
      validateStatus: () => true,
    });
  }

  async login(creds: VendorCredentials): Promise<VendorSession> {
    if (!creds.username || !creds.password) {
      throw new AdapterError(AdapterErrorType.AUTH_FAILED, 'Username and password are required');
    }

    const response = await this.post(ENDPOINTS.login, {
      account: creds.username,
      password: creds.password,
      validateCode: '',
    });
    const body = this.parse(loginResponseSchema, response, ENDPOINTS.login, false);

    if (body.result !== 1) {
      console.error('[Growatt] Error while logging in');
      throw new AdapterError(
        AdapterErrorType.AUTH_FAILED,
        `Login rejected (result ${body.result}${body.msg ? `: ${body.msg}` : ''})`,
        response.status
      );
    }

    const token = sessionCookie(response.headers['set-cookie']);
    if (!token) {
      throw new AdapterError(
        AdapterErrorType.AUTH_FAILED,
        'Login accepted but no session cookie was issued',
        response.status
      );
    }

    console.log('[Growatt] Successfully logged in');
    return { token, acquiredAt: new Date() };
  }

  async listPlants(session: VendorSession): Promise<PlantListing[]> {
    const plants: PlantListing[] = [];
    let currentPage = 0;
    let pages = 1;

    while (currentPage < pages && currentPage < MAX_PAGES) {
      currentPage += 1;
      const response = await this.post(
        ENDPOINTS.listPlants,
        { currPage: currentPage, plantType: '-1', orderType: 0, plantName: '' },
        session
      );
      const body = this.parse(plantListResponseSchema, response, ENDPOINTS.listPlants);
      pages = body.pages;
      plants.push(...body.datas.map((plant) => ({ id: plant.id, name: plant.plantName })));
    }

    return plants;
  }

  async getPlantDevices(ref: PlantReference, session: VendorSession): Promise<NormalizedDevice[]> {
    const devices: NormalizedDevice[] = [];
    let currentPage = 0;
    let pages = 1;

    while (currentPage < pages && currentPage < MAX_PAGES) {
      currentPage += 1;
      const response = await this.post(
        ENDPOINTS.plantDevices,
        { currPage: currentPage, plantId: ref.vendorPlantId },
        session
      );
      const body = this.parse(plantDevicesResponseSchema, response, ENDPOINTS.plantDevices);

      if (body.result !== 1 || !body.obj) {
        throw new AdapterError(
          AdapterErrorType.VENDOR_ERROR,
          `Device list for plant ${ref.vendorPlantId} failed (result ${body.result})`,
          response.status
        );
      }

      pages = body.obj.pages;
      devices.push(
        ...body.obj.datas.map((device) => ({
          sn: device.sn,
          type: device.deviceTypeName,
          alias: device.alias ?? undefined,
        }))
      );
    }

    return devices;
  }

  async getPowerSeries(
    ref: PlantReference,
    session: VendorSession,
    day: string
  ): Promise<NormalizedSeries> {
    const date = parseDay(day);
    const slotMinutes = GROWATT_CAPABILITIES.polling.powerSlotMinutes;
    const chart = await this.fetchChart(
      ENDPOINTS.dayChart,
      ref,
      session,
      `${date.year}-${date.month}-${date.day}`
    );

    const samples: TelemetrySample[] = [];
    (chart?.pac ?? []).forEach((power, index) => {
      // Slots are wall-clock times; the hour skipped at spring forward has none
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
    session: VendorSession,
    month: string
  ): Promise<NormalizedSeries> {
    const first = parseDay(`${month}-01`);
    const chart = await this.fetchChart(
      ENDPOINTS.monthChart,
      ref,
      session,
      `${first.year}-${first.month}`
    );

    const samples: TelemetrySample[] = [];
    (chart?.energy ?? []).forEach((energy, index) => {
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
    session: VendorSession,
    day: string
  ): Promise<NormalizedSeries> {
    const route = hasDeviceHistory(device) ? HISTORY_ROUTES[device.type] : undefined;

    if (!route) {
      console.warn(`[Growatt] No history endpoint for device ${device.sn} (type ${device.type}), skipping`);
      return { samples: [] };
    }

    const logs: Array<Record<string, unknown>> = [];
    let start = 0;
    let haveNext = true;
    let pagesRead = 0;

    while (haveNext && pagesRead < MAX_PAGES) {
      const response = await this.post(
        route.endpoint,
        { [route.key]: device.sn, startDate: day, endDate: day, start },
        session
      );
      const body = this.parse(deviceHistoryResponseSchema, response, route.endpoint);
      pagesRead += 1;

      logs.push(...body.obj.datas);

      // A cursor that does not move would page forever
      haveNext = body.obj.haveNext && body.obj.start !== start;
      start = body.obj.start;
    }

    // Newest first on the wire
    logs.reverse();

    const samples: TelemetrySample[] = [];
    for (const log of logs) {
      const time = log.time;
      if (typeof time !== 'string') continue;

      const values: Record<string, number> = {};
      for (const [key, raw] of Object.entries(log)) {
        if (HISTORY_NON_READINGS.has(key)) continue;
        const parsed = reading.safeParse(raw);
        if (parsed.success && parsed.data !== null) {
          values[key] = parsed.data;
        }
      }

      let timestamp: Date;
      try {
        timestamp = localDateTime(time, ref.timezone);
      } catch {
        console.warn(`[Growatt] Skipping ${device.sn} log with unreadable time "${time}"`);
        continue;
      }

      samples.push({ timestamp, values, deviceSn: device.sn });
    }

    return { samples };
  }

  getCapabilities(): VendorCapabilities {
    return GROWATT_CAPABILITIES;
  }

  // ============================================================================
  // TRANSPORT
  // ============================================================================

  private async fetchChart(
    endpoint: string,
    ref: PlantReference,
    session: VendorSession,
    date: string
  ) {
    const response = await this.post(
      endpoint,
      {
        plantId: ref.vendorPlantId,
        jsonData: JSON.stringify([
          { type: 'plant', sn: ref.vendorPlantId, params: 'energy,autoEnergy' },
        ]),
        date,
      },
      session
    );
    const body = this.parse(chartResponseSchema, response, endpoint);

    if (body.result !== undefined && body.result !== 1) {
      throw new AdapterError(
        AdapterErrorType.VENDOR_ERROR,
        `${endpoint} returned result ${body.result}`,
        response.status
      );
    }

    return body.obj[0]?.datas;
  }

  private async post(
    endpoint: string,
    form: Record<string, FormValue>,
    session?: VendorSession
  ): Promise<AxiosResponse<unknown>> {
    const body = new URLSearchParams();
    for (const [key, value] of Object.entries(form)) {
      body.set(key, String(value));
    }

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(endpoint, body, {
        headers: session ? { Cookie: session.token } : undefined,
      });
    } catch (error) {
      throw new AdapterError(
        AdapterErrorType.NETWORK_TIMEOUT,
        `Request to ${endpoint} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const { status } = response;
    if (status === 401 || status === 403) {
      throw new AdapterError(AdapterErrorType.AUTH_FAILED, `${endpoint} responded ${status}`, status);
    }
    if (status === 429) {
      const retryAfter = Number(response.headers['retry-after']);
      throw new AdapterError(
        AdapterErrorType.RATE_LIMIT_EXCEEDED,
        `${endpoint} responded 429`,
        status,
        Number.isFinite(retryAfter) ? retryAfter : undefined
      );
    }
    if (status < 200 || status >= 300) {
      throw new AdapterError(AdapterErrorType.VENDOR_ERROR, `${endpoint} responded ${status}`, status);
    }

    return response;
  }

  private parse<T extends z.ZodTypeAny>(
    schema: T,
    response: AxiosResponse<unknown>,
    endpoint: string,
    authenticated = true
  ): z.output<T> {
    let data = response.data;

    if (typeof data === 'string') {
      const text = data.trim();
      // An expired session is answered with the HTML login page
      if (text.startsWith('<')) {
        throw new AdapterError(
          authenticated ? AdapterErrorType.AUTH_FAILED : AdapterErrorType.INVALID_DATA_FORMAT,
          authenticated
            ? `${endpoint} returned the login page, session expired`
            : `${endpoint} returned HTML instead of JSON`,
          response.status
        );
      }
      try {
        data = JSON.parse(text);
      } catch {
        throw new AdapterError(
          AdapterErrorType.INVALID_DATA_FORMAT,
          `${endpoint} returned a body that is not JSON`,
          response.status
        );
      }
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new AdapterError(
        AdapterErrorType.INVALID_DATA_FORMAT,
        `${endpoint} returned an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        response.status
      );
    }
    return parsed.data;
  }
}

/**
 * Collapse Set-Cookie headers into a single Cookie header value
 */
export function sessionCookie(setCookie: string[] | undefined): string {
  const jar = new Map<string, string>();

  for (const raw of setCookie ?? []) {
    const pair = raw.split(';')[0].trim();
    const eqIdx = pair.indexOf('=');
    if (eqIdx <= 0) continue;
    jar.set(pair.slice(0, eqIdx), pair.slice(eqIdx + 1));
  }

  return Array.from(jar.entries())
    .map(([name, value]) => `${name}=${value}`)
    .join('; ');
}
