/**
 * Tests for the Growatt adapter
 *
 * Requests never leave the process: an axios transport stub answers them by
 * path and records what was sent.
 */

import { describe, it, expect } from 'vitest';
import type { AxiosAdapter, AxiosHeaderValue, RawAxiosResponseHeaders } from 'axios';
import { AdapterError, AdapterErrorType, type VendorSession } from '@growatt-dashboard/integrations-core';
import { GrowattAdapter, sessionCookie } from '../src/index.js';

// ============================================================================
// Transport stub
// ============================================================================

interface StubReply {
  status?: number;
  data: unknown;
  headers?: RawAxiosResponseHeaders;
}

type Route = (form: URLSearchParams) => StubReply;

interface RecordedCall {
  path: string;
  form: URLSearchParams;
  cookie: AxiosHeaderValue | undefined;
}

function stubGrowatt(routes: Record<string, Route | StubReply[]>) {
  const calls: RecordedCall[] = [];

  const transport: AxiosAdapter = async (config) => {
    const path = new URL(config.url ?? '', 'http://stub.local').pathname;
    const form = new URLSearchParams(typeof config.data === 'string' ? config.data : '');
    calls.push({ path, form, cookie: config.headers.get('Cookie') });

    const route = routes[path];
    let reply: StubReply;
    if (Array.isArray(route)) {
      reply = route.shift() ?? { status: 404, data: 'exhausted' };
    } else if (route) {
      reply = route(form);
    } else {
      reply = { status: 404, data: 'not found' };
    }

    return {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: String(reply.status ?? 200),
      headers: reply.headers ?? {},
      config,
    };
  };

  return { adapter: new GrowattAdapter({ transport }), calls };
}

const SESSION: VendorSession = {
  token: 'JSESSIONID=test-session',
  acquiredAt: new Date('2023-01-01T00:00:00Z'),
};

const PLANT = { vendorPlantId: '123', timezone: 'UTC' };

// ============================================================================
// LOGIN
// ============================================================================

describe('GrowattAdapter.login', () => {
  it('posts the credentials and keeps the issued cookies as the session', async () => {
    const { adapter, calls } = stubGrowatt({
      '/login': () => ({
        data: { result: 1 },
        headers: {
          'set-cookie': ['JSESSIONID=abc; Path=/; HttpOnly', 'SERVERID=xyz; Path=/'],
        },
      }),
    });

    const session = await adapter.login({ username: 'u', password: 'p' });

    expect(session.token).toBe('JSESSIONID=abc; SERVERID=xyz');
    expect(calls).toHaveLength(1);
    expect(calls[0].form.get('account')).toBe('u');
    expect(calls[0].form.get('password')).toBe('p');
    expect(calls[0].form.get('validateCode')).toBe('');
  });

  it('rejects a login the server answers with a non-success result', async () => {
    const { adapter } = stubGrowatt({
      '/login': () => ({ data: { result: 0, msg: 'wrong password' } }),
    });

    await expect(adapter.login({ username: 'u', password: 'nope' })).rejects.toMatchObject({
      type: AdapterErrorType.AUTH_FAILED,
      message: 'Login rejected (result 0: wrong password)',
    });
  });

  it('maps HTTP 401 to an authentication failure', async () => {
    const { adapter } = stubGrowatt({
      '/login': () => ({ status: 401, data: '' }),
    });

    await expect(adapter.login({ username: 'u', password: 'p' })).rejects.toMatchObject({
      type: AdapterErrorType.AUTH_FAILED,
      httpStatus: 401,
    });
  });

  it('refuses empty credentials without calling the server', async () => {
    const { adapter, calls } = stubGrowatt({});

    await expect(adapter.login({ username: '', password: 'p' })).rejects.toBeInstanceOf(AdapterError);
    expect(calls).toHaveLength(0);
  });

  it('rejects a successful login that issues no cookie', async () => {
    const { adapter } = stubGrowatt({
      '/login': () => ({ data: { result: 1 } }),
    });

    await expect(adapter.login({ username: 'u', password: 'p' })).rejects.toMatchObject({
      type: AdapterErrorType.AUTH_FAILED,
    });
  });

  it('reports transport failures as network errors', async () => {
    const transport: AxiosAdapter = async () => {
      throw new Error('socket hang up');
    };
    const adapter = new GrowattAdapter({ transport });

    await expect(adapter.login({ username: 'u', password: 'p' })).rejects.toMatchObject({
      type: AdapterErrorType.NETWORK_TIMEOUT,
      message: 'Request to /login failed: socket hang up',
    });
  });
});

// ============================================================================
// PLANTS & DEVICES
// ============================================================================

describe('GrowattAdapter plant listing', () => {
  it('walks every page of the plant list', async () => {
    const { adapter, calls } = stubGrowatt({
      '/selectPlant/getPlantList': [
        { data: { currPage: 1, pages: 2, datas: [{ id: 123, plantName: 'Home' }] } },
        { data: { currPage: 2, pages: 2, datas: [{ id: '456', plantName: 'Barn' }] } },
      ],
    });

    const plants = await adapter.listPlants(SESSION);

    expect(plants).toEqual([
      { id: '123', name: 'Home' },
      { id: '456', name: 'Barn' },
    ]);
    expect(calls.map((call) => call.form.get('currPage'))).toEqual(['1', '2']);
    expect(calls[0].form.get('plantType')).toBe('-1');
    expect(calls[0].cookie).toBe('JSESSIONID=test-session');
  });

  it('lists plant devices', async () => {
    const { adapter, calls } = stubGrowatt({
      '/panel/getDevicesByPlantList': () => ({
        data: {
          result: 1,
          obj: { pages: 1, datas: [{ sn: 'TLX0001', deviceTypeName: 'tlx', alias: 'Roof' }] },
        },
      }),
    });

    const devices = await adapter.getPlantDevices(PLANT, SESSION);

    expect(devices).toEqual([{ sn: 'TLX0001', type: 'tlx', alias: 'Roof' }]);
    expect(calls[0].form.get('plantId')).toBe('123');
  });

  it('fails the device list when the server reports an error result', async () => {
    const { adapter } = stubGrowatt({
      '/panel/getDevicesByPlantList': () => ({ data: { result: 0 } }),
    });

    await expect(adapter.getPlantDevices(PLANT, SESSION)).rejects.toMatchObject({
      type: AdapterErrorType.VENDOR_ERROR,
    });
  });
});

// ============================================================================
// CHARTS
// ============================================================================

describe('GrowattAdapter charts', () => {
  it('turns the day chart into 5 minute power samples, skipping empty slots', async () => {
    const { adapter, calls } = stubGrowatt({
      '/energy/compare/getDevicesDayChart': () => ({
        data: { result: 1, obj: [{ datas: { pac: [0, null, 500] } }] },
      }),
    });

    const series = await adapter.getPowerSeries(PLANT, SESSION, '2023-01-01');

    expect(series.samples).toEqual([
      { timestamp: new Date('2023-01-01T00:00:00Z'), values: { power: 0 } },
      { timestamp: new Date('2023-01-01T00:10:00Z'), values: { power: 500 } },
    ]);
    expect(calls[0].form.get('date')).toBe('2023-1-1');
    expect(calls[0].form.get('plantId')).toBe('123');
    expect(JSON.parse(calls[0].form.get('jsonData') ?? '')).toEqual([
      { type: 'plant', sn: '123', params: 'energy,autoEnergy' },
    ]);
  });

  it('anchors slots at local midnight of the plant', async () => {
    const { adapter } = stubGrowatt({
      '/energy/compare/getDevicesDayChart': () => ({
        data: { obj: [{ datas: { pac: [120] } }] },
      }),
    });

    const series = await adapter.getPowerSeries(
      { vendorPlantId: '123', timezone: 'Europe/Amsterdam' },
      SESSION,
      '2023-01-01'
    );

    expect(series.samples[0].timestamp.toISOString()).toBe('2022-12-31T23:00:00.000Z');
  });

  it('drops the slots a spring-forward day skips', async () => {
    const { adapter } = stubGrowatt({
      '/energy/compare/getDevicesDayChart': () => ({
        data: { obj: [{ datas: { pac: Array.from({ length: 37 }, () => 100) } }] },
      }),
    });

    const series = await adapter.getPowerSeries(
      { vendorPlantId: '123', timezone: 'Europe/Amsterdam' },
      SESSION,
      '2023-03-26'
    );

    // 00:00-01:55 local, then 03:00 local; 02:00-02:55 never happened
    expect(series.samples).toHaveLength(25);
    expect(series.samples[23].timestamp.toISOString()).toBe('2023-03-26T00:55:00.000Z');
    expect(series.samples[24].timestamp.toISOString()).toBe('2023-03-26T01:00:00.000Z');
  });

  it('turns the month chart into one energy sample per day', async () => {
    const { adapter, calls } = stubGrowatt({
      '/energy/compare/getDevicesMonthChart': () => ({
        data: { result: 1, obj: [{ datas: { energy: [1.5, '2.25', null] } }] },
      }),
    });

    const series = await adapter.getEnergySeries(PLANT, SESSION, '2023-02');

    expect(series.samples).toEqual([
      { timestamp: new Date('2023-02-01T00:00:00Z'), values: { energy: 1.5 } },
      { timestamp: new Date('2023-02-02T00:00:00Z'), values: { energy: 2.25 } },
    ]);
    expect(calls[0].form.get('date')).toBe('2023-2');
  });

  it('returns no samples for an empty chart', async () => {
    const { adapter } = stubGrowatt({
      '/energy/compare/getDevicesDayChart': () => ({ data: { result: 1, obj: [] } }),
    });

    const series = await adapter.getPowerSeries(PLANT, SESSION, '2023-01-01');

    expect(series.samples).toEqual([]);
  });

  it('maps HTTP 500 to a vendor error', async () => {
    const { adapter } = stubGrowatt({
      '/energy/compare/getDevicesDayChart': () => ({ status: 500, data: 'Internal Server Error' }),
    });

    await expect(adapter.getPowerSeries(PLANT, SESSION, '2023-01-01')).rejects.toMatchObject({
      type: AdapterErrorType.VENDOR_ERROR,
      httpStatus: 500,
    });
  });

  it('treats the HTML login page as an expired session', async () => {
    const { adapter } = stubGrowatt({
      '/energy/compare/getDevicesDayChart': () => ({
        data: '<!DOCTYPE html><html><body>login</body></html>',
      }),
    });

    await expect(adapter.getPowerSeries(PLANT, SESSION, '2023-01-01')).rejects.toMatchObject({
      type: AdapterErrorType.AUTH_FAILED,
    });
  });

  it('rejects bodies of an unexpected shape', async () => {
    const { adapter } = stubGrowatt({
      '/energy/compare/getDevicesDayChart': () => ({ data: { unexpected: true } }),
    });

    await expect(adapter.getPowerSeries(PLANT, SESSION, '2023-01-01')).rejects.toMatchObject({
      type: AdapterErrorType.INVALID_DATA_FORMAT,
    });
  });
});

// ============================================================================
// DEVICE HISTORY
// ============================================================================

describe('GrowattAdapter.getDeviceHistory', () => {
  it('pages through TLX history and returns logs oldest first', async () => {
    const { adapter, calls } = stubGrowatt({
      '/device/getTLXHistory': [
        {
          data: {
            result: 1,
            obj: {
              datas: [{ time: '2023-01-01 10:05:00', pac: '300.5', serialNum: 'TLX0001' }],
              start: 1,
              haveNext: true,
            },
          },
        },
        {
          data: {
            result: 1,
            obj: {
              datas: [{ time: '2023-01-01 10:00:00', pac: 250, status: 'normal' }],
              start: 2,
              haveNext: false,
            },
          },
        },
      ],
    });

    const series = await adapter.getDeviceHistory(
      PLANT,
      { sn: 'TLX0001', type: 'tlx' },
      SESSION,
      '2023-01-01'
    );

    expect(series.samples).toEqual([
      { timestamp: new Date('2023-01-01T10:00:00Z'), values: { pac: 250 }, deviceSn: 'TLX0001' },
      { timestamp: new Date('2023-01-01T10:05:00Z'), values: { pac: 300.5 }, deviceSn: 'TLX0001' },
    ]);
    expect(calls.map((call) => call.form.get('start'))).toEqual(['0', '1']);
    expect(calls[0].form.get('tlxSn')).toBe('TLX0001');
    expect(calls[0].form.get('startDate')).toBe('2023-01-01');
  });

  it('uses the inverter endpoint for inv devices', async () => {
    const { adapter, calls } = stubGrowatt({
      '/device/getInverterHistory': () => ({
        data: { obj: { datas: [], start: 0, haveNext: false } },
      }),
    });

    await adapter.getDeviceHistory(PLANT, { sn: 'INV0001', type: 'inv' }, SESSION, '2023-01-01');

    expect(calls[0].path).toBe('/device/getInverterHistory');
    expect(calls[0].form.get('invSn')).toBe('INV0001');
  });

  it('skips device types without a history endpoint', async () => {
    const { adapter, calls } = stubGrowatt({});

    const series = await adapter.getDeviceHistory(
      PLANT,
      { sn: 'STORAGE1', type: 'storage' },
      SESSION,
      '2023-01-01'
    );

    expect(series.samples).toEqual([]);
    expect(calls).toHaveLength(0);
  });
});

describe('sessionCookie', () => {
  it('keeps the last value of each cookie name', () => {
    expect(sessionCookie(['a=1; Path=/', 'b=2', 'a=3; HttpOnly'])).toBe('a=3; b=2');
  });

  it('returns an empty string without cookies', () => {
    expect(sessionCookie(undefined)).toBe('');
  });
});
