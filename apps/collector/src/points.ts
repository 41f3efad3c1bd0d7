import type { TelemetrySample } from '@growatt-dashboard/integrations-core';

export type Measurement = 'power' | 'energy' | 'device';

export interface PointTags {
  plant_id: string;
  device_sn?: string;
}

/**
 * One write to the time-series store
 */
export interface MetricPoint {
  measurement: Measurement;
  tags: PointTags;
  fields: Record<string, number>;
  timestamp: Date;
}

/**
 * Map samples to points, one point per sample. Samples that carry no
 * numeric reading are dropped.
 */
export function toPoints(
  measurement: Measurement,
  plantId: string,
  samples: TelemetrySample[]
): MetricPoint[] {
  const points: MetricPoint[] = [];

  for (const sample of samples) {
    if (Object.keys(sample.values).length === 0) continue;

    const tags: PointTags = { plant_id: plantId };
    if (sample.deviceSn) {
      tags.device_sn = sample.deviceSn;
    }

    points.push({
      measurement,
      tags,
      fields: { ...sample.values },
      timestamp: sample.timestamp,
    });
  }

  return points;
}
