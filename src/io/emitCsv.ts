import type { RoutePlan } from '../types';
import { stopRows } from './emit';

function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** Serialize scheduled stops to CSV, one row per visit. */
export function emitCsv(plan: RoutePlan, runTimestamp: string): string {
  const header = [
    'run_timestamp',
    'run_id',
    'date',
    'order',
    'location_index',
    'name',
    'arrive',
    'depart',
    'stay_min',
    'status',
    'lat',
    'lon',
    'criterion',
  ];
  const lines = [header.join(',')];
  for (const row of stopRows(plan)) {
    lines.push(
      [
        runTimestamp,
        plan.runId ?? '',
        plan.date,
        String(row.order),
        String(row.index),
        escapeCsv(row.name),
        row.arrive,
        row.depart,
        String(row.stayMin),
        row.status,
        row.lat !== null ? String(row.lat) : '',
        row.lon !== null ? String(row.lon) : '',
        plan.itinerary.criterion,
      ].join(','),
    );
  }
  return lines.join('\n');
}
