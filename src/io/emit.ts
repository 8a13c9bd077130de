import { formatClock, formatDuration } from '../time';
import type { FeasibilityStatus, RoutePlan } from '../types';

export const STATUS_LABEL: Record<FeasibilityStatus, string> = {
  onTime: 'ok',
  tooEarly: 'too early',
  tooLate: 'too late',
};

export interface StopRow {
  /** 1-based visiting position */
  order: number;
  index: number;
  name: string;
  arrive: string;
  depart: string;
  status: FeasibilityStatus;
  stayMin: number;
  lat: number | null;
  lon: number | null;
}

/** Flatten scheduled stops into display rows in visiting order. */
export function stopRows(plan: RoutePlan): StopRow[] {
  return plan.itinerary.stops.map((s, i) => {
    const coord = plan.coords[s.index];
    return {
      order: i + 1,
      index: s.index,
      name: plan.names[s.index] ?? `Stop ${s.index + 1}`,
      arrive: formatClock(s.arrivalSec),
      depart: formatClock(s.departureSec),
      status: s.status,
      stayMin: (s.departureSec - s.arrivalSec) / 60,
      lat: coord ? coord[0] : null,
      lon: coord ? coord[1] : null,
    };
  });
}

export interface EmitOptions {
  /** include Markdown summary */
  markdown?: boolean;
}

export interface EmitResult {
  json: string;
  runTimestamp: string;
  runId?: string;
  runNote?: string;
  markdown?: string;
}

function toMarkdown(plan: RoutePlan): string {
  const { itinerary } = plan;
  const lines: string[] = [
    '# Itinerary',
    '',
    `Date: ${plan.date} · optimised by ${itinerary.criterion} · travel ${formatDuration(
      itinerary.totalDurationSec,
    )}`,
    '',
    '| # | Stop | Arrive | Depart | Status |',
    '| -:| ---- | ------ | ------ | ------ |',
  ];
  for (const row of stopRows(plan)) {
    lines.push(
      `| ${row.order} | ${row.name} | ${row.arrive} | ${row.depart} | ${STATUS_LABEL[row.status]} |`,
    );
  }
  lines.push('');
  if (plan.warnings.length) {
    lines.push('## Warnings', '');
    for (const w of plan.warnings) lines.push(`- ${w}`);
    lines.push('');
  }
  return lines.join('\n');
}

/** Serialize a planned route to JSON and optional Markdown summary. */
export function emitItinerary(
  plan: RoutePlan,
  runTimestamp = new Date().toISOString(),
  opts: EmitOptions = {},
): EmitResult {
  const { itinerary } = plan;
  const json = JSON.stringify(
    {
      runTimestamp,
      runId: plan.runId,
      runNote: plan.runNote,
      date: plan.date,
      criterion: itinerary.criterion,
      totalDurationSec: itinerary.totalDurationSec,
      tour: itinerary.tour,
      warnings: plan.warnings,
      stops: stopRows(plan),
    },
    null,
    2,
  );
  const result: EmitResult = { json, runTimestamp };
  if (plan.runId) result.runId = plan.runId;
  if (plan.runNote) result.runNote = plan.runNote;
  if (opts.markdown) {
    result.markdown = toMarkdown(plan);
  }
  return result;
}
