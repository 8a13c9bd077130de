import { formatDuration } from '../time';
import type { RoutePlan } from '../types';
import { STATUS_LABEL, stopRows } from './emit';

/** Plain-text itinerary for display or messaging. */
export function emitText(plan: RoutePlan): string {
  const lines = ['Your itinerary:', ''];
  for (const row of stopRows(plan)) {
    const status = row.status === 'onTime' ? '' : ` (${STATUS_LABEL[row.status]})`;
    lines.push(`${row.order}. ${row.name}: arrive ${row.arrive}, depart ${row.depart}${status}`);
  }
  lines.push('', `Total travel time: ${formatDuration(plan.itinerary.totalDurationSec)}`);
  for (const w of plan.warnings) {
    lines.push(`Note: ${w}`);
  }
  return lines.join('\n');
}
