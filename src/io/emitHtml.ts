import { readFileSync } from 'node:fs';
import Mustache from 'mustache';
import { formatDuration } from '../time';
import type { RoutePlan } from '../types';
import { STATUS_LABEL, stopRows } from './emit';

const defaultTemplate = readFileSync(
  new URL('./templates/itinerary.mustache', import.meta.url),
  'utf8',
);
const defaultPartials = {
  stop: readFileSync(new URL('./templates/stop.mustache', import.meta.url), 'utf8'),
};

export interface EmitHtmlOptions {
  /** Override the base template */
  template?: string;
  /** Override or add partials */
  partials?: Record<string, string>;
}

interface ViewModel {
  date: string;
  runTimestamp: string;
  runId?: string;
  runNote?: string;
  criterion: string;
  totalTravel: string;
  stops: {
    order: number;
    name: string;
    arrive: string;
    depart: string;
    status: string;
    label: string;
  }[];
  warnings: string[];
  hasWarnings: boolean;
}

export function emitHtml(
  plan: RoutePlan,
  runTimestamp: string,
  opts: EmitHtmlOptions = {},
): string {
  const view: ViewModel = {
    date: plan.date,
    runTimestamp,
    runId: plan.runId,
    runNote: plan.runNote,
    criterion: plan.itinerary.criterion,
    totalTravel: formatDuration(plan.itinerary.totalDurationSec),
    stops: stopRows(plan).map((s) => ({
      order: s.order,
      name: s.name,
      arrive: s.arrive,
      depart: s.depart,
      status: s.status,
      label: STATUS_LABEL[s.status],
    })),
    warnings: plan.warnings,
    hasWarnings: plan.warnings.length > 0,
  };
  const template = opts.template ?? defaultTemplate;
  const partials = { ...defaultPartials, ...opts.partials };
  return Mustache.render(template, view, partials);
}
