import type { RoutePlan } from '../types';
import { STATUS_LABEL, stopRows } from './emit';

function escapeXml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/** Serialize the visiting order to KML: numbered placemarks plus the route line. */
export function emitKml(plan: RoutePlan): string {
  const placemarks: string[] = [];
  const routeCoords: string[] = [];
  for (const stop of stopRows(plan)) {
    if (stop.lat === null || stop.lon === null) continue;
    const details: [string, string | number][] = [
      ['order', stop.order],
      ['arrive', stop.arrive],
      ['depart', stop.depart],
      ['stayMin', stop.stayMin],
      ['status', STATUS_LABEL[stop.status]],
    ];
    const data = details
      .map(
        ([name, value]) =>
          `<Data name="${name}"><value>${escapeXml(String(value))}</value></Data>`,
      )
      .join('');
    placemarks.push(
      `<Placemark><name>${stop.order}. ${escapeXml(stop.name)}</name><ExtendedData>${data}</ExtendedData><Point><coordinates>${stop.lon},${stop.lat},0</coordinates></Point></Placemark>`,
    );
    routeCoords.push(`${stop.lon},${stop.lat},0`);
  }
  const route = `<Placemark><name>Route</name><LineString><coordinates>${routeCoords.join(' ')}</coordinates></LineString></Placemark>`;
  const doc = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<kml xmlns="http://www.opengis.net/kml/2.2">',
    '<Document>',
    ...placemarks,
    route,
    '</Document>',
    '</kml>',
  ];
  return doc.join('\n');
}
