import { describe, it, expect } from 'vitest';
import { emitHtml } from '../src/io/emitHtml';
import { samplePlan } from './samplePlan';

describe('emitHtml', () => {
  it('renders itinerary using template', () => {
    const html = emitHtml(samplePlan(), '2026-05-01T00:00:00.000Z');
    expect(html).toContain('<h1>Itinerary 2026-05-01</h1>');
    expect(html.match(/<tr class=/g)?.length).toBe(3);
    expect(html).toContain(
      '<tr class="tooEarly"><td>3</td><td>Museum, North Wing</td><td>09:50</td><td>10:20</td><td class="status">too early</td></tr>',
    );
    expect(html).toContain('<td>Cafe &amp; Bar</td>');
    expect(html).toContain('total travel 0h 35m');
    expect(html).not.toContain('class="warnings"');
  });

  it('lists warnings', () => {
    const html = emitHtml(samplePlan({ warnings: ['late finish'] }), 'T');
    expect(html).toContain('<li>late finish</li>');
  });

  it('supports custom templates and partials', () => {
    const html = emitHtml(samplePlan(), 'T', {
      template: '{{#stops}}{{> row}}{{/stops}}',
      partials: { row: '[{{order}}:{{arrive}}]' },
    });
    expect(html).toBe('[1:09:00][2:09:20][3:09:50]');
  });
});
