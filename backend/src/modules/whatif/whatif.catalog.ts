/**
 * WHAT-IF ENGINE: Catalog
 *
 * Event names and the parameter space shown to analysts before they run a
 * simulation.
 */

import { PERSONAS, REGIONS } from '../behavior/persona.catalog.js';
import { EVENT_TEXT } from './insight.messages.js';
import { DEFAULT_LOCALE, DURATION_DAYS, EVENT_TYPES, LOCALES, PARAMETER_BOUNDS } from './whatif.contract.js';
import type { EventType, Locale, SimulationParameters } from './whatif.contract.js';

export function eventName(eventType: EventType, locale: Locale = DEFAULT_LOCALE): string {
  return EVENT_TEXT[locale][eventType].name;
}

const PARAMETER_ORDER: ReadonlyArray<keyof SimulationParameters> = [
  'electricity_price',
  'point_multiplier',
  'promotion_intensity',
  'price_sensitivity',
];

export function buildSimulationCatalog(locale: Locale = DEFAULT_LOCALE) {
  return {
    locale,
    locales: [...LOCALES],
    event_types: EVENT_TYPES.map((id) => ({ id, ...EVENT_TEXT[locale][id] })),
    parameters: Object.fromEntries(
      PARAMETER_ORDER.map((key) => {
        const b = PARAMETER_BOUNDS[key];
        return [
          key,
          { type: 'float', range: [b.min, b.max], default: b.default, description: b.description },
        ];
      })
    ),
    personas: PERSONAS.map((p) => ({ id: p.id, label: p.label, tier: p.tier })),
    regions: REGIONS.map((r) => ({ id: r.id, label: r.label })),
    duration_days: { ...DURATION_DAYS },
  };
}
