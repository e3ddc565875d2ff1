/**
 * WHAT-IF ENGINE: Request Validation
 */

import { z } from 'zod';
import { DEFAULT_LOCALE, DURATION_DAYS, EVENT_TYPES, LOCALES, PARAMETER_BOUNDS } from './whatif.contract.js';
import type { SimulationParameters, SimulationRequest } from './whatif.contract.js';

function bounded(key: keyof SimulationParameters) {
  const b = PARAMETER_BOUNDS[key];
  return z.number().finite().min(b.min).max(b.max).default(b.default);
}

export const SimulationParametersSchema = z.object({
  electricity_price: bounded('electricity_price'),
  point_multiplier: bounded('point_multiplier'),
  promotion_intensity: bounded('promotion_intensity'),
  price_sensitivity: bounded('price_sensitivity'),
});

// null, empty and whitespace-only filters mean "all segments"
const optionalFilter = z
  .string()
  .nullish()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

export const SimulationRequestSchema = z.object({
  event_type: z.enum(EVENT_TYPES, {
    errorMap: () => ({ message: `Invalid event_type. Must be one of: ${EVENT_TYPES.join(', ')}` }),
  }),
  parameters: SimulationParametersSchema.default({}),
  persona: optionalFilter,
  region: optionalFilter,
  duration_days: z
    .number()
    .int()
    .min(DURATION_DAYS.min)
    .max(DURATION_DAYS.max)
    .default(DURATION_DAYS.default),
  lang: z.enum(LOCALES).default(DEFAULT_LOCALE),
});

export const CatalogQuerySchema = z.object({
  lang: z.enum(LOCALES).default(DEFAULT_LOCALE),
});

export type SimulationRequestBody = z.infer<typeof SimulationRequestSchema>;

export function toSimulationRequest(body: SimulationRequestBody): SimulationRequest {
  return {
    eventType: body.event_type,
    parameters: body.parameters,
    persona: body.persona,
    region: body.region,
    durationDays: body.duration_days,
    locale: body.lang,
  };
}
