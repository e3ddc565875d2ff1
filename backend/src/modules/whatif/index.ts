/**
 * WHAT-IF ENGINE MODULE
 *
 * Projects brand-preference shifts per persona/region segment for a
 * hypothetical event (price change, promotion, competitor action, external).
 *
 * Exports:
 * - Contract & request schema
 * - Baseline resolver, impact calculator, insight generator, aggregator
 * - Engine & service
 * - Routes registration
 */

export * from './whatif.contract.js';
export * from './whatif.schema.js';
export * from './whatif.catalog.js';
export * from './insight.messages.js';
export * from './baseline.resolver.js';
export * from './impact.calculator.js';
export * from './insight.generator.js';
export * from './impact.aggregator.js';
export { WhatIfEngine, DEFAULT_ENGINE_CONFIG } from './whatif.engine.js';
export type { WhatIfEngineConfig } from './whatif.engine.js';
export { WhatIfService } from './whatif.service.js';
export { registerWhatIfRoutes } from './whatif.routes.js';
