/**
 * WHAT-IF ENGINE: Service
 *
 * Reads the record source on every call; the engine keeps nothing between runs.
 */

import type { BehaviorRecordSource } from '../behavior/behavior.source.js';
import type { SimulationOutcome, SimulationRequest } from './whatif.contract.js';
import type { WhatIfEngine } from './whatif.engine.js';

export class WhatIfService {
  constructor(
    private readonly source: BehaviorRecordSource,
    private readonly engine: WhatIfEngine
  ) {}

  async simulate(request: SimulationRequest): Promise<SimulationOutcome> {
    const batch = await this.source.readAll();
    return this.engine.simulate(batch, request);
  }
}
