/**
 * Pipeline
 *
 * Entry point for a clipjoin run. Use Pipeline.create() from clipjoin.ts.
 */

import * as Orchestrator from './orchestrator';
import type { PipelineConfig } from './types';

export type { OrchestratorInstance, OrchestratorDeps } from './orchestrator';
export { planDefaultRun } from './orchestrator';

export const create = (config: PipelineConfig, deps?: Orchestrator.OrchestratorDeps): Orchestrator.OrchestratorInstance => {
    return Orchestrator.create(config, deps);
};

export type * from './types';
