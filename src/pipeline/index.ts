/**
 * Pipeline
 *
 * Entry point for filing documents: `create()` wires the phases together,
 * `listInbox` and `runBatch` drive a whole inbox through it.
 */

import * as Orchestrator from './orchestrator';
import { PipelineConfig } from './types';

export type PipelineInstance = Orchestrator.OrchestratorInstance;
export type { OrchestratorDependencies } from './orchestrator';

export const create = (config: PipelineConfig, dependencies: Orchestrator.OrchestratorDependencies): PipelineInstance =>
    Orchestrator.create(config, dependencies);

export { listInbox, runBatch } from './batch';
export type { InboxListing } from './batch';
export * from './types';
