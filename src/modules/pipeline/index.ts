/**
 * Barrel exports for the pipeline module.
 */

export { createPipeline, issueWorktreePath, PipelineImpl } from './pipeline-impl.js'
export type { PipelineDeps } from './pipeline-impl.js'
export type { Pipeline } from './pipeline.js'
export { setupInterruptHandler, saveInterruptedWork, INTERRUPT_EXIT_CODE } from './interrupt-handler.js'
export type { InterruptHandlerOptions, ProcessHooks } from './interrupt-handler.js'
export { createShiplineContext } from './wiring.js'
export type { ShiplineContext, ShiplineContextOptions } from './wiring.js'
export type { BatchResult, IssueOutcome, IssueOutcomeKind, IssueResult } from './types.js'
