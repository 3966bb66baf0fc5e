/**
 * Pipeline stage catalogue.
 *
 * @module pipeline
 */

export { isPipelineStage, PIPELINE_STAGES, type PipelineStage } from './stages.js'
