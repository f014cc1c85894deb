/**
 * @fxledger/ingestion
 *
 * Checkpoint-driven ingestion of rate and LME observations from source ports
 * into a BackendStrategy.
 */

export { RateIngestionService } from './RateIngestionService.js';
export type {
  RateIngestionParams,
  RateIngestionResult,
  RateIngestionServiceOptions,
} from './RateIngestionService.js';
export { CommodityIngestionService } from './CommodityIngestionService.js';
export type { CommodityIngestionParams, CommodityIngestionResult } from './CommodityIngestionService.js';
export { validateCommodityObservations, validateRateObservations } from './observationValidation.js';
export type { ValidatedRows } from './observationValidation.js';
