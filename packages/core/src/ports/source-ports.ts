/**
 * Source Ports
 *
 * Upstream collaborators (HTML table scrapers, workbook converters, PDF text
 * extractors) implement these to feed normalised observations into ingestion.
 * The core performs no network I/O and no document parsing itself.
 */

import type { CommodityObservation, RateObservation } from '../domain/observations.js';
import type { MetalTag } from '../domain/metals.js';
import type { SourceTag } from '../domain/sources.js';
import type { DateWindow } from '../time/dates.js';

export interface RateSourcePort {
  readonly source: SourceTag;
  /** Observations for days inside the window. Rows outside it are ignored by callers. */
  fetchRates(window: DateWindow): Promise<RateObservation[]>;
}

export interface CommoditySourcePort {
  readonly metal: MetalTag;
  /** Full published history; callers filter to the requested window */
  fetchPrices(): Promise<CommodityObservation[]>;
}
