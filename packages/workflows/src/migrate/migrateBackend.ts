/**
 * Backend Migration Workflow
 *
 * Copies every rate, LME row and checkpoint from one backend into another.
 * Follows workflow contract: validates spec, takes its collaborators as
 * arguments, returns JSON-serializable results.
 */

import { z } from 'zod';
import {
  addPersistenceResults,
  chunk,
  ConfigurationError,
  emptyPersistenceResult,
  METAL_TAGS,
} from '@fxledger/core';
import type { BackendStrategy, MetalTag, PersistenceResult } from '@fxledger/core';
import { LogHelpers } from '@fxledger/utils';
import type { Logger } from '@fxledger/utils';
import { logger as workflowsLogger } from '../logger.js';

/**
 * Migration spec
 */
export const MigrateBackendSpecSchema = z.object({
  batchSize: z.number().int().positive().default(500),
  includeCommodities: z.boolean().default(true),
  includeCheckpoints: z.boolean().default(true),
});

export type MigrateBackendSpec = z.input<typeof MigrateBackendSpecSchema>;

export type MigrateBackendResult = {
  rates: PersistenceResult;
  commodities: Record<MetalTag, PersistenceResult>;
  /** Checkpoints offered to the target; the target keeps the newer of the two */
  checkpoints: number;
  /** insert calls issued against the target */
  batches: number;
};

/**
 * Copy the contents of `source` into `target`.
 *
 * Both schemas are prepared first. Writes go through the target's upsert, so
 * running the migration twice leaves the target unchanged.
 */
export async function migrateBackend(
  source: BackendStrategy,
  target: BackendStrategy,
  spec: MigrateBackendSpec = {},
  logger: Logger = workflowsLogger
): Promise<MigrateBackendResult> {
  const parsed = MigrateBackendSpecSchema.safeParse(spec);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(
      `Invalid migration spec: ${issue?.message ?? 'unknown error'}`,
      issue ? String(issue.path[0] ?? '') : undefined,
      { issues: parsed.error.issues }
    );
  }
  const { batchSize, includeCommodities, includeCheckpoints } = parsed.data;
  const startedAt = Date.now();

  await source.ensureSchema();
  await target.ensureSchema();

  let batches = 0;
  let rates = emptyPersistenceResult();
  for (const batch of chunk(await source.fetchRange(), batchSize)) {
    rates = addPersistenceResults(rates, await target.insertRates(batch));
    batches += 1;
  }

  const commodities: Record<MetalTag, PersistenceResult> = {
    COPPER: emptyPersistenceResult(),
    ALUMINUM: emptyPersistenceResult(),
  };
  if (includeCommodities) {
    for (const metal of METAL_TAGS) {
      for (const batch of chunk(await source.fetchCommodityRange(metal), batchSize)) {
        commodities[metal] = addPersistenceResults(
          commodities[metal],
          await target.insertCommodity(metal, batch)
        );
        batches += 1;
      }
    }
  }

  let checkpoints = 0;
  if (includeCheckpoints) {
    for (const checkpoint of await source.listCheckpoints()) {
      await target.writeCheckpoint(checkpoint.source, checkpoint.lastIngestedDate);
      checkpoints += 1;
    }
  }

  LogHelpers.performance(logger, 'backend-migration', Date.now() - startedAt, true, {
    from: source.kind,
    to: target.kind,
    batches,
    checkpoints,
    ...rates,
  });

  return { rates, commodities, checkpoints, batches };
}
