/**
 * Ingestion package logger
 */

import { createPackageLogger } from '@fxledger/utils';

export const logger = createPackageLogger('@fxledger/ingestion');
