/**
 * Storage Package Logger
 * ======================
 * Default logger for the storage package with namespace '@fxledger/storage'.
 * Backends accept their own logger through constructor options.
 */

import { createPackageLogger } from '@fxledger/utils';

export const logger = createPackageLogger('@fxledger/storage');
