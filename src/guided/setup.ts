/**
 * Wires a research engine from configuration.
 *
 * @packageDocumentation
 */

import type { Config } from '../config/types.js';
import type { Logger } from '../utils/logger.js';
import { GuidedResearchEngine } from './engine.js';
import { CatalogInstructionProvider } from './instructions/catalog-provider.js';
import { loadStepCatalog } from './instructions/catalog.js';
import { FileSessionStore } from './persistence.js';
import { FileResearchTrace } from './trace.js';

/**
 * An engine together with the store it writes to.
 */
export interface GuidedRuntime {
  readonly engine: GuidedResearchEngine;
  readonly store: FileSessionStore;
}

/**
 * Builds a file-backed engine using the configured catalog and thresholds.
 *
 * Sessions and their trace files share `config.paths.sessions`.
 *
 * @throws Error if the catalog cannot be loaded.
 */
export async function createGuidedRuntime(config: Config, logger: Logger): Promise<GuidedRuntime> {
  const fieldKeyPrefixLength = config.validation.field_key_prefix_length;
  const catalog = await loadStepCatalog(config.paths.catalog, { fieldKeyPrefixLength });
  const store = new FileSessionStore(config.paths.sessions);

  const engine = new GuidedResearchEngine({
    store,
    provider: new CatalogInstructionProvider(catalog, { fieldKeyPrefixLength }),
    trace: new FileResearchTrace(config.paths.sessions),
    logger: logger.child('GuidedResearchEngine'),
    validation: {
      minContentLength: config.validation.min_content_length,
      fieldKeyPrefixLength,
    },
  });

  logger.debug('runtime_ready', {
    sessions: config.paths.sessions,
    catalog: catalog.filePath,
  });

  return { engine, store };
}
