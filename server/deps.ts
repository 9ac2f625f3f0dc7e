/**
 * Server dependencies: wiring from configuration.
 * Swap the store or simulation without touching domain code.
 */

import { createDesignCatalog } from "../domain/designs.js";
import { createSequentialIdentifierGenerator } from "../domain/identifiers.js";
import { createTimestampSimulation } from "../domain/simulation.js";
import { StarModifier } from "../domain/starModifier.js";
import { InMemoryStarStore, type StarStore } from "../domain/starStore.js";
import { systemClock } from "../domain/utils.js";
import type { Clock } from "../domain/core.js";
import { loadConfig, type ServiceConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { StarModificationService } from "./starService.js";

export interface ServerDeps {
  readonly config: ServiceConfig;
  readonly logger: Logger;
  readonly store: StarStore;
  readonly modifier: StarModifier;
  readonly service: StarModificationService;
}

export interface ServerDepsOverrides {
  readonly store?: StarStore;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export function createServerDeps(
  config: ServiceConfig = loadConfig(),
  overrides: ServerDepsOverrides = {}
): ServerDeps {
  const clock = overrides.clock ?? systemClock;
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const store = overrides.store ?? new InMemoryStarStore();
  const modifier = new StarModifier({
    ids: createSequentialIdentifierGenerator(config.identifierStart),
    designs: createDesignCatalog(),
    simulation: createTimestampSimulation(clock),
    clock,
    logger,
  });
  const service = new StarModificationService({
    store,
    modifier,
    logger,
    verifyInvariants: config.verifyInvariants,
  });
  return { config, logger, store, modifier, service };
}
