export * from "./domain/core.js";
export * from "./domain/errors.js";
export * from "./domain/designs.js";
export * from "./domain/star.js";
export * from "./domain/modification.js";
export * from "./domain/logSink.js";
export * from "./domain/identifiers.js";
export * from "./domain/simulation.js";
export * from "./domain/starHelpers.js";
export * from "./domain/starInvariants.js";
export * from "./domain/starModifier.js";
export * from "./domain/starStore.js";
export { fixedClock, systemClock } from "./domain/utils.js";
export * from "./server/config.js";
export * from "./server/logger.js";
export * from "./server/starService.js";
export * from "./server/deps.js";
