/**
 * Research workflow: a four-stage research pipeline (research,
 * verification, synthesis, rendering) behind a workflow coordinator,
 * with a deduplicating source store.
 *
 * The environment-backed application config lives in `./config/index.js`
 * and is read by the CLI; importing this module reads no environment.
 */

export * from "./config/pipeline/index.js";
export { ConfigError } from "./config/env.js";
export * from "./errors/index.js";
export * from "./logging/index.js";
export * from "./envelope/index.js";
export * from "./store/index.js";
export * from "./reports/index.js";
export * from "./stages/index.js";
export * from "./coordinator/index.js";
