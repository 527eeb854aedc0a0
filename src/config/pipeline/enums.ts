/**
 * Closed value sets shared by configuration, stage contracts and the CLI.
 */

import { z } from "zod";

/**
 * Pipeline stages, in execution order.
 *
 * The order is the dependency order: each stage consumes the output of
 * the one before it. The coordinator iterates this list as-is.
 */
export const StageName = z.enum(["research", "verification", "synthesis", "rendering"]);
export type StageName = z.infer<typeof StageName>;

export const PIPELINE_STAGES: readonly StageName[] = StageName.options;

/**
 * Report output formats accepted by the rendering stage.
 */
export const ReportFormat = z.enum(["html", "markdown", "pdf"]);
export type ReportFormat = z.infer<typeof ReportFormat>;

/**
 * Built-in search providers for the research stage.
 *
 *   mock   deterministic synthetic results (offline development)
 *   store  ranks sources already held in the source store
 */
export const SearchProviderName = z.enum(["mock", "store"]);
export type SearchProviderName = z.infer<typeof SearchProviderName>;
