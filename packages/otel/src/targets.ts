/**
 * Translate export targets into SDK settings.
 */

import { isAtLeast, type LevelFilter, type Severity, type Temporality } from "@telex/config";
import {
  AggregationTemporality,
  type AggregationTemporalitySelector,
} from "@opentelemetry/sdk-metrics";
import type { LogTargetFilter } from "./types.js";

const deltaSelector: AggregationTemporalitySelector = () => AggregationTemporality.DELTA;
const cumulativeSelector: AggregationTemporalitySelector = () => AggregationTemporality.CUMULATIVE;

/**
 * Same temporality for every instrument kind.
 */
export function temporalitySelectorFor(temporality: Temporality): AggregationTemporalitySelector {
  return temporality === "delta" ? deltaSelector : cumulativeSelector;
}

/**
 * A record reaches a log target when the global level filter enables it
 * and, if the target sets `exportSeverity`, it is at least that severe.
 */
export function createLogTargetFilter(
  exportSeverity: Severity | undefined,
  levelFilter: LevelFilter,
): LogTargetFilter {
  return (severity, module) =>
    levelFilter.enabled(severity, module) &&
    (exportSeverity === undefined || isAtLeast(severity, exportSeverity));
}
