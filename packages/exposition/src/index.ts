/**
 * @telex/exposition
 *
 * Renders an OpenTelemetry metric snapshot in the Prometheus text
 * exposition format.
 */

export {
  escapeHelp,
  escapeLabelValue,
  formatValue,
  sanitizeLabelName,
  sanitizeMetricName,
} from "./sanitize.js";
export type { FamilyType, ProblemHandler } from "./serializer.js";
export {
  EXPOSITION_CONTENT_TYPE,
  renderExposition,
  SCOPE_NAME_LABEL,
  TARGET_INFO_NAME,
} from "./serializer.js";
