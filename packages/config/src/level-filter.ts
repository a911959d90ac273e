/**
 * Level filter expressions: a default severity plus per-module overrides,
 * e.g. `"info,grpc=off,telex.otel=debug"`.
 *
 * Grammar (comma separated, whitespace ignored):
 * - `level`         default for every module
 * - `module=level`  override for modules starting with `module`
 * - `module`        every severity for that module
 *
 * The longest matching module prefix wins; a module no directive matches is
 * disabled. An empty expression means `error`.
 */

import { LevelFilterParseError } from "@telex/errors";
import { parseSeverity, type Severity, severityRank } from "./severity.js";

export type LevelFilterValue = Severity | "off";

export interface LevelDirective {
  /** Module prefix; undefined for the default directive */
  readonly module?: string;
  readonly level: LevelFilterValue;
}

function parseLevel(text: string): LevelFilterValue | undefined {
  const normalized = text.trim().toLowerCase();
  if (normalized === "off") return "off";
  return parseSeverity(normalized);
}

export class LevelFilter {
  readonly expression: string;
  /** Directives sorted by module length, longest first; the default comes last */
  readonly directives: readonly LevelDirective[];

  private constructor(expression: string, directives: readonly LevelDirective[]) {
    this.expression = expression;
    this.directives = [...directives].sort(
      (a, b) => (b.module?.length ?? -1) - (a.module?.length ?? -1),
    );
  }

  /**
   * Parse an expression.
   *
   * @throws {LevelFilterParseError} on a malformed directive
   */
  static parse(expression: string): LevelFilter {
    const directives = new Map<string | undefined, LevelDirective>();

    for (const raw of expression.split(",")) {
      const part = raw.trim();
      if (part.length === 0) continue;

      if (part.includes("/")) {
        throw new LevelFilterParseError(
          expression,
          `"${part}" uses a regex suffix, which is not supported; use regexFilters instead`,
        );
      }

      const pieces = part.split("=");
      if (pieces.length > 2) {
        throw new LevelFilterParseError(expression, `"${part}" has more than one "="`);
      }

      if (pieces.length === 2) {
        const module = (pieces[0] ?? "").trim();
        const levelText = (pieces[1] ?? "").trim();
        if (module.length === 0) {
          throw new LevelFilterParseError(expression, `"${part}" has an empty module name`);
        }
        const level = parseLevel(levelText);
        if (level === undefined) {
          throw new LevelFilterParseError(expression, `unknown level "${levelText}"`);
        }
        directives.set(module, { module, level });
        continue;
      }

      const level = parseLevel(part);
      if (level !== undefined) {
        directives.set(undefined, { level });
      } else {
        directives.set(part, { module: part, level: "trace" });
      }
    }

    if (directives.size === 0) {
      directives.set(undefined, { level: "error" });
    }

    return new LevelFilter(expression, [...directives.values()]);
  }

  /**
   * Whether a record of `severity` from `module` passes the filter.
   */
  enabled(severity: Severity, module: string): boolean {
    const directive = this.directives.find(
      (d) => d.module === undefined || module.startsWith(d.module),
    );
    if (directive === undefined || directive.level === "off") return false;
    return severityRank(severity) >= severityRank(directive.level);
  }

  /**
   * The most verbose level any directive enables, or `"off"`.
   */
  get maxLevel(): LevelFilterValue {
    let max: LevelFilterValue = "off";
    for (const { level } of this.directives) {
      if (level === "off") continue;
      if (max === "off" || severityRank(level) < severityRank(max)) max = level;
    }
    return max;
  }
}
