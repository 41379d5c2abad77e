/**
 * Network topology configuration schema (TypeBox) and default config.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Check } from "@sinclair/typebox/value";
import { Errors } from "@sinclair/typebox/errors";
import type { AnalyzerCheck } from "./analysis/analyzer.js";
import { TopologyConfigError } from "./errors.js";
import { LOG_LEVELS, type TopologyLogLevel } from "./logging/index.js";

const LogLevelSchema = Type.Union(LOG_LEVELS.map((level) => Type.Literal(level)));

export const configSchema = Type.Object({
  accountId: Type.Optional(
    Type.String({ description: "Viewing account id; overrides the export metadata" }),
  ),
  logging: Type.Optional(
    Type.Object({
      level: Type.Optional(LogLevelSchema),
    }),
  ),
  checks: Type.Optional(
    Type.Object({
      blackholes: Type.Optional(Type.Boolean()),
      asymmetricRouting: Type.Optional(Type.Boolean()),
      peerings: Type.Optional(Type.Boolean()),
      cidrOverlaps: Type.Optional(Type.Boolean()),
      missingRoutes: Type.Optional(Type.Boolean()),
      vpnTunnels: Type.Optional(Type.Boolean()),
      directConnect: Type.Optional(Type.Boolean()),
    }),
  ),
  diagram: Type.Optional(
    Type.Object({
      maxRoutesPerTable: Type.Optional(Type.Integer({ minimum: 0 })),
    }),
  ),
  export: Type.Optional(
    Type.Object({
      region: Type.Optional(Type.String({ minLength: 1 })),
      profile: Type.Optional(Type.String()),
    }),
  ),
});

export type TopologyConfigInput = Static<typeof configSchema>;

/** Configuration with every default applied. */
export type TopologyConfig = {
  accountId?: string;
  logging: { level: TopologyLogLevel };
  checks: Record<AnalyzerCheck, boolean>;
  diagram: { maxRoutesPerTable: number };
  export: { region: string; profile?: string };
};

export function getDefaultConfig(): TopologyConfig {
  return {
    logging: { level: "info" },
    checks: {
      blackholes: true,
      asymmetricRouting: true,
      peerings: true,
      cidrOverlaps: true,
      missingRoutes: true,
      vpnTunnels: true,
      directConnect: true,
    },
    diagram: { maxRoutesPerTable: 5 },
    export: { region: "us-east-1" },
  };
}

/**
 * Validate raw configuration and merge it over the defaults section by
 * section. Throws `TopologyConfigError` listing every schema violation.
 */
export function resolveConfig(raw: unknown = {}): TopologyConfig {
  if (!Check(configSchema, raw)) {
    const issues: string[] = [];
    for (const error of Errors(configSchema, raw)) {
      issues.push(`${error.path || "(root)"}: ${error.message}`);
    }
    throw new TopologyConfigError("Invalid topology configuration", issues);
  }

  const defaults = getDefaultConfig();
  return {
    accountId: raw.accountId,
    logging: { ...defaults.logging, ...raw.logging },
    checks: { ...defaults.checks, ...raw.checks },
    diagram: { ...defaults.diagram, ...raw.diagram },
    export: { ...defaults.export, ...raw.export },
  };
}
