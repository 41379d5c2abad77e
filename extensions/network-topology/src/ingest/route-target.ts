/**
 * Network Topology — VPC Route Target Resolution
 */

import type { RouteTargetType } from "../types.js";
import { fieldString } from "./fields.js";

export type ResolvedRouteTarget = {
  targetType: RouteTargetType;
  targetId: string;
};

/** Gateway id prefixes, checked in order against `GatewayId`. */
const GATEWAY_PREFIXES: ReadonlyArray<[prefix: string, type: RouteTargetType]> = [
  ["igw-", "igw"],
  ["vgw-", "vgw"],
  ["eigw-", "egress-igw"],
  ["vpce-", "vpc-endpoint"],
];

/** Remaining target fields, in priority order after `GatewayId`. */
const TARGET_FIELDS: ReadonlyArray<[field: string, type: RouteTargetType]> = [
  ["NatGatewayId", "nat"],
  ["TransitGatewayId", "tgw"],
  ["VpcPeeringConnectionId", "vpc-peering"],
  ["NetworkInterfaceId", "eni"],
];

/**
 * Resolve the target of a raw VPC route.
 *
 * `GatewayId` is consulted first and dispatched on its prefix; a gateway id
 * with an unrecognized prefix falls through to the remaining fields. The first
 * field that matches decides.
 */
export function resolveRouteTarget(route: unknown): ResolvedRouteTarget {
  const gatewayId = fieldString(route, "GatewayId");
  if (gatewayId) {
    if (gatewayId === "local") return { targetType: "local", targetId: "local" };
    for (const [prefix, type] of GATEWAY_PREFIXES) {
      if (gatewayId.startsWith(prefix)) return { targetType: type, targetId: gatewayId };
    }
  }

  for (const [field, type] of TARGET_FIELDS) {
    const id = fieldString(route, field);
    if (id) return { targetType: type, targetId: id };
  }

  return { targetType: "unknown", targetId: "" };
}
