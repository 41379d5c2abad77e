/**
 * Network Topology — Subnet Classifier
 *
 * Derives each subnet's reachability class from the first default route of
 * its effective route table (explicit association, else the VPC main table).
 */

import type { TopologyCatalog } from "../catalog.js";
import type { Subnet, SubnetClass, VpcRoute, VpcRouteTable } from "../types.js";

const DEFAULT_DESTINATIONS = new Set(["0.0.0.0/0", "::/0"]);

export function isDefaultRoute(route: VpcRoute): boolean {
  return DEFAULT_DESTINATIONS.has(route.destination);
}

export function effectiveRouteTable(catalog: TopologyCatalog, subnet: Subnet): VpcRouteTable | undefined {
  const rtId = subnet.routeTableId ?? catalog.vpcs.get(subnet.vpcId)?.mainRouteTableId;
  return rtId ? catalog.vpcRouteTables.get(rtId) : undefined;
}

/** Class implied by a table's routes, scanned in table order. */
export function classifyRoutes(routes: readonly VpcRoute[]): SubnetClass {
  const defaultRoute = routes.find(isDefaultRoute);
  switch (defaultRoute?.targetType) {
    case "igw":
      return "public";
    case "nat":
      return "private";
    case "tgw":
      return "tgw-attached";
    default:
      return "isolated";
  }
}

export function classifySubnets(catalog: TopologyCatalog): Record<SubnetClass, number> {
  const counts: Record<SubnetClass, number> = { public: 0, private: 0, "tgw-attached": 0, isolated: 0 };

  for (const subnet of catalog.subnets.values()) {
    const table = effectiveRouteTable(catalog, subnet);
    subnet.subnetClass = table ? classifyRoutes(table.routes) : "isolated";
    counts[subnet.subnetClass] += 1;
  }

  return counts;
}
