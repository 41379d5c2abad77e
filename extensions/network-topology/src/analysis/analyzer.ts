/**
 * Network Topology — Reachability & Issue Analyzer
 *
 * Runs independent checks over a completed catalog and concatenates their
 * findings in a fixed order. Each check emits one contiguous block; no check
 * suppresses another. The catalog is only read.
 */

import type { TopologyCatalog } from "../catalog.js";
import { isBgpPeerUp, isTunnelUp, routeDestination } from "../catalog.js";
import type { Finding, FindingKind, FindingSeverity, TgwAttachment } from "../types.js";
import { cidrMatches, cidrsOverlap } from "./cidr.js";

// =============================================================================
// Options
// =============================================================================

export type AnalyzerCheck =
  | "blackholes"
  | "asymmetricRouting"
  | "peerings"
  | "cidrOverlaps"
  | "missingRoutes"
  | "vpnTunnels"
  | "directConnect";

export const ANALYZER_CHECKS: readonly AnalyzerCheck[] = [
  "blackholes",
  "asymmetricRouting",
  "peerings",
  "cidrOverlaps",
  "missingRoutes",
  "vpnTunnels",
  "directConnect",
];

export type AnalyzerOptions = {
  /** Checks set to false are skipped. Unlisted checks run. */
  checks?: Partial<Record<AnalyzerCheck, boolean>>;
};

/** DX connection states that are healthy or still being provisioned. */
const DX_SETTLING_STATES = new Set(["available", "ordering", "requested"]);

// =============================================================================
// Individual Checks
// =============================================================================

export function checkBlackholes(catalog: TopologyCatalog): Finding[] {
  const findings: Finding[] = [];
  for (const rt of catalog.tgwRouteTables.values()) {
    for (const route of rt.routes) {
      if (route.state !== "blackhole") continue;
      findings.push({
        kind: "blackhole",
        severity: "warning",
        location: rt.name,
        message: `Blackhole route to ${routeDestination(route)} in ${rt.name}`,
      });
    }
  }
  return findings;
}

/**
 * Single-hop reachability through the source's associated route table: some
 * non-blackhole route targets `dst` and covers one of its CIDRs.
 */
export function canReach(catalog: TopologyCatalog, src: TgwAttachment, dst: TgwAttachment): boolean {
  if (!src.associatedRouteTableId) return false;
  const rt = catalog.tgwRouteTables.get(src.associatedRouteTableId);
  if (!rt) return false;

  return dst.cidrs.some((cidr) =>
    rt.routes.some(
      (route) =>
        route.state !== "blackhole" &&
        route.attachmentId === dst.id &&
        cidrMatches(route.destinationCidr, cidr),
    ),
  );
}

export function checkAsymmetricRouting(catalog: TopologyCatalog): Finding[] {
  const findings: Finding[] = [];
  const attachments = [...catalog.tgwAttachments.values()];

  for (const tgw of catalog.transitGateways.values()) {
    const onTgw = attachments.filter((a) => a.tgwId === tgw.id);

    for (const src of onTgw) {
      for (const dst of onTgw) {
        if (src.id === dst.id) continue;
        if (!canReach(catalog, src, dst) || canReach(catalog, dst, src)) continue;

        findings.push({
          kind: "asymmetric",
          severity: "warning",
          location: `${src.name} → ${dst.name}`,
          message: `Asymmetric routing: ${src.name} can reach ${dst.name} but not vice versa`,
        });
      }
    }
  }
  return findings;
}

export function checkPeerings(catalog: TopologyCatalog): Finding[] {
  return [...catalog.peerings.values()]
    .filter((pcx) => pcx.status !== "active")
    .map((pcx): Finding => ({
      kind: "peering",
      severity: "warning",
      location: pcx.name,
      message: `VPC Peering ${pcx.name} is not active (status: ${pcx.status})`,
    }));
}

export function checkCidrOverlaps(catalog: TopologyCatalog): Finding[] {
  const findings: Finding[] = [];
  const vpcs = [...catalog.vpcs.values()];

  vpcs.forEach((vpc1, i) => {
    for (const vpc2 of vpcs.slice(i + 1)) {
      for (const cidr1 of vpc1.cidrs) {
        for (const cidr2 of vpc2.cidrs) {
          if (!cidrsOverlap(cidr1, cidr2)) continue;
          findings.push({
            kind: "overlap",
            severity: "warning",
            location: `${vpc1.name} / ${vpc2.name}`,
            message: `CIDR overlap: ${vpc1.name} (${cidr1}) overlaps with ${vpc2.name} (${cidr2})`,
          });
        }
      }
    }
  });
  return findings;
}

export function checkMissingRoutes(catalog: TopologyCatalog): Finding[] {
  const findings: Finding[] = [];
  const tables = [...catalog.vpcRouteTables.values()];

  for (const vpc of catalog.vpcs.values()) {
    if (!vpc.tgwAttachmentId) continue;

    const hasTgwRoute = tables.some(
      (rt) => rt.vpcId === vpc.id && rt.routes.some((r) => r.targetType === "tgw"),
    );
    if (hasTgwRoute) continue;

    findings.push({
      kind: "missing_route",
      severity: "info",
      location: vpc.name,
      message: `VPC ${vpc.name} is attached to TGW but has no TGW routes in any route table`,
    });
  }
  return findings;
}

export function checkVpnTunnels(catalog: TopologyCatalog): Finding[] {
  const findings: Finding[] = [];

  for (const vpn of catalog.vpnConnections.values()) {
    const down = vpn.tunnels.filter((t) => !isTunnelUp(t.status));

    if (vpn.tunnels.length > 0 && down.length === vpn.tunnels.length) {
      findings.push({
        kind: "vpn_down",
        severity: "error",
        location: vpn.name,
        message: `All tunnels DOWN for VPN ${vpn.name}`,
      });
      continue;
    }

    for (const tunnel of down) {
      findings.push({
        kind: "vpn_partial",
        severity: "warning",
        location: vpn.name,
        message: `Tunnel ${tunnel.outsideIp} DOWN for ${vpn.name}: ${tunnel.statusMessage || "No message"}`,
      });
    }
  }
  return findings;
}

export function checkDirectConnect(catalog: TopologyCatalog): Finding[] {
  const findings: Finding[] = [];

  for (const conn of catalog.dxConnections.values()) {
    if (conn.state === "down") {
      findings.push({
        kind: "dx_down",
        severity: "error",
        location: conn.name,
        message: `Direct Connect connection ${conn.name} is DOWN at ${conn.location}`,
      });
    } else if (!DX_SETTLING_STATES.has(conn.state)) {
      findings.push({
        kind: "dx_degraded",
        severity: "warning",
        location: conn.name,
        message: `Direct Connect connection ${conn.name} is in state: ${conn.state}`,
      });
    }
  }

  for (const vif of catalog.dxVirtualInterfaces.values()) {
    if (vif.state !== "available") {
      findings.push({
        kind: "vif_down",
        severity: "error",
        location: vif.name,
        message: `VIF ${vif.name} is in state: ${vif.state}`,
      });
    }

    const down = vif.bgpPeers.filter((p) => !isBgpPeerUp(p.status));
    if (vif.bgpPeers.length > 0 && down.length === vif.bgpPeers.length) {
      findings.push({
        kind: "bgp_down",
        severity: "error",
        location: vif.name,
        message: `All BGP peers DOWN for VIF ${vif.name}`,
      });
      continue;
    }

    for (const peer of down) {
      findings.push({
        kind: "bgp_partial",
        severity: "warning",
        location: vif.name,
        message: `BGP peer ASN ${peer.asn} (${peer.customerAddress}) DOWN on ${vif.name}`,
      });
    }
  }
  return findings;
}

// =============================================================================
// Analyzer
// =============================================================================

const CHECKS: Record<AnalyzerCheck, (catalog: TopologyCatalog) => Finding[]> = {
  blackholes: checkBlackholes,
  asymmetricRouting: checkAsymmetricRouting,
  peerings: checkPeerings,
  cidrOverlaps: checkCidrOverlaps,
  missingRoutes: checkMissingRoutes,
  vpnTunnels: checkVpnTunnels,
  directConnect: checkDirectConnect,
};

export function analyzeTopology(catalog: TopologyCatalog, options: AnalyzerOptions = {}): Finding[] {
  const findings: Finding[] = [];
  for (const check of ANALYZER_CHECKS) {
    if (options.checks?.[check] === false) continue;
    findings.push(...CHECKS[check](catalog));
  }
  return findings;
}

// =============================================================================
// Summaries
// =============================================================================

export type FindingSummary = {
  total: number;
  bySeverity: Record<FindingSeverity, number>;
  byKind: Partial<Record<FindingKind, number>>;
};

export const SEVERITY_RANK: Record<FindingSeverity, number> = { info: 0, warning: 1, error: 2 };

export function summarizeFindings(findings: readonly Finding[]): FindingSummary {
  const summary: FindingSummary = {
    total: findings.length,
    bySeverity: { info: 0, warning: 0, error: 0 },
    byKind: {},
  };
  for (const f of findings) {
    summary.bySeverity[f.severity] += 1;
    summary.byKind[f.kind] = (summary.byKind[f.kind] ?? 0) + 1;
  }
  return summary;
}

/** Findings at or above `threshold`. */
export function findingsAtLeast(findings: readonly Finding[], threshold: FindingSeverity): Finding[] {
  return findings.filter((f) => SEVERITY_RANK[f.severity] >= SEVERITY_RANK[threshold]);
}
