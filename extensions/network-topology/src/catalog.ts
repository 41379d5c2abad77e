/**
 * Network Topology — Resource Catalog
 *
 * Keyed entity store for one snapshot plus the read-only projections the
 * analyzer and the reporting layer share. A catalog is created fresh for
 * every pipeline run; nothing here is a module-level singleton.
 */

import type {
  CustomerGateway,
  DxConnection,
  DxGateway,
  DxVirtualInterface,
  NatGateway,
  Subnet,
  SubnetClass,
  TgwAttachment,
  TgwRoute,
  TgwRouteTable,
  TransitGateway,
  Vpc,
  VpcPeering,
  VpcRouteTable,
  VpnConnection,
} from "./types.js";

// =============================================================================
// Catalog
// =============================================================================

export class TopologyCatalog {
  readonly transitGateways = new Map<string, TransitGateway>();
  readonly tgwRouteTables = new Map<string, TgwRouteTable>();
  readonly tgwAttachments = new Map<string, TgwAttachment>();
  readonly vpcs = new Map<string, Vpc>();
  readonly vpcRouteTables = new Map<string, VpcRouteTable>();
  readonly subnets = new Map<string, Subnet>();
  readonly peerings = new Map<string, VpcPeering>();
  readonly vpnConnections = new Map<string, VpnConnection>();
  readonly customerGateways = new Map<string, CustomerGateway>();
  readonly dxConnections = new Map<string, DxConnection>();
  readonly dxVirtualInterfaces = new Map<string, DxVirtualInterface>();
  readonly dxGateways = new Map<string, DxGateway>();
  /** Internet gateway id → attached VPC id. */
  readonly internetGateways = new Map<string, string>();
  readonly natGateways = new Map<string, NatGateway>();
  /** Prefix list id → friendly name. */
  readonly prefixLists = new Map<string, string>();

  constructor(readonly localAccountId: string = "") {}
}

// =============================================================================
// Account Perspective
// =============================================================================

/** The viewing account owns at least one Transit Gateway. */
export function isHubAccount(catalog: TopologyCatalog): boolean {
  return catalog.transitGateways.size > 0;
}

/** The viewing account only sees its own attachments into a foreign TGW. */
export function isSpokeAccount(catalog: TopologyCatalog): boolean {
  return catalog.transitGateways.size === 0 && catalog.tgwAttachments.size > 0;
}

export type AccountMode = "hub" | "spoke" | "standalone";

export function accountMode(catalog: TopologyCatalog): AccountMode {
  if (isHubAccount(catalog)) return "hub";
  return isSpokeAccount(catalog) ? "spoke" : "standalone";
}

/** TGW ids referenced by attachments; the only way a spoke can name its gateway. */
export function referencedTgwIds(catalog: TopologyCatalog): Set<string> {
  const ids = new Set<string>();
  for (const att of catalog.tgwAttachments.values()) {
    if (att.tgwId) ids.add(att.tgwId);
  }
  return ids;
}

export function crossAccountAttachments(catalog: TopologyCatalog): TgwAttachment[] {
  return [...catalog.tgwAttachments.values()].filter((a) => a.isCrossAccount);
}

export function localAttachments(catalog: TopologyCatalog): TgwAttachment[] {
  return [...catalog.tgwAttachments.values()].filter((a) => !a.isCrossAccount);
}

// =============================================================================
// Entity Projections
// =============================================================================

/** Display destination of a TGW route; a prefix list takes precedence. */
export function routeDestination(route: TgwRoute): string {
  return route.prefixListId || route.destinationCidr || "";
}

/** Short owner label: "local", "...1234", or "?" when the owner is unknown. */
export function attachmentOwnerDisplay(att: TgwAttachment): string {
  if (!att.isCrossAccount) return "local";
  return att.resourceOwnerId ? `...${att.resourceOwnerId.slice(-4)}` : "?";
}

export type UpCount = { up: number; total: number };

export type TunnelStatus = "all_up" | "partial" | "down";

export type BgpStatus = "no_peers" | "all_up" | "partial" | "down";

export function isTunnelUp(status: string): boolean {
  return status === "UP";
}

export function isBgpPeerUp(status: string): boolean {
  return status.toLowerCase() === "up";
}

export function tunnelCounts(vpn: VpnConnection): UpCount {
  return {
    up: vpn.tunnels.filter((t) => isTunnelUp(t.status)).length,
    total: vpn.tunnels.length,
  };
}

/** Aggregate tunnel state. A connection without tunnels reports "all_up". */
export function tunnelStatus(vpn: VpnConnection): TunnelStatus {
  const { up, total } = tunnelCounts(vpn);
  if (up === total) return "all_up";
  return up > 0 ? "partial" : "down";
}

export function tunnelSummary(vpn: VpnConnection): string {
  const { up, total } = tunnelCounts(vpn);
  return `${up}/${total} tunnels UP`;
}

export function bgpCounts(vif: DxVirtualInterface): UpCount {
  return {
    up: vif.bgpPeers.filter((p) => isBgpPeerUp(p.status)).length,
    total: vif.bgpPeers.length,
  };
}

export function bgpStatus(vif: DxVirtualInterface): BgpStatus {
  const { up, total } = bgpCounts(vif);
  if (total === 0) return "no_peers";
  if (up === total) return "all_up";
  return up > 0 ? "partial" : "down";
}

export function bgpSummary(vif: DxVirtualInterface): string {
  const { up, total } = bgpCounts(vif);
  return `${up}/${total} BGP UP`;
}

// =============================================================================
// Aggregate Statistics
// =============================================================================

export type CatalogStats = {
  transitGateways: number;
  tgwAttachments: number;
  crossAccountAttachments: number;
  tgwRouteTables: number;
  vpcs: number;
  subnets: number;
  subnetsByClass: Record<SubnetClass, number>;
  vpnConnections: number;
  tunnels: UpCount;
  dxVirtualInterfaces: number;
  bgpPeers: UpCount;
};

export function catalogStats(catalog: TopologyCatalog): CatalogStats {
  const subnetsByClass: Record<SubnetClass, number> = {
    public: 0,
    private: 0,
    "tgw-attached": 0,
    isolated: 0,
  };
  for (const subnet of catalog.subnets.values()) {
    subnetsByClass[subnet.subnetClass] += 1;
  }

  const tunnels: UpCount = { up: 0, total: 0 };
  for (const vpn of catalog.vpnConnections.values()) {
    const c = tunnelCounts(vpn);
    tunnels.up += c.up;
    tunnels.total += c.total;
  }

  const bgpPeers: UpCount = { up: 0, total: 0 };
  for (const vif of catalog.dxVirtualInterfaces.values()) {
    const c = bgpCounts(vif);
    bgpPeers.up += c.up;
    bgpPeers.total += c.total;
  }

  return {
    transitGateways: catalog.transitGateways.size,
    tgwAttachments: catalog.tgwAttachments.size,
    crossAccountAttachments: crossAccountAttachments(catalog).length,
    tgwRouteTables: catalog.tgwRouteTables.size,
    vpcs: catalog.vpcs.size,
    subnets: catalog.subnets.size,
    subnetsByClass,
    vpnConnections: catalog.vpnConnections.size,
    tunnels,
    dxVirtualInterfaces: catalog.dxVirtualInterfaces.size,
    bgpPeers,
  };
}
