/**
 * Network Topology — Record Normalizer
 *
 * Maps provider records into catalog entities. Each batch is loaded
 * independently and merged by id; cross-links between batches are left to
 * the Correlator. Records without their own id are skipped.
 */

import type { TopologyCatalog } from "../catalog.js";
import type {
  AttachmentType,
  BgpPeer,
  TgwRoute,
  VpcRoute,
  VpnTunnel,
} from "../types.js";
import { ATTACHMENT_TYPES } from "../types.js";
import type { RecordBatches } from "./batches.js";
import {
  fieldBoolean,
  fieldNumber,
  fieldRecords,
  fieldString,
  fieldStrings,
  nameTag,
  optionalString,
  type RawRecord,
} from "./fields.js";
import { resolveRouteTarget } from "./route-target.js";

export type NormalizeResult = {
  /** Records dropped because they carried no id. */
  skipped: number;
  /** Route batches naming a TGW route table absent from the catalog. */
  orphanRouteBatches: string[];
};

// =============================================================================
// Shared Rules
// =============================================================================

export function parseAttachmentType(value: string): AttachmentType {
  return ATTACHMENT_TYPES.find((t) => t === value) ?? "unknown";
}

/**
 * Cross-account when the resource owner differs from the TGW owner, or from
 * the local account when the TGW owner is not reported.
 */
export function isCrossAccount(
  resourceOwnerId: string,
  tgwOwnerId: string,
  localAccountId: string,
): boolean {
  if (!resourceOwnerId) return false;
  if (tgwOwnerId) return resourceOwnerId !== tgwOwnerId;
  if (localAccountId) return resourceOwnerId !== localAccountId;
  return false;
}

/** "com.amazonaws.us-east-1.s3" → "s3"; customer-managed names pass through. */
export function friendlyPrefixListName(name: string): string {
  if (name.startsWith("com.amazonaws.")) {
    const parts = name.split(".");
    if (parts.length >= 4) return parts[parts.length - 1] ?? name;
  }
  return name;
}

/** Primary block first, then each secondary association not yet present. */
export function collectVpcCidrs(vpc: RawRecord): string[] {
  const cidrs: string[] = [];
  for (const cidr of [
    fieldString(vpc, "CidrBlock"),
    ...fieldStrings(vpc, "CidrBlockAssociationSet[].CidrBlock"),
  ]) {
    if (cidr && !cidrs.includes(cidr)) cidrs.push(cidr);
  }
  return cidrs;
}

export function toTgwRoute(route: RawRecord): TgwRoute {
  const [attachment] = fieldRecords(route, "TransitGatewayAttachments[]");
  return {
    destinationCidr: fieldString(route, "DestinationCidrBlock"),
    prefixListId: optionalString(route, "PrefixListId"),
    attachmentId: attachment ? optionalString(attachment, "TransitGatewayAttachmentId") : null,
    resourceId: attachment ? optionalString(attachment, "ResourceId") : null,
    resourceType: attachment ? optionalString(attachment, "ResourceType") : null,
    origin: fieldString(route, "Type") === "propagated" ? "propagated" : "static",
    state: fieldString(route, "State") === "blackhole" ? "blackhole" : "active",
  };
}

export function toVpcRoute(route: RawRecord): VpcRoute {
  const destination =
    fieldString(route, "DestinationCidrBlock") ||
    fieldString(route, "DestinationIpv6CidrBlock") ||
    fieldString(route, "DestinationPrefixListId");
  return {
    destination,
    ...resolveRouteTarget(route),
    state: fieldString(route, "State") === "blackhole" ? "blackhole" : "active",
  };
}

function toVpnTunnel(telemetry: RawRecord): VpnTunnel {
  return {
    outsideIp: fieldString(telemetry, "OutsideIpAddress"),
    status: fieldString(telemetry, "Status", "DOWN"),
    statusMessage: fieldString(telemetry, "StatusMessage"),
    acceptedRouteCount: fieldNumber(telemetry, "AcceptedRouteCount"),
    lastStatusChange: fieldString(telemetry, "LastStatusChange"),
  };
}

function toBgpPeer(peer: RawRecord): BgpPeer {
  return {
    peerId: fieldString(peer, "bgpPeerId"),
    asn: fieldNumber(peer, "asn"),
    amazonAddress: fieldString(peer, "amazonAddress"),
    customerAddress: fieldString(peer, "customerAddress"),
    peerState: fieldString(peer, "bgpPeerState"),
    status: fieldString(peer, "bgpStatus", "down"),
  };
}

// =============================================================================
// Normalizer
// =============================================================================

/**
 * Populate `catalog` from `batches`. Later records with an id already present
 * replace the earlier entity.
 */
export function normalizeRecords(catalog: TopologyCatalog, batches: RecordBatches): NormalizeResult {
  const result: NormalizeResult = { skipped: 0, orphanRouteBatches: [] };
  const take = (id: string): boolean => {
    if (!id) result.skipped += 1;
    return id !== "";
  };

  // --- Transit Gateways ---
  for (const tgw of batches.transitGateways ?? []) {
    const id = fieldString(tgw, "TransitGatewayId");
    if (!take(id)) continue;
    catalog.transitGateways.set(id, {
      id,
      name: nameTag(tgw) || id,
      ownerId: fieldString(tgw, "OwnerId"),
      asn: fieldNumber(tgw, "Options.AmazonSideAsn"),
      state: fieldString(tgw, "State"),
    });
  }

  // --- TGW Attachments ---
  for (const att of batches.tgwAttachments ?? []) {
    const id = fieldString(att, "TransitGatewayAttachmentId");
    if (!take(id)) continue;
    const resourceId = fieldString(att, "ResourceId");
    const resourceOwnerId = fieldString(att, "ResourceOwnerId");
    const tgwOwnerId = fieldString(att, "TransitGatewayOwnerId");
    catalog.tgwAttachments.set(id, {
      id,
      tgwId: fieldString(att, "TransitGatewayId"),
      type: parseAttachmentType(fieldString(att, "ResourceType", "unknown")),
      resourceId,
      resourceOwnerId,
      name: nameTag(att) || resourceId,
      state: fieldString(att, "State"),
      cidrs: [],
      associatedRouteTableId: null,
      propagatingTo: [],
      isCrossAccount: isCrossAccount(resourceOwnerId, tgwOwnerId, catalog.localAccountId),
      tgwOwnerId,
    });
  }

  // --- TGW Route Tables ---
  for (const rt of batches.tgwRouteTables ?? []) {
    const id = fieldString(rt, "TransitGatewayRouteTableId");
    if (!take(id)) continue;
    catalog.tgwRouteTables.set(id, {
      id,
      tgwId: fieldString(rt, "TransitGatewayId"),
      name: nameTag(rt) || id,
      isDefaultAssociation: fieldBoolean(rt, "DefaultAssociationRouteTable"),
      isDefaultPropagation: fieldBoolean(rt, "DefaultPropagationRouteTable"),
      routes: [],
      associations: new Set(),
      propagations: new Set(),
    });
  }

  // --- TGW Routes (per route table) ---
  for (const [rtId, routes] of Object.entries(batches.tgwRoutes ?? {})) {
    const rt = catalog.tgwRouteTables.get(rtId);
    if (!rt) {
      result.orphanRouteBatches.push(rtId);
      continue;
    }
    for (const route of routes) rt.routes.push(toTgwRoute(route));
  }

  // --- VPCs ---
  for (const vpc of batches.vpcs ?? []) {
    const id = fieldString(vpc, "VpcId");
    if (!take(id)) continue;
    catalog.vpcs.set(id, {
      id,
      name: nameTag(vpc) || id,
      cidrs: collectVpcCidrs(vpc),
      ownerId: fieldString(vpc, "OwnerId"),
      isDefault: fieldBoolean(vpc, "IsDefault"),
      igwId: null,
      natGatewayIds: [],
      tgwAttachmentId: null,
      mainRouteTableId: null,
    });
  }

  // --- Subnets ---
  for (const subnet of batches.subnets ?? []) {
    const id = fieldString(subnet, "SubnetId");
    if (!take(id)) continue;
    catalog.subnets.set(id, {
      id,
      vpcId: fieldString(subnet, "VpcId"),
      cidr: fieldString(subnet, "CidrBlock"),
      availabilityZone: fieldString(subnet, "AvailabilityZone"),
      name: nameTag(subnet) || id,
      routeTableId: null,
      subnetClass: "isolated",
    });
  }

  // --- VPC Route Tables ---
  for (const rt of batches.vpcRouteTables ?? []) {
    const id = fieldString(rt, "RouteTableId");
    if (!take(id)) continue;
    catalog.vpcRouteTables.set(id, {
      id,
      vpcId: fieldString(rt, "VpcId"),
      name: nameTag(rt) || id,
      isMain: false,
      routes: fieldRecords(rt, "Routes[]").map(toVpcRoute),
      subnetIds: [],
    });
  }

  // --- Internet Gateways ---
  for (const igw of batches.internetGateways ?? []) {
    const id = fieldString(igw, "InternetGatewayId");
    if (!take(id)) continue;
    for (const attachment of fieldRecords(igw, "Attachments[]")) {
      const vpcId = fieldString(attachment, "VpcId");
      if (fieldString(attachment, "State") === "available" && vpcId) {
        catalog.internetGateways.set(id, vpcId);
      }
    }
  }

  // --- NAT Gateways ---
  for (const nat of batches.natGateways ?? []) {
    const id = fieldString(nat, "NatGatewayId");
    if (!take(id)) continue;
    catalog.natGateways.set(id, {
      id,
      vpcId: fieldString(nat, "VpcId"),
      subnetId: fieldString(nat, "SubnetId"),
      state: fieldString(nat, "State"),
      name: nameTag(nat) || id,
    });
  }

  // --- VPC Peering ---
  for (const pcx of batches.vpcPeerings ?? []) {
    const id = fieldString(pcx, "VpcPeeringConnectionId");
    if (!take(id)) continue;
    catalog.peerings.set(id, {
      id,
      name: nameTag(pcx) || id,
      status: fieldString(pcx, "Status.Code"),
      requesterVpcId: fieldString(pcx, "RequesterVpcInfo.VpcId"),
      requesterCidr: fieldString(pcx, "RequesterVpcInfo.CidrBlock"),
      requesterOwnerId: fieldString(pcx, "RequesterVpcInfo.OwnerId"),
      accepterVpcId: fieldString(pcx, "AccepterVpcInfo.VpcId"),
      accepterCidr: fieldString(pcx, "AccepterVpcInfo.CidrBlock"),
      accepterOwnerId: fieldString(pcx, "AccepterVpcInfo.OwnerId"),
    });
  }

  // --- Prefix Lists ---
  for (const pl of batches.prefixLists ?? []) {
    const id = fieldString(pl, "PrefixListId");
    if (!take(id)) continue;
    catalog.prefixLists.set(id, friendlyPrefixListName(fieldString(pl, "PrefixListName")));
  }

  // --- VPN Connections ---
  for (const vpn of batches.vpnConnections ?? []) {
    const id = fieldString(vpn, "VpnConnectionId");
    if (!take(id)) continue;
    catalog.vpnConnections.set(id, {
      id,
      name: nameTag(vpn) || id,
      state: fieldString(vpn, "State"),
      customerGatewayId: fieldString(vpn, "CustomerGatewayId"),
      tgwId: optionalString(vpn, "TransitGatewayId"),
      vpnGatewayId: optionalString(vpn, "VpnGatewayId"),
      tunnels: fieldRecords(vpn, "VgwTelemetry[]").map(toVpnTunnel),
      staticRoutesOnly: fieldBoolean(vpn, "Options.StaticRoutesOnly"),
      enableAcceleration: fieldBoolean(vpn, "Options.EnableAcceleration"),
      localIpv4Cidr: fieldString(vpn, "Options.LocalIpv4NetworkCidr", "0.0.0.0/0"),
      remoteIpv4Cidr: fieldString(vpn, "Options.RemoteIpv4NetworkCidr", "0.0.0.0/0"),
      routes: fieldRecords(vpn, "Routes[]").map((r) => fieldString(r, "DestinationCidrBlock")),
    });
  }

  // --- Customer Gateways ---
  for (const cgw of batches.customerGateways ?? []) {
    const id = fieldString(cgw, "CustomerGatewayId");
    if (!take(id)) continue;
    catalog.customerGateways.set(id, {
      id,
      name: nameTag(cgw) || id,
      ipAddress: fieldString(cgw, "IpAddress"),
      bgpAsn: fieldString(cgw, "BgpAsn"),
      state: fieldString(cgw, "State"),
      deviceName: fieldString(cgw, "DeviceName"),
    });
  }

  // --- Direct Connect Connections ---
  for (const conn of batches.dxConnections ?? []) {
    const id = fieldString(conn, "connectionId");
    if (!take(id)) continue;
    catalog.dxConnections.set(id, {
      id,
      name: fieldString(conn, "connectionName") || nameTag(conn, "tags") || id,
      state: fieldString(conn, "connectionState"),
      location: fieldString(conn, "location"),
      bandwidth: fieldString(conn, "bandwidth"),
      vlan: fieldNumber(conn, "vlan"),
      partnerName: fieldString(conn, "partnerName"),
      providerName: fieldString(conn, "providerName"),
      hasLogicalRedundancy: fieldString(conn, "hasLogicalRedundancy", "no") === "yes",
      awsDevice: fieldString(conn, "awsDeviceV2") || fieldString(conn, "awsDevice"),
    });
  }

  // --- Direct Connect Gateways ---
  for (const gw of batches.dxGateways ?? []) {
    const id = fieldString(gw, "directConnectGatewayId");
    if (!take(id)) continue;
    catalog.dxGateways.set(id, {
      id,
      name: fieldString(gw, "directConnectGatewayName") || id,
      amazonAsn: fieldNumber(gw, "amazonSideAsn"),
      ownerAccount: fieldString(gw, "ownerAccount"),
      state: fieldString(gw, "directConnectGatewayState"),
    });
  }

  // --- Direct Connect Virtual Interfaces ---
  for (const vif of batches.dxVirtualInterfaces ?? []) {
    const id = fieldString(vif, "virtualInterfaceId");
    if (!take(id)) continue;
    catalog.dxVirtualInterfaces.set(id, {
      id,
      name: fieldString(vif, "virtualInterfaceName") || nameTag(vif, "tags") || id,
      vifType: fieldString(vif, "virtualInterfaceType"),
      state: fieldString(vif, "virtualInterfaceState"),
      connectionId: fieldString(vif, "connectionId"),
      vlan: fieldNumber(vif, "vlan"),
      customerAsn: fieldNumber(vif, "asn"),
      amazonAsn: fieldNumber(vif, "amazonSideAsn"),
      amazonAddress: fieldString(vif, "amazonAddress"),
      customerAddress: fieldString(vif, "customerAddress"),
      mtu: fieldNumber(vif, "mtu", 1500),
      jumboCapable: fieldBoolean(vif, "jumboFrameCapable"),
      bgpPeers: fieldRecords(vif, "bgpPeers[]").map(toBgpPeer),
      dxGatewayId: optionalString(vif, "directConnectGatewayId"),
      virtualGatewayId: optionalString(vif, "virtualGatewayId"),
      routeFilterPrefixes: fieldRecords(vif, "routeFilterPrefixes[]").map((p) => fieldString(p, "cidr")),
    });
  }

  return result;
}
