/**
 * Network Topology — Core Types
 *
 * Normalized data model for one point-in-time snapshot of an AWS Transit
 * Gateway network: gateways, route tables, attachments, VPCs, subnets and
 * the hybrid connectivity objects (VPN, Direct Connect) around them.
 *
 * Entities are created by the record normalizer and only the Correlator and
 * the Subnet Classifier mutate them afterwards.
 */

// =============================================================================
// Closed Enumerations
// =============================================================================

/** Resource kind behind a TGW attachment. Unrecognized values map to "unknown". */
export type AttachmentType =
  | "vpc"
  | "vpn"
  | "direct-connect-gateway"
  | "peering"
  | "tgw-peering"
  | "connect"
  | "unknown";

export const ATTACHMENT_TYPES: readonly AttachmentType[] = [
  "vpc",
  "vpn",
  "direct-connect-gateway",
  "peering",
  "tgw-peering",
  "connect",
  "unknown",
];

/** How a TGW route entered its table. */
export type RouteOrigin = "static" | "propagated";

export type RouteState = "active" | "blackhole";

/** Resolved target of a VPC route. */
export type RouteTargetType =
  | "local"
  | "igw"
  | "nat"
  | "tgw"
  | "vpc-peering"
  | "vpc-endpoint"
  | "vgw"
  | "eni"
  | "egress-igw"
  | "unknown";

/** Internet reachability class derived from a subnet's default route. */
export type SubnetClass = "public" | "private" | "isolated" | "tgw-attached";

// =============================================================================
// Transit Gateway
// =============================================================================

/** A Transit Gateway owned by the viewing account. */
export type TransitGateway = {
  id: string;
  name: string;
  ownerId: string;
  /** Amazon side ASN (0 when not reported). */
  asn: number;
  state: string;
};

/**
 * A route in a TGW route table.
 *
 * `destinationCidr` and `prefixListId` are mutually exclusive in the provider
 * feed; the prefix list wins for display (see `routeDestination`).
 */
export type TgwRoute = {
  destinationCidr: string;
  prefixListId: string | null;
  attachmentId: string | null;
  resourceId: string | null;
  resourceType: string | null;
  origin: RouteOrigin;
  state: RouteState;
};

export type TgwRouteTable = {
  id: string;
  tgwId: string;
  name: string;
  isDefaultAssociation: boolean;
  isDefaultPropagation: boolean;
  /** Insertion order from the feed; carries no priority. */
  routes: TgwRoute[];
  /** Attachment ids whose association is settled ("associated"). */
  associations: Set<string>;
  /** Attachment ids propagating into this table ("enabled"). */
  propagations: Set<string>;
};

export type TgwAttachment = {
  id: string;
  tgwId: string;
  type: AttachmentType;
  resourceId: string;
  resourceOwnerId: string;
  name: string;
  state: string;
  /** Filled by the Correlator (local VPC link or propagated-route recovery). */
  cidrs: string[];
  associatedRouteTableId: string | null;
  propagatingTo: string[];
  /** True when the resource owner differs from the TGW owner (or the local account). */
  isCrossAccount: boolean;
  tgwOwnerId: string;
};

// =============================================================================
// VPC
// =============================================================================

export type Vpc = {
  id: string;
  name: string;
  /** Primary block first, then secondary associations, de-duplicated. */
  cidrs: string[];
  ownerId: string;
  isDefault: boolean;
  igwId: string | null;
  natGatewayIds: string[];
  tgwAttachmentId: string | null;
  mainRouteTableId: string | null;
};

export type VpcRoute = {
  /** CIDR, IPv6 CIDR or prefix-list id. */
  destination: string;
  targetType: RouteTargetType;
  targetId: string;
  state: RouteState;
};

export type VpcRouteTable = {
  id: string;
  vpcId: string;
  name: string;
  isMain: boolean;
  routes: VpcRoute[];
  subnetIds: string[];
};

export type Subnet = {
  id: string;
  vpcId: string;
  cidr: string;
  availabilityZone: string;
  name: string;
  /** Explicit association; null means the VPC main table governs. */
  routeTableId: string | null;
  subnetClass: SubnetClass;
};

export type NatGateway = {
  id: string;
  vpcId: string;
  subnetId: string;
  state: string;
  name: string;
};

export type VpcPeering = {
  id: string;
  name: string;
  status: string;
  requesterVpcId: string;
  requesterCidr: string;
  requesterOwnerId: string;
  accepterVpcId: string;
  accepterCidr: string;
  accepterOwnerId: string;
};

// =============================================================================
// Site-to-Site VPN
// =============================================================================

export type VpnTunnel = {
  outsideIp: string;
  /** "UP" or "DOWN" as reported by the provider telemetry. */
  status: string;
  statusMessage: string;
  acceptedRouteCount: number;
  lastStatusChange: string;
};

export type VpnConnection = {
  id: string;
  name: string;
  state: string;
  customerGatewayId: string;
  tgwId: string | null;
  vpnGatewayId: string | null;
  tunnels: VpnTunnel[];
  staticRoutesOnly: boolean;
  enableAcceleration: boolean;
  localIpv4Cidr: string;
  remoteIpv4Cidr: string;
  /** Static route destinations configured on the connection. */
  routes: string[];
};

export type CustomerGateway = {
  id: string;
  name: string;
  ipAddress: string;
  bgpAsn: string;
  state: string;
  deviceName: string;
};

// =============================================================================
// Direct Connect
// =============================================================================

export type BgpPeer = {
  peerId: string;
  asn: number;
  amazonAddress: string;
  customerAddress: string;
  peerState: string;
  /** "up" or "down" (case-insensitive). */
  status: string;
};

export type DxConnection = {
  id: string;
  name: string;
  state: string;
  location: string;
  bandwidth: string;
  vlan: number;
  partnerName: string;
  providerName: string;
  hasLogicalRedundancy: boolean;
  awsDevice: string;
};

export type DxVirtualInterface = {
  id: string;
  name: string;
  vifType: string;
  state: string;
  connectionId: string;
  vlan: number;
  customerAsn: number;
  amazonAsn: number;
  amazonAddress: string;
  customerAddress: string;
  mtu: number;
  jumboCapable: boolean;
  bgpPeers: BgpPeer[];
  dxGatewayId: string | null;
  virtualGatewayId: string | null;
  routeFilterPrefixes: string[];
};

export type DxGateway = {
  id: string;
  name: string;
  amazonAsn: number;
  ownerAccount: string;
  state: string;
};

// =============================================================================
// Findings
// =============================================================================

export type FindingSeverity = "info" | "warning" | "error";

export type FindingKind =
  | "blackhole"
  | "asymmetric"
  | "peering"
  | "overlap"
  | "missing_route"
  | "vpn_down"
  | "vpn_partial"
  | "dx_down"
  | "dx_degraded"
  | "vif_down"
  | "bgp_down"
  | "bgp_partial";

/** A single defect reported by the analyzer. */
export type Finding = {
  kind: FindingKind;
  severity: FindingSeverity;
  /** Human-readable location label (table name, VPC pair, VIF name, ...). */
  location: string;
  message: string;
};
