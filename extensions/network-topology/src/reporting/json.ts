/**
 * JSON-serializable dump of a catalog and its findings. Sets become sorted
 * arrays; maps become arrays in catalog order.
 */

import type { AccountMode, CatalogStats, TopologyCatalog } from "../catalog.js";
import { accountMode, catalogStats } from "../catalog.js";
import type {
  CustomerGateway,
  DxConnection,
  DxGateway,
  DxVirtualInterface,
  Finding,
  NatGateway,
  Subnet,
  TgwAttachment,
  TgwRoute,
  TransitGateway,
  Vpc,
  VpcPeering,
  VpcRouteTable,
  VpnConnection,
} from "../types.js";

export type TgwRouteTableSnapshot = {
  id: string;
  tgwId: string;
  name: string;
  isDefaultAssociation: boolean;
  isDefaultPropagation: boolean;
  routes: TgwRoute[];
  associations: string[];
  propagations: string[];
};

export type TopologySnapshot = {
  accountId: string;
  accountMode: AccountMode;
  stats: CatalogStats;
  transitGateways: TransitGateway[];
  tgwRouteTables: TgwRouteTableSnapshot[];
  tgwAttachments: TgwAttachment[];
  vpcs: Vpc[];
  subnets: Subnet[];
  vpcRouteTables: VpcRouteTable[];
  natGateways: NatGateway[];
  internetGateways: { id: string; vpcId: string }[];
  peerings: VpcPeering[];
  prefixLists: { id: string; name: string }[];
  vpnConnections: VpnConnection[];
  customerGateways: CustomerGateway[];
  dxConnections: DxConnection[];
  dxVirtualInterfaces: DxVirtualInterface[];
  dxGateways: DxGateway[];
  findings: Finding[];
};

export function toJsonSnapshot(catalog: TopologyCatalog, findings: readonly Finding[]): TopologySnapshot {
  return {
    accountId: catalog.localAccountId,
    accountMode: accountMode(catalog),
    stats: catalogStats(catalog),
    transitGateways: [...catalog.transitGateways.values()],
    tgwRouteTables: [...catalog.tgwRouteTables.values()].map((rt) => ({
      ...rt,
      associations: [...rt.associations].sort(),
      propagations: [...rt.propagations].sort(),
    })),
    tgwAttachments: [...catalog.tgwAttachments.values()],
    vpcs: [...catalog.vpcs.values()],
    subnets: [...catalog.subnets.values()],
    vpcRouteTables: [...catalog.vpcRouteTables.values()],
    natGateways: [...catalog.natGateways.values()],
    internetGateways: [...catalog.internetGateways].map(([id, vpcId]) => ({ id, vpcId })),
    peerings: [...catalog.peerings.values()],
    prefixLists: [...catalog.prefixLists].map(([id, name]) => ({ id, name })),
    vpnConnections: [...catalog.vpnConnections.values()],
    customerGateways: [...catalog.customerGateways.values()],
    dxConnections: [...catalog.dxConnections.values()],
    dxVirtualInterfaces: [...catalog.dxVirtualInterfaces.values()],
    dxGateways: [...catalog.dxGateways.values()],
    findings: [...findings],
  };
}
