/**
 * On-disk layout of an export directory: one JSON file per resource type,
 * each wrapping its records in the envelope key the provider API returns.
 */

import type { RecordBatches } from "../ingest/batches.js";

/** Batches that are a flat record list (everything but the per-route-table maps). */
export type ListBatchKey = Exclude<
  keyof RecordBatches,
  "accountId" | "tgwRoutes" | "tgwAssociations" | "tgwPropagations"
>;

export type PerRouteTableBatchKey = "tgwRoutes" | "tgwAssociations" | "tgwPropagations";

export type ExportFile<K extends string> = {
  file: string;
  envelope: string;
  batch: K;
};

export const METADATA_FILE = "metadata.json";

export const LIST_FILES: readonly ExportFile<ListBatchKey>[] = [
  { file: "transit-gateways.json", envelope: "TransitGateways", batch: "transitGateways" },
  { file: "transit-gateway-attachments.json", envelope: "TransitGatewayAttachments", batch: "tgwAttachments" },
  { file: "transit-gateway-route-tables.json", envelope: "TransitGatewayRouteTables", batch: "tgwRouteTables" },
  { file: "vpcs.json", envelope: "Vpcs", batch: "vpcs" },
  { file: "subnets.json", envelope: "Subnets", batch: "subnets" },
  { file: "vpc-route-tables.json", envelope: "RouteTables", batch: "vpcRouteTables" },
  { file: "internet-gateways.json", envelope: "InternetGateways", batch: "internetGateways" },
  { file: "nat-gateways.json", envelope: "NatGateways", batch: "natGateways" },
  { file: "vpc-peering-connections.json", envelope: "VpcPeeringConnections", batch: "vpcPeerings" },
  { file: "vpn-connections.json", envelope: "VpnConnections", batch: "vpnConnections" },
  { file: "customer-gateways.json", envelope: "CustomerGateways", batch: "customerGateways" },
  { file: "prefix-lists.json", envelope: "PrefixLists", batch: "prefixLists" },
  { file: "dx-connections.json", envelope: "connections", batch: "dxConnections" },
  { file: "dx-gateways.json", envelope: "directConnectGateways", batch: "dxGateways" },
  { file: "dx-vifs.json", envelope: "virtualInterfaces", batch: "dxVirtualInterfaces" },
];

/** Files written once per TGW route table as `<prefix><routeTableId>.json`. */
export const PER_ROUTE_TABLE_FILES: readonly (ExportFile<PerRouteTableBatchKey> & { prefix: string })[] = [
  { prefix: "routes-", file: "routes-<rtb>.json", envelope: "Routes", batch: "tgwRoutes" },
  { prefix: "associations-", file: "associations-<rtb>.json", envelope: "Associations", batch: "tgwAssociations" },
  {
    prefix: "propagations-",
    file: "propagations-<rtb>.json",
    envelope: "TransitGatewayRouteTablePropagations",
    batch: "tgwPropagations",
  },
];

export function perRouteTableFileName(prefix: string, routeTableId: string): string {
  return `${prefix}${routeTableId}.json`;
}
