/**
 * Network Topology — Input Record Batches
 *
 * Per-resource-type batches of provider records, as returned by the EC2 and
 * Direct Connect describe/list APIs. Every batch is optional: an absent or
 * empty batch means "nothing loaded for this type".
 */

import type { RawRecord } from "./fields.js";

/** Records keyed by the TGW route table they were queried for. */
export type PerRouteTable = Record<string, RawRecord[]>;

export type RecordBatches = {
  /** Viewing account id; used only for the cross-account fallback. */
  accountId?: string;

  transitGateways?: RawRecord[];
  tgwAttachments?: RawRecord[];
  tgwRouteTables?: RawRecord[];
  tgwRoutes?: PerRouteTable;
  tgwAssociations?: PerRouteTable;
  tgwPropagations?: PerRouteTable;

  vpcs?: RawRecord[];
  subnets?: RawRecord[];
  vpcRouteTables?: RawRecord[];
  internetGateways?: RawRecord[];
  natGateways?: RawRecord[];
  vpcPeerings?: RawRecord[];
  prefixLists?: RawRecord[];

  vpnConnections?: RawRecord[];
  customerGateways?: RawRecord[];

  dxConnections?: RawRecord[];
  dxGateways?: RawRecord[];
  dxVirtualInterfaces?: RawRecord[];
};
