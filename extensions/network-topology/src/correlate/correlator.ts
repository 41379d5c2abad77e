/**
 * Network Topology — Correlator
 *
 * Cross-links entities that were loaded independently and backfills what the
 * viewing account cannot describe directly:
 *
 *   - TGW route table ↔ attachment (associations and propagations)
 *   - VPC route table ↔ subnet, and the VPC main route table
 *   - Internet/NAT gateway → VPC back-references
 *   - VPC attachment ↔ local VPC (CIDRs, name, back-reference)
 *   - Cross-account attachment CIDRs recovered from propagated routes
 *
 * Every lookup into another collection is a soft miss. The correlator runs
 * exactly once per catalog, immediately after normalization.
 */

import type { TopologyCatalog } from "../catalog.js";
import type { RecordBatches } from "../ingest/batches.js";
import { fieldBoolean, fieldRecords, fieldString } from "../ingest/fields.js";
import type { TopologyLogger } from "../logging/index.js";
import { createSilentLogger } from "../logging/index.js";

export type CorrelationResult = {
  associationsLinked: number;
  propagationsLinked: number;
  subnetsLinked: number;
  vpcAttachmentsLinked: number;
  /** Attachment ids whose CIDRs came from propagated routes. */
  recoveredAttachments: string[];
};

// =============================================================================
// TGW Route Table Links
// =============================================================================

/**
 * Apply association ("associated") and propagation ("enabled") records.
 * Any other state is still settling and is ignored.
 */
export function linkRouteTableMembership(
  catalog: TopologyCatalog,
  batches: RecordBatches,
  result: CorrelationResult,
): void {
  for (const [rtId, records] of Object.entries(batches.tgwAssociations ?? {})) {
    const rt = catalog.tgwRouteTables.get(rtId);
    if (!rt) continue;

    for (const record of records) {
      if (fieldString(record, "State") !== "associated") continue;
      const attId = fieldString(record, "TransitGatewayAttachmentId");
      if (!attId) continue;

      rt.associations.add(attId);
      const att = catalog.tgwAttachments.get(attId);
      if (att) att.associatedRouteTableId = rtId;
      result.associationsLinked += 1;
    }
  }

  for (const [rtId, records] of Object.entries(batches.tgwPropagations ?? {})) {
    const rt = catalog.tgwRouteTables.get(rtId);
    if (!rt) continue;

    for (const record of records) {
      if (fieldString(record, "State") !== "enabled") continue;
      const attId = fieldString(record, "TransitGatewayAttachmentId");
      if (!attId) continue;

      rt.propagations.add(attId);
      const att = catalog.tgwAttachments.get(attId);
      if (att && !att.propagatingTo.includes(rtId)) att.propagatingTo.push(rtId);
      result.propagationsLinked += 1;
    }
  }
}

// =============================================================================
// VPC Route Table Links
// =============================================================================

export function linkVpcRouteTables(
  catalog: TopologyCatalog,
  batches: RecordBatches,
  result: CorrelationResult,
): void {
  for (const record of batches.vpcRouteTables ?? []) {
    const table = catalog.vpcRouteTables.get(fieldString(record, "RouteTableId"));
    if (!table) continue;

    for (const assoc of fieldRecords(record, "Associations[]")) {
      if (fieldBoolean(assoc, "Main")) {
        table.isMain = true;
        const vpc = catalog.vpcs.get(table.vpcId);
        if (vpc) vpc.mainRouteTableId = table.id;
      }

      const subnetId = fieldString(assoc, "SubnetId");
      if (!subnetId) continue;
      if (!table.subnetIds.includes(subnetId)) table.subnetIds.push(subnetId);

      const subnet = catalog.subnets.get(subnetId);
      if (subnet) {
        subnet.routeTableId = table.id;
        result.subnetsLinked += 1;
      }
    }
  }
}

export function linkGateways(catalog: TopologyCatalog): void {
  for (const [igwId, vpcId] of catalog.internetGateways) {
    const vpc = catalog.vpcs.get(vpcId);
    if (vpc) vpc.igwId = igwId;
  }

  for (const nat of catalog.natGateways.values()) {
    const vpc = catalog.vpcs.get(nat.vpcId);
    if (vpc && !vpc.natGatewayIds.includes(nat.id)) vpc.natGatewayIds.push(nat.id);
  }
}

// =============================================================================
// Attachment ↔ VPC
// =============================================================================

/**
 * Copy a local VPC's CIDRs and name onto its attachment. Cross-account VPC
 * attachments have no local VPC and stay CIDR-less here.
 */
export function linkVpcAttachments(catalog: TopologyCatalog, result: CorrelationResult): void {
  for (const att of catalog.tgwAttachments.values()) {
    if (att.type !== "vpc") continue;
    const vpc = catalog.vpcs.get(att.resourceId);
    if (!vpc) continue;

    att.cidrs = [...vpc.cidrs];
    att.name = vpc.name;
    vpc.tgwAttachmentId = att.id;
    result.vpcAttachmentsLinked += 1;
  }
}

// =============================================================================
// Cross-Account CIDR Recovery
// =============================================================================

/**
 * Collect destination CIDRs of propagated routes per target attachment.
 * Static routes and prefix-list destinations are not evidence of what an
 * attachment owns.
 */
export function collectPropagatedCidrs(catalog: TopologyCatalog): Map<string, Set<string>> {
  const candidates = new Map<string, Set<string>>();

  for (const rt of catalog.tgwRouteTables.values()) {
    for (const route of rt.routes) {
      if (route.origin !== "propagated" || !route.attachmentId) continue;
      if (!route.destinationCidr || route.prefixListId) continue;

      const set = candidates.get(route.attachmentId) ?? new Set<string>();
      set.add(route.destinationCidr);
      candidates.set(route.attachmentId, set);
    }
  }

  return candidates;
}

/** Fill VPC/VPN attachments that still lack CIDRs. Populated CIDRs are never replaced. */
export function recoverCrossAccountCidrs(catalog: TopologyCatalog, result: CorrelationResult): void {
  const candidates = collectPropagatedCidrs(catalog);

  for (const att of catalog.tgwAttachments.values()) {
    if (att.type !== "vpc" && att.type !== "vpn") continue;
    if (att.cidrs.length > 0) continue;

    const cidrs = candidates.get(att.id);
    if (!cidrs || cidrs.size === 0) continue;

    att.cidrs = [...cidrs].sort();
    result.recoveredAttachments.push(att.id);
  }
}

// =============================================================================
// Entry Point
// =============================================================================

export function correlate(
  catalog: TopologyCatalog,
  batches: RecordBatches,
  logger: TopologyLogger = createSilentLogger(),
): CorrelationResult {
  const result: CorrelationResult = {
    associationsLinked: 0,
    propagationsLinked: 0,
    subnetsLinked: 0,
    vpcAttachmentsLinked: 0,
    recoveredAttachments: [],
  };

  linkRouteTableMembership(catalog, batches, result);
  linkVpcRouteTables(catalog, batches, result);
  linkGateways(catalog);
  linkVpcAttachments(catalog, result);
  recoverCrossAccountCidrs(catalog, result);

  logger.debug("Correlation complete", {
    associations: result.associationsLinked,
    propagations: result.propagationsLinked,
    subnets: result.subnetsLinked,
    vpcAttachments: result.vpcAttachmentsLinked,
  });
  for (const attId of result.recoveredAttachments) {
    const att = catalog.tgwAttachments.get(attId);
    logger.debug(`Recovered CIDRs for ${attId} from propagated routes`, { cidrs: att?.cidrs ?? [] });
  }

  return result;
}
