/**
 * Network Topology — Mermaid Diagram
 *
 * Hub accounts get one subgraph per owned Transit Gateway with its route
 * tables, then VPC and non-VPC attachment nodes linked to their associated
 * route table. Spoke accounts get an external placeholder per referenced
 * gateway with the local VPCs linked to it.
 *
 * Mermaid numbers links in order of appearance, so link colors are collected
 * while emitting and written as `linkStyle` lines at the end.
 */

import type { TopologyCatalog } from "../catalog.js";
import { isSpokeAccount, referencedTgwIds, routeDestination } from "../catalog.js";
import type { TgwAttachment, TgwRouteTable, TransitGateway, Vpc } from "../types.js";
import { escapeLabel, sanitizeId, truncate } from "./format.js";

export type MermaidOptions = {
  /** Routes listed per route table node before "+N more". */
  maxRoutesPerTable?: number;
};

const CLASS_DEFS = [
  "classDef tgw fill:#ff9900,stroke:#232f3e,color:#232f3e",
  "classDef tgwrt fill:#232f3e,stroke:#232f3e,color:#fff",
  "classDef vpc fill:#3b82f6,stroke:#1e40af,color:#fff",
  "classDef vpcCrossAcct fill:#e67e22,stroke:#d35400,color:#fff",
  "classDef vpn fill:#22c55e,stroke:#166534,color:#fff",
  "classDef dx fill:#a855f7,stroke:#7c3aed,color:#fff",
  "classDef tgwExternal fill:#ff9900,stroke:#232f3e,color:#232f3e,stroke-dasharray: 5 5",
];

export const LINK_COLORS = {
  localVpc: "#93c5fd",
  crossAccountVpc: "#fcd34d",
  vpn: "#86efac",
  other: "#d8b4fe",
} as const;

const MAX_ASSOCIATION_NAMES = 3;

type DiagramState = {
  lines: string[];
  /** Uncolored links emitted before the colored ones. */
  internalLinks: number;
  linkColors: string[];
};

function displayName(name: string, id: string, max: number): string {
  return name || id.slice(0, max);
}

function vpcFeatures(vpc: Vpc): string {
  const features: string[] = [];
  if (vpc.igwId) features.push("IGW");
  if (vpc.natGatewayIds.length > 0) features.push("NAT");
  if (vpc.tgwAttachmentId) features.push("TGW");
  return features.length > 0 ? `<br/><small>${features.join(" | ")}</small>` : "";
}

function cidrLabel(cidrs: string[]): string {
  return cidrs.length > 0 ? cidrs.slice(0, 2).join(", ") : "CIDR unknown";
}

// =============================================================================
// Hub Layout
// =============================================================================

function routeTableLabel(catalog: TopologyCatalog, rt: TgwRouteTable, maxRoutes: number): string {
  const assocNames: string[] = [];
  for (const attId of rt.associations) {
    const att = catalog.tgwAttachments.get(attId);
    if (att) assocNames.push(displayName(att.name, att.id, 15));
  }
  let assoc = assocNames.slice(0, MAX_ASSOCIATION_NAMES).join(", ");
  if (assocNames.length > MAX_ASSOCIATION_NAMES) assoc += ` +${assocNames.length - MAX_ASSOCIATION_NAMES}`;

  const routeLines = rt.routes.slice(0, maxRoutes).map((route) => {
    const state = route.state === "blackhole" ? "✗" : "✓";
    const origin = route.origin === "propagated" ? "P" : "S";
    const att = route.attachmentId ? catalog.tgwAttachments.get(route.attachmentId) : undefined;
    const target = att ? truncate(att.name || att.id, 15) : "blackhole";
    const kind = att ? att.type.toUpperCase().slice(0, 3) : "";
    return `${state} ${truncate(routeDestination(route), 18)} → ${escapeLabel(target)} [${kind}] [${origin}]`;
  });
  if (rt.routes.length > maxRoutes) routeLines.push(`... +${rt.routes.length - maxRoutes} more`);

  const star = rt.isDefaultAssociation ? " ⭐" : "";
  let label = `<b>${escapeLabel(rt.name || rt.id)}${star}</b>`;
  if (assoc) label += `<br/><small>Assoc: ${escapeLabel(assoc)}</small>`;
  label += `<br/><small>${routeLines.join("<br/>")}</small>`;
  return label;
}

function addTransitGateway(
  state: DiagramState,
  catalog: TopologyCatalog,
  tgw: TransitGateway,
  maxRoutes: number,
): void {
  const tgwId = sanitizeId(tgw.id);
  const name = escapeLabel(tgw.name);
  state.lines.push(`    subgraph TGW_${tgwId}["${name}"]`);
  state.lines.push(`        TGW_NODE_${tgwId}(("${name}"))`);
  state.lines.push(`        class TGW_NODE_${tgwId} tgw`);

  for (const rt of catalog.tgwRouteTables.values()) {
    if (rt.tgwId !== tgw.id) continue;
    const rtId = sanitizeId(rt.id);
    state.lines.push(`        TGWRT_${rtId}["${routeTableLabel(catalog, rt, maxRoutes)}"]`);
    state.lines.push(`        class TGWRT_${rtId} tgwrt`);
    state.lines.push(`        TGW_NODE_${tgwId} --- TGWRT_${rtId}`);
    state.internalLinks += 1;
  }

  state.lines.push("    end", "");
}

function addVpcAttachment(state: DiagramState, catalog: TopologyCatalog, att: TgwAttachment): void {
  const nodeId = `VPC_${sanitizeId(att.resourceId)}`;
  const vpc = catalog.vpcs.get(att.resourceId);

  let name: string;
  let cidrs: string;
  let styleClass = "vpc";
  let color: string = LINK_COLORS.localVpc;

  if (vpc) {
    name = displayName(vpc.name, vpc.id, 20);
    cidrs = cidrLabel(vpc.cidrs);
  } else {
    name = att.name && att.name !== att.resourceId ? att.name : `${att.resourceId.slice(0, 20)}...`;
    cidrs = cidrLabel(att.cidrs);
    styleClass = "vpcCrossAcct";
    color = LINK_COLORS.crossAccountVpc;
  }

  let account = "";
  if (att.isCrossAccount) {
    account = `<br/><small>🔗 Acct: ...${att.resourceOwnerId.slice(-4)}</small>`;
    styleClass = "vpcCrossAcct";
    color = LINK_COLORS.crossAccountVpc;
  }

  state.lines.push(`    ${nodeId}["${escapeLabel(name)}<br/><small>${cidrs}</small>${account}"]`);
  state.lines.push(`    class ${nodeId} ${styleClass}`);

  if (att.associatedRouteTableId) {
    state.lines.push(`    ${nodeId} --> TGWRT_${sanitizeId(att.associatedRouteTableId)}`);
    state.linkColors.push(color);
  }
}

function addOtherAttachment(state: DiagramState, att: TgwAttachment): void {
  const nodeId = `ATT_${sanitizeId(att.id)}`;
  const name = displayName(att.name, att.id, 20);
  const isVpn = att.type === "vpn";

  state.lines.push(`    ${nodeId}["${escapeLabel(name)}<br/><small>${att.type.toUpperCase()}</small>"]`);
  state.lines.push(`    class ${nodeId} ${isVpn ? "vpn" : "dx"}`);

  if (att.associatedRouteTableId) {
    state.lines.push(`    ${nodeId} --> TGWRT_${sanitizeId(att.associatedRouteTableId)}`);
    state.linkColors.push(isVpn ? LINK_COLORS.vpn : LINK_COLORS.other);
  }
}

function addHubLayout(state: DiagramState, catalog: TopologyCatalog, maxRoutes: number): void {
  for (const tgw of catalog.transitGateways.values()) {
    addTransitGateway(state, catalog, tgw, maxRoutes);
  }

  const attachments = [...catalog.tgwAttachments.values()];
  for (const att of attachments.filter((a) => a.type === "vpc")) {
    addVpcAttachment(state, catalog, att);
  }
  state.lines.push("");

  for (const att of attachments.filter((a) => a.type !== "vpc")) {
    addOtherAttachment(state, att);
  }
  state.lines.push("");
}

// =============================================================================
// Spoke Layout
// =============================================================================

function addSpokeLayout(state: DiagramState, catalog: TopologyCatalog): void {
  for (const tgwId of [...referencedTgwIds(catalog)].sort()) {
    const id = sanitizeId(tgwId);
    state.lines.push(`    subgraph TGW_${id}["Transit Gateway (External)"]`);
    state.lines.push(
      `        TGW_NODE_${id}(("${tgwId}<br/><small>Route tables not visible<br/>from spoke account</small>"))`,
    );
    state.lines.push(`        class TGW_NODE_${id} tgwExternal`);
    state.lines.push("    end", "");
  }

  for (const vpc of catalog.vpcs.values()) {
    const nodeId = `VPC_${sanitizeId(vpc.id)}`;
    const name = escapeLabel(displayName(vpc.name, vpc.id, 20));
    state.lines.push(`    ${nodeId}["${name}<br/><small>${cidrLabel(vpc.cidrs)}</small>${vpcFeatures(vpc)}"]`);
    state.lines.push(`    class ${nodeId} vpc`);
  }

  for (const att of catalog.tgwAttachments.values()) {
    if (att.type !== "vpc" || !catalog.vpcs.has(att.resourceId)) continue;
    state.lines.push(`    VPC_${sanitizeId(att.resourceId)} --> TGW_NODE_${sanitizeId(att.tgwId)}`);
    state.linkColors.push(LINK_COLORS.localVpc);
  }
  state.lines.push("");
}

// =============================================================================
// Entry Point
// =============================================================================

export function generateMermaid(catalog: TopologyCatalog, options: MermaidOptions = {}): string {
  const maxRoutes = options.maxRoutesPerTable ?? 5;
  const state: DiagramState = {
    lines: ["flowchart TB", "", ...CLASS_DEFS.map((d) => `    ${d}`), ""],
    internalLinks: 0,
    linkColors: [],
  };

  if (isSpokeAccount(catalog)) {
    addSpokeLayout(state, catalog);
  } else {
    addHubLayout(state, catalog, maxRoutes);
  }

  state.linkColors.forEach((color, i) => {
    state.lines.push(`    linkStyle ${state.internalLinks + i} stroke:${color},stroke-width:2px`);
  });

  return state.lines.join("\n");
}
