/**
 * Network Topology — Markdown Report
 *
 * Sections: overview, transit gateways with their route tables, attachments,
 * VPCs with subnets, VPN, Direct Connect, findings. Empty sections are
 * omitted except the findings section.
 */

import type { TopologyCatalog } from "../catalog.js";
import {
  accountMode,
  attachmentOwnerDisplay,
  bgpCounts,
  bgpSummary,
  catalogStats,
  routeDestination,
  tunnelCounts,
  tunnelSummary,
} from "../catalog.js";
import { summarizeFindings } from "../analysis/analyzer.js";
import type { Finding } from "../types.js";
import { markdownTable, statusIcon } from "./format.js";

export type MarkdownReportOptions = {
  title?: string;
};

function overviewSection(catalog: TopologyCatalog): string[] {
  const stats = catalogStats(catalog);
  const { subnetsByClass: c } = stats;
  return [
    "## Overview",
    "",
    `- Account: ${catalog.localAccountId || "unknown"} (${accountMode(catalog)})`,
    `- Transit Gateways: ${stats.transitGateways}`,
    `- TGW attachments: ${stats.tgwAttachments} (${stats.crossAccountAttachments} cross-account)`,
    `- TGW route tables: ${stats.tgwRouteTables}`,
    `- VPCs: ${stats.vpcs}`,
    `- Subnets: ${stats.subnets} (public ${c.public}, private ${c.private}, tgw-attached ${c["tgw-attached"]}, isolated ${c.isolated})`,
    `- VPN tunnels UP: ${stats.tunnels.up}/${stats.tunnels.total}`,
    `- BGP peers UP: ${stats.bgpPeers.up}/${stats.bgpPeers.total}`,
    "",
  ];
}

function transitGatewaySection(catalog: TopologyCatalog): string[] {
  if (catalog.transitGateways.size === 0) return [];
  const lines = ["## Transit Gateways", ""];

  for (const tgw of catalog.transitGateways.values()) {
    lines.push(`### ${tgw.name} (${tgw.id})`, "", `ASN ${tgw.asn} · owner ${tgw.ownerId} · ${tgw.state}`, "");

    for (const rt of catalog.tgwRouteTables.values()) {
      if (rt.tgwId !== tgw.id) continue;
      const flags = [
        rt.isDefaultAssociation ? "default association" : "",
        rt.isDefaultPropagation ? "default propagation" : "",
      ].filter(Boolean);
      lines.push(`#### ${rt.name}${flags.length > 0 ? ` (${flags.join(", ")})` : ""}`, "");
      lines.push(`Associations: ${[...rt.associations].join(", ") || "none"}`, "");
      lines.push(`Propagations: ${[...rt.propagations].join(", ") || "none"}`, "");

      if (rt.routes.length === 0) {
        lines.push("_No routes_", "");
        continue;
      }
      const rows = rt.routes.map((route) => {
        const att = route.attachmentId ? catalog.tgwAttachments.get(route.attachmentId) : undefined;
        const target = att ? `${att.name} (${att.type})` : route.attachmentId ?? "-";
        const dest = route.prefixListId
          ? `${routeDestination(route)} (${catalog.prefixLists.get(route.prefixListId) ?? "prefix list"})`
          : routeDestination(route);
        return [dest, target, route.origin, route.state];
      });
      lines.push(...markdownTable(["Destination", "Target", "Origin", "State"], rows), "");
    }
  }
  return lines;
}

function attachmentSection(catalog: TopologyCatalog): string[] {
  if (catalog.tgwAttachments.size === 0) return [];
  const rows = [...catalog.tgwAttachments.values()].map((att) => [
    att.name,
    att.id,
    att.type,
    att.tgwId,
    attachmentOwnerDisplay(att),
    att.cidrs.join(", ") || "-",
    att.associatedRouteTableId ?? "-",
    att.state,
  ]);
  return [
    "## TGW Attachments",
    "",
    ...markdownTable(["Name", "Id", "Type", "TGW", "Owner", "CIDRs", "Route table", "State"], rows),
    "",
  ];
}

function vpcSection(catalog: TopologyCatalog): string[] {
  if (catalog.vpcs.size === 0) return [];
  const lines = ["## VPCs", ""];

  for (const vpc of catalog.vpcs.values()) {
    lines.push(`### ${vpc.name} (${vpc.id})`, "");
    lines.push(`CIDRs: ${vpc.cidrs.join(", ") || "none"}`, "");
    const gateways = [
      vpc.igwId ? `IGW ${vpc.igwId}` : "",
      vpc.natGatewayIds.length > 0 ? `NAT ${vpc.natGatewayIds.join(", ")}` : "",
      vpc.tgwAttachmentId ? `TGW attachment ${vpc.tgwAttachmentId}` : "",
    ].filter(Boolean);
    if (gateways.length > 0) lines.push(`Gateways: ${gateways.join(" · ")}`, "");

    const subnets = [...catalog.subnets.values()].filter((s) => s.vpcId === vpc.id);
    if (subnets.length > 0) {
      const rows = subnets.map((s) => [
        s.name,
        s.cidr,
        s.availabilityZone,
        s.subnetClass,
        s.routeTableId ?? (vpc.mainRouteTableId ? `${vpc.mainRouteTableId} (main)` : "-"),
      ]);
      lines.push(...markdownTable(["Subnet", "CIDR", "AZ", "Class", "Route table"], rows), "");
    }
  }
  return lines;
}

function vpnSection(catalog: TopologyCatalog): string[] {
  if (catalog.vpnConnections.size === 0) return [];
  const rows = [...catalog.vpnConnections.values()].map((vpn) => {
    const { up, total } = tunnelCounts(vpn);
    const cgw = catalog.customerGateways.get(vpn.customerGatewayId);
    return [
      `${statusIcon(up, total)} ${vpn.name}`,
      vpn.id,
      vpn.state,
      tunnelSummary(vpn),
      cgw ? `${cgw.name} (${cgw.ipAddress}, ASN ${cgw.bgpAsn})` : vpn.customerGatewayId,
      vpn.staticRoutesOnly ? "static" : "BGP",
    ];
  });
  return [
    "## Site-to-Site VPN",
    "",
    ...markdownTable(["Name", "Id", "State", "Tunnels", "Customer gateway", "Routing"], rows),
    "",
  ];
}

function directConnectSection(catalog: TopologyCatalog): string[] {
  if (catalog.dxConnections.size === 0 && catalog.dxVirtualInterfaces.size === 0) return [];
  const lines = ["## Direct Connect", ""];

  if (catalog.dxConnections.size > 0) {
    const rows = [...catalog.dxConnections.values()].map((c) => [
      c.name,
      c.id,
      c.state,
      c.location,
      c.bandwidth,
      c.hasLogicalRedundancy ? "yes" : "no",
    ]);
    lines.push(...markdownTable(["Connection", "Id", "State", "Location", "Bandwidth", "Redundant"], rows), "");
  }

  if (catalog.dxVirtualInterfaces.size > 0) {
    const rows = [...catalog.dxVirtualInterfaces.values()].map((vif) => {
      const { up, total } = bgpCounts(vif);
      const gateway = vif.dxGatewayId
        ? catalog.dxGateways.get(vif.dxGatewayId)?.name ?? vif.dxGatewayId
        : vif.virtualGatewayId ?? "-";
      return [`${statusIcon(up, total)} ${vif.name}`, vif.vifType, vif.state, `${vif.vlan}`, bgpSummary(vif), gateway];
    });
    lines.push(...markdownTable(["VIF", "Type", "State", "VLAN", "BGP", "Gateway"], rows), "");
  }
  return lines;
}

function findingsSection(findings: readonly Finding[]): string[] {
  const summary = summarizeFindings(findings);
  const lines = [
    "## Findings",
    "",
    `${summary.total} finding(s): ${summary.bySeverity.error} error, ${summary.bySeverity.warning} warning, ${summary.bySeverity.info} info`,
    "",
  ];
  if (findings.length === 0) return lines;

  const rows = findings.map((f) => [f.severity, f.kind, f.location, f.message]);
  lines.push(...markdownTable(["Severity", "Kind", "Location", "Message"], rows), "");
  return lines;
}

export function formatMarkdownReport(
  catalog: TopologyCatalog,
  findings: readonly Finding[],
  options: MarkdownReportOptions = {},
): string {
  return [
    `# ${options.title ?? "Transit Gateway Network Report"}`,
    "",
    ...overviewSection(catalog),
    ...transitGatewaySection(catalog),
    ...attachmentSection(catalog),
    ...vpcSection(catalog),
    ...vpnSection(catalog),
    ...directConnectSection(catalog),
    ...findingsSection(findings),
  ].join("\n");
}
