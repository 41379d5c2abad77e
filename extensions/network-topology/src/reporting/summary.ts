/**
 * Plain-text console summary of one topology run.
 */

import type { TopologyCatalog } from "../catalog.js";
import {
  bgpCounts,
  catalogStats,
  crossAccountAttachments,
  isHubAccount,
  isSpokeAccount,
  referencedTgwIds,
  tunnelCounts,
} from "../catalog.js";
import type { Finding } from "../types.js";
import { statusIcon } from "./format.js";

export const SUMMARY_FINDING_LIMIT = 5;

function accountModeLines(catalog: TopologyCatalog): string[] {
  const account = catalog.localAccountId || "unknown";
  if (isHubAccount(catalog)) {
    return [`🏠 Hub Account Mode (TGW owner: ${account})`];
  }
  if (isSpokeAccount(catalog)) {
    return [
      `📍 Spoke Account Mode (${account})`,
      "   TGW route tables not visible - run from hub account for full visibility",
      `   Referenced TGW: ${[...referencedTgwIds(catalog)].sort().join(", ")}`,
    ];
  }
  return [];
}

export function formatConsoleSummary(catalog: TopologyCatalog, findings: readonly Finding[]): string {
  const stats = catalogStats(catalog);
  const crossAccount = crossAccountAttachments(catalog);
  const lines: string[] = [];

  const mode = accountModeLines(catalog);
  if (mode.length > 0) lines.push(...mode, "");

  lines.push("Found:");
  lines.push(`  • ${stats.transitGateways} Transit Gateway(s)`);
  lines.push(`  • ${stats.tgwAttachments} TGW Attachment(s)`);
  if (crossAccount.length > 0) {
    lines.push(`    └─ ${crossAccount.length} cross-account (from spoke accounts)`);
    lines.push(`    └─ ${stats.tgwAttachments - crossAccount.length} local`);
  }
  lines.push(`  • ${stats.tgwRouteTables} TGW Route Table(s)`);
  lines.push(`  • ${stats.vpcs} Local VPC(s)`);
  if (stats.vpnConnections > 0) {
    lines.push(`  • ${stats.vpnConnections} VPN Connection(s) (${stats.tunnels.up}/${stats.tunnels.total} tunnels UP)`);
  }
  if (stats.dxVirtualInterfaces > 0) {
    lines.push(`  • ${stats.dxVirtualInterfaces} DX VIF(s) (${stats.bgpPeers.up}/${stats.bgpPeers.total} BGP UP)`);
  }

  if (crossAccount.length > 0) {
    lines.push("", "📡 Cross-Account Attachments (CIDRs from propagated routes):");
    for (const att of crossAccount) {
      const cidrs = att.cidrs.length > 0 ? att.cidrs.join(", ") : "no CIDRs propagated";
      lines.push(`   • ${att.name} (${att.resourceOwnerId}) - ${cidrs}`);
    }
  }

  if (catalog.vpnConnections.size > 0) {
    lines.push("", "🔐 VPN Connections:");
    for (const vpn of catalog.vpnConnections.values()) {
      const { up, total } = tunnelCounts(vpn);
      const cgwIp = catalog.customerGateways.get(vpn.customerGatewayId)?.ipAddress ?? "?";
      lines.push(`   ${statusIcon(up, total)} ${vpn.name}: ${up}/${total} tunnels UP (CGW: ${cgwIp})`);
    }
  }

  if (catalog.dxVirtualInterfaces.size > 0) {
    lines.push("", "🔌 Direct Connect VIFs:");
    for (const vif of catalog.dxVirtualInterfaces.values()) {
      const { up, total } = bgpCounts(vif);
      const location = catalog.dxConnections.get(vif.connectionId)?.location ?? "?";
      lines.push(`   ${statusIcon(up, total)} ${vif.name}: ${vif.vifType} (${up}/${total} BGP UP) @ ${location}`);
    }
  }

  lines.push("");
  if (findings.length === 0) {
    lines.push("✓ No issues detected");
  } else {
    lines.push(`⚠️  ${findings.length} issue(s) detected:`);
    for (const f of findings.slice(0, SUMMARY_FINDING_LIMIT)) {
      lines.push(`   • [${f.kind}] ${f.message}`);
    }
    if (findings.length > SUMMARY_FINDING_LIMIT) {
      lines.push(`   ... and ${findings.length - SUMMARY_FINDING_LIMIT} more`);
    }
  }

  return lines.join("\n");
}
