/**
 * Network Topology — Snapshot Exporter
 *
 * Captures one region of one account into an export directory with the
 * read-only EC2, Direct Connect and STS APIs. Each file is captured
 * independently: a failing call is logged, leaves an empty envelope behind
 * and does not stop the rest of the capture.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import {
  EC2Client,
  DescribeTransitGatewaysCommand,
  DescribeTransitGatewayAttachmentsCommand,
  DescribeTransitGatewayRouteTablesCommand,
  SearchTransitGatewayRoutesCommand,
  GetTransitGatewayRouteTableAssociationsCommand,
  GetTransitGatewayRouteTablePropagationsCommand,
  DescribeVpcsCommand,
  DescribeSubnetsCommand,
  DescribeRouteTablesCommand,
  DescribeInternetGatewaysCommand,
  DescribeNatGatewaysCommand,
  DescribeVpcPeeringConnectionsCommand,
  DescribeVpnConnectionsCommand,
  DescribeCustomerGatewaysCommand,
  DescribeManagedPrefixListsCommand,
} from "@aws-sdk/client-ec2";
import {
  DirectConnectClient,
  DescribeConnectionsCommand,
  DescribeDirectConnectGatewaysCommand,
  DescribeVirtualInterfacesCommand,
} from "@aws-sdk/client-direct-connect";
import { STSClient, GetCallerIdentityCommand } from "@aws-sdk/client-sts";
import { fromIni } from "@aws-sdk/credential-providers";
import { fieldString } from "../ingest/fields.js";
import type { TopologyLogger } from "../logging/index.js";
import { createSilentLogger } from "../logging/index.js";
import { LIST_FILES, METADATA_FILE, PER_ROUTE_TABLE_FILES, perRouteTableFileName } from "../loader/export-files.js";
import type { ListBatchKey, PerRouteTableBatchKey } from "../loader/export-files.js";

// =============================================================================
// Types
// =============================================================================

export type SnapshotClients = {
  ec2?: EC2Client;
  directConnect?: DirectConnectClient;
  sts?: STSClient;
};

export type ExportSnapshotOptions = {
  region: string;
  /** Named profile from the shared credentials files. */
  profile?: string;
  clients?: SnapshotClients;
  logger?: TopologyLogger;
  /** Injected clock for the metadata timestamp. */
  now?: () => Date;
};

export type ExportFileResult = {
  file: string;
  count: number;
  ok: boolean;
  error?: string;
};

export const EXPORT_VERSION = "1.0";

type Page = { items: unknown[]; nextToken?: string };

type ResolvedClients = Required<SnapshotClients>;

// =============================================================================
// Helpers
// =============================================================================

/** Follow `NextToken` until the API stops returning one. */
export async function collectPages(fetchPage: (token: string | undefined) => Promise<Page>): Promise<unknown[]> {
  const items: unknown[] = [];
  let token: string | undefined;
  do {
    const page = await fetchPage(token);
    items.push(...page.items);
    token = page.nextToken;
  } while (token);
  return items;
}

function resolveClients(options: ExportSnapshotOptions): ResolvedClients {
  const config = {
    region: options.region,
    credentials: options.profile ? fromIni({ profile: options.profile }) : undefined,
  };
  return {
    ec2: options.clients?.ec2 ?? new EC2Client(config),
    directConnect: options.clients?.directConnect ?? new DirectConnectClient(config),
    sts: options.clients?.sts ?? new STSClient(config),
  };
}

function listFetchers(clients: ResolvedClients): Record<ListBatchKey, () => Promise<unknown[]>> {
  const { ec2, directConnect } = clients;
  return {
    transitGateways: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeTransitGatewaysCommand({ NextToken }));
        return { items: r.TransitGateways ?? [], nextToken: r.NextToken };
      }),
    tgwAttachments: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeTransitGatewayAttachmentsCommand({ NextToken }));
        return { items: r.TransitGatewayAttachments ?? [], nextToken: r.NextToken };
      }),
    tgwRouteTables: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeTransitGatewayRouteTablesCommand({ NextToken }));
        return { items: r.TransitGatewayRouteTables ?? [], nextToken: r.NextToken };
      }),
    vpcs: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeVpcsCommand({ NextToken }));
        return { items: r.Vpcs ?? [], nextToken: r.NextToken };
      }),
    subnets: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeSubnetsCommand({ NextToken }));
        return { items: r.Subnets ?? [], nextToken: r.NextToken };
      }),
    vpcRouteTables: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeRouteTablesCommand({ NextToken }));
        return { items: r.RouteTables ?? [], nextToken: r.NextToken };
      }),
    internetGateways: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeInternetGatewaysCommand({ NextToken }));
        return { items: r.InternetGateways ?? [], nextToken: r.NextToken };
      }),
    natGateways: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeNatGatewaysCommand({ NextToken }));
        return { items: r.NatGateways ?? [], nextToken: r.NextToken };
      }),
    vpcPeerings: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeVpcPeeringConnectionsCommand({ NextToken }));
        return { items: r.VpcPeeringConnections ?? [], nextToken: r.NextToken };
      }),
    vpnConnections: async () => {
      const r = await ec2.send(new DescribeVpnConnectionsCommand({}));
      return r.VpnConnections ?? [];
    },
    customerGateways: async () => {
      const r = await ec2.send(new DescribeCustomerGatewaysCommand({}));
      return r.CustomerGateways ?? [];
    },
    prefixLists: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(new DescribeManagedPrefixListsCommand({ NextToken }));
        return { items: r.PrefixLists ?? [], nextToken: r.NextToken };
      }),
    dxConnections: async () => {
      const r = await directConnect.send(new DescribeConnectionsCommand({}));
      return r.connections ?? [];
    },
    dxGateways: () =>
      collectPages(async (nextToken) => {
        const r = await directConnect.send(new DescribeDirectConnectGatewaysCommand({ nextToken }));
        return { items: r.directConnectGateways ?? [], nextToken: r.nextToken };
      }),
    dxVirtualInterfaces: async () => {
      const r = await directConnect.send(new DescribeVirtualInterfacesCommand({}));
      return r.virtualInterfaces ?? [];
    },
  };
}

function routeTableFetchers(
  ec2: EC2Client,
  routeTableId: string,
): Record<PerRouteTableBatchKey, () => Promise<unknown[]>> {
  const TransitGatewayRouteTableId = routeTableId;
  return {
    tgwRoutes: async () => {
      const r = await ec2.send(
        new SearchTransitGatewayRoutesCommand({
          TransitGatewayRouteTableId,
          Filters: [{ Name: "state", Values: ["active", "blackhole"] }],
        }),
      );
      return r.Routes ?? [];
    },
    tgwAssociations: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(
          new GetTransitGatewayRouteTableAssociationsCommand({ TransitGatewayRouteTableId, NextToken }),
        );
        return { items: r.Associations ?? [], nextToken: r.NextToken };
      }),
    tgwPropagations: () =>
      collectPages(async (NextToken) => {
        const r = await ec2.send(
          new GetTransitGatewayRouteTablePropagationsCommand({ TransitGatewayRouteTableId, NextToken }),
        );
        return { items: r.TransitGatewayRouteTablePropagations ?? [], nextToken: r.NextToken };
      }),
  };
}

// =============================================================================
// Export
// =============================================================================

async function writeJson(dir: string, file: string, value: unknown): Promise<void> {
  await writeFile(join(dir, file), `${JSON.stringify(value, null, 2)}\n`, "utf8");
}

/**
 * Capture a region into `outputDir`. Returns one result per written file,
 * in write order, with the metadata file last.
 */
export async function exportSnapshot(outputDir: string, options: ExportSnapshotOptions): Promise<ExportFileResult[]> {
  const logger = options.logger ?? createSilentLogger();
  const clients = resolveClients(options);
  const results: ExportFileResult[] = [];

  await mkdir(outputDir, { recursive: true });

  const capture = async (file: string, envelope: string, fetchAll: () => Promise<unknown[]>): Promise<unknown[]> => {
    try {
      const items = await fetchAll();
      await writeJson(outputDir, file, { [envelope]: items });
      results.push({ file, count: items.length, ok: true });
      logger.info(`Exported ${file}`, { items: items.length });
      return items;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      await writeJson(outputDir, file, { [envelope]: [] });
      results.push({ file, count: 0, ok: false, error: message });
      logger.warn(`Export of ${file} failed`, { error: message });
      return [];
    }
  };

  const fetchers = listFetchers(clients);
  const routeTableIds: string[] = [];
  for (const { file, envelope, batch } of LIST_FILES) {
    const items = await capture(file, envelope, fetchers[batch]);
    if (batch === "tgwRouteTables") {
      for (const item of items) {
        const id = fieldString(item, "TransitGatewayRouteTableId");
        if (id) routeTableIds.push(id);
      }
    }
  }

  for (const routeTableId of routeTableIds) {
    const perTable = routeTableFetchers(clients.ec2, routeTableId);
    for (const { prefix, envelope, batch } of PER_ROUTE_TABLE_FILES) {
      await capture(perRouteTableFileName(prefix, routeTableId), envelope, perTable[batch]);
    }
  }

  let accountId = "unknown";
  try {
    const identity = await clients.sts.send(new GetCallerIdentityCommand({}));
    accountId = identity.Account ?? accountId;
  } catch (err) {
    logger.warn("Could not resolve caller identity", { error: err instanceof Error ? err.message : String(err) });
  }

  await writeJson(outputDir, METADATA_FILE, {
    export_timestamp: (options.now ?? (() => new Date()))().toISOString(),
    region: options.region,
    profile: options.profile ?? "default",
    aws_account_id: accountId,
    export_version: EXPORT_VERSION,
  });
  results.push({ file: METADATA_FILE, count: 1, ok: accountId !== "unknown" });

  return results;
}
