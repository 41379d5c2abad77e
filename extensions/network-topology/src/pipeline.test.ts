/**
 * Pipeline Tests
 */

import { describe, it, expect } from "vitest";
import type { RecordBatches } from "./ingest/batches.js";
import { createTopologyLogger, MemoryTransport } from "./logging/index.js";
import { buildTopology } from "./pipeline.js";

function makeBatches(overrides: Partial<RecordBatches> = {}): RecordBatches {
  return {
    accountId: "111111111111",
    transitGateways: [{ TransitGatewayId: "tgw-1", OwnerId: "111111111111" }],
    tgwAttachments: [
      {
        TransitGatewayAttachmentId: "tgw-attach-app",
        TransitGatewayId: "tgw-1",
        ResourceType: "vpc",
        ResourceId: "vpc-app",
        ResourceOwnerId: "111111111111",
        TransitGatewayOwnerId: "111111111111",
        State: "available",
      },
      {
        TransitGatewayAttachmentId: "tgw-attach-partner",
        TransitGatewayId: "tgw-1",
        ResourceType: "vpc",
        ResourceId: "vpc-partner",
        ResourceOwnerId: "333333333333",
        State: "available",
      },
    ],
    tgwRouteTables: [{ TransitGatewayRouteTableId: "tgw-rtb-1", TransitGatewayId: "tgw-1" }],
    tgwRoutes: {
      "tgw-rtb-1": [
        {
          DestinationCidrBlock: "10.50.0.0/16",
          Type: "propagated",
          State: "active",
          TransitGatewayAttachments: [{ TransitGatewayAttachmentId: "tgw-attach-partner" }],
        },
      ],
    },
    tgwAssociations: {
      "tgw-rtb-1": [
        { TransitGatewayAttachmentId: "tgw-attach-app", State: "associated" },
        { TransitGatewayAttachmentId: "tgw-attach-partner", State: "associated" },
      ],
    },
    vpcs: [{ VpcId: "vpc-app", CidrBlock: "10.0.0.0/16" }],
    subnets: [{ SubnetId: "subnet-1", VpcId: "vpc-app", CidrBlock: "10.0.1.0/24" }],
    vpcRouteTables: [
      {
        RouteTableId: "rtb-main",
        VpcId: "vpc-app",
        Associations: [{ Main: true }],
        Routes: [
          { DestinationCidrBlock: "10.0.0.0/16", GatewayId: "local" },
          { DestinationCidrBlock: "0.0.0.0/0", TransitGatewayId: "tgw-1" },
        ],
      },
    ],
    ...overrides,
  };
}

describe("buildTopology", () => {
  it("runs every phase over the batches", () => {
    const { catalog, findings } = buildTopology(makeBatches());

    expect(catalog.localAccountId).toBe("111111111111");
    expect(catalog.tgwAttachments.get("tgw-attach-partner")?.isCrossAccount).toBe(true);
    expect(catalog.tgwAttachments.get("tgw-attach-partner")?.cidrs).toEqual(["10.50.0.0/16"]);
    expect(catalog.tgwAttachments.get("tgw-attach-app")?.associatedRouteTableId).toBe("tgw-rtb-1");
    expect(catalog.subnets.get("subnet-1")?.subnetClass).toBe("tgw-attached");
    expect(findings).toEqual([
      {
        kind: "asymmetric",
        severity: "warning",
        location: "vpc-app → vpc-partner",
        message: "Asymmetric routing: vpc-app can reach vpc-partner but not vice versa",
      },
    ]);
  });

  it("creates a fresh catalog on every call", () => {
    const batches = makeBatches();
    const first = buildTopology(batches);
    const second = buildTopology(batches);

    expect(second.catalog).not.toBe(first.catalog);
    expect(second.catalog.tgwRouteTables.get("tgw-rtb-1")?.routes).toHaveLength(1);
    expect(second.findings).toEqual(first.findings);
  });

  it("passes analyzer options through", () => {
    const { findings } = buildTopology(makeBatches(), { analyzer: { checks: { asymmetricRouting: false } } });
    expect(findings).toEqual([]);
  });

  it("logs skipped records and the build summary", () => {
    const transport = new MemoryTransport();
    const logger = createTopologyLogger("test", { level: "debug", transports: [transport] });

    buildTopology(makeBatches({ natGateways: [{ VpcId: "vpc-app" }] }), { logger });

    expect(transport.messages("warn")).toEqual(["Skipped 1 record(s) without an id"]);
    expect(transport.messages("info")).toEqual(["Topology built (hub account)"]);
    const correlation = transport.entries.find((e) => e.message === "Correlation complete");
    expect(correlation?.subsystem).toBe("topology/test/correlate");
  });
});
