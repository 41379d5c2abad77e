/**
 * Record Normalizer Tests
 */

import { describe, it, expect } from "vitest";
import { TopologyCatalog } from "../catalog.js";
import {
  collectVpcCidrs,
  friendlyPrefixListName,
  isCrossAccount,
  normalizeRecords,
  parseAttachmentType,
  toTgwRoute,
  toVpcRoute,
} from "./normalizer.js";

describe("parseAttachmentType", () => {
  it("accepts every known resource type", () => {
    expect(parseAttachmentType("vpc")).toBe("vpc");
    expect(parseAttachmentType("direct-connect-gateway")).toBe("direct-connect-gateway");
    expect(parseAttachmentType("tgw-peering")).toBe("tgw-peering");
  });

  it("maps unrecognized values to unknown", () => {
    expect(parseAttachmentType("network-function")).toBe("unknown");
    expect(parseAttachmentType("")).toBe("unknown");
  });
});

describe("isCrossAccount", () => {
  it("compares against the TGW owner when it is known", () => {
    expect(isCrossAccount("111111111111", "222222222222", "111111111111")).toBe(true);
    expect(isCrossAccount("222222222222", "222222222222", "111111111111")).toBe(false);
  });

  it("falls back to the local account when the TGW owner is unknown", () => {
    expect(isCrossAccount("111111111111", "", "222222222222")).toBe(true);
    expect(isCrossAccount("111111111111", "", "111111111111")).toBe(false);
  });

  it("is false without a resource owner or any reference account", () => {
    expect(isCrossAccount("", "222222222222", "111111111111")).toBe(false);
    expect(isCrossAccount("111111111111", "", "")).toBe(false);
  });
});

describe("friendlyPrefixListName", () => {
  it("shortens AWS-managed names to the service", () => {
    expect(friendlyPrefixListName("com.amazonaws.us-east-1.s3")).toBe("s3");
    expect(friendlyPrefixListName("com.amazonaws.global.cloudfront.origin-facing")).toBe("origin-facing");
  });

  it("keeps customer-managed names", () => {
    expect(friendlyPrefixListName("corp-ranges")).toBe("corp-ranges");
  });
});

describe("collectVpcCidrs", () => {
  it("puts the primary block first and removes duplicates", () => {
    const cidrs = collectVpcCidrs({
      CidrBlock: "10.0.0.0/16",
      CidrBlockAssociationSet: [{ CidrBlock: "10.0.0.0/16" }, { CidrBlock: "100.64.0.0/16" }, {}],
    });
    expect(cidrs).toEqual(["10.0.0.0/16", "100.64.0.0/16"]);
  });
});

describe("toTgwRoute", () => {
  it("takes the first attachment and maps origin and state", () => {
    const route = toTgwRoute({
      DestinationCidrBlock: "10.1.0.0/16",
      Type: "propagated",
      State: "active",
      TransitGatewayAttachments: [
        { TransitGatewayAttachmentId: "tgw-attach-a", ResourceId: "vpc-a", ResourceType: "vpc" },
        { TransitGatewayAttachmentId: "tgw-attach-b", ResourceId: "vpc-b", ResourceType: "vpc" },
      ],
    });
    expect(route).toEqual({
      destinationCidr: "10.1.0.0/16",
      prefixListId: null,
      attachmentId: "tgw-attach-a",
      resourceId: "vpc-a",
      resourceType: "vpc",
      origin: "propagated",
      state: "active",
    });
  });

  it("defaults to a static route without an attachment", () => {
    const route = toTgwRoute({ PrefixListId: "pl-1", State: "blackhole" });
    expect(route.origin).toBe("static");
    expect(route.state).toBe("blackhole");
    expect(route.attachmentId).toBeNull();
    expect(route.destinationCidr).toBe("");
    expect(route.prefixListId).toBe("pl-1");
  });
});

describe("toVpcRoute", () => {
  it("uses the IPv6 destination when no IPv4 destination exists", () => {
    const route = toVpcRoute({ DestinationIpv6CidrBlock: "::/0", EgressOnlyInternetGatewayId: "eigw-1", GatewayId: "eigw-1" });
    expect(route).toEqual({ destination: "::/0", targetType: "egress-igw", targetId: "eigw-1", state: "active" });
  });

  it("falls back to the prefix list destination", () => {
    const route = toVpcRoute({ DestinationPrefixListId: "pl-9", GatewayId: "vpce-1", State: "blackhole" });
    expect(route.destination).toBe("pl-9");
    expect(route.targetType).toBe("vpc-endpoint");
    expect(route.state).toBe("blackhole");
  });
});

describe("normalizeRecords", () => {
  it("applies name, state and ASN defaults", () => {
    const catalog = new TopologyCatalog("111111111111");
    normalizeRecords(catalog, {
      transitGateways: [
        { TransitGatewayId: "tgw-1", Tags: [{ Key: "Name", Value: "core" }], Options: { AmazonSideAsn: 64512 } },
        { TransitGatewayId: "tgw-2" },
      ],
      tgwAttachments: [{ TransitGatewayAttachmentId: "tgw-attach-1", TransitGatewayId: "tgw-1", ResourceId: "vpc-1" }],
    });

    expect(catalog.transitGateways.get("tgw-1")).toEqual({
      id: "tgw-1",
      name: "core",
      ownerId: "",
      asn: 64512,
      state: "",
    });
    expect(catalog.transitGateways.get("tgw-2")?.name).toBe("tgw-2");
    expect(catalog.transitGateways.get("tgw-2")?.asn).toBe(0);

    const att = catalog.tgwAttachments.get("tgw-attach-1");
    expect(att?.name).toBe("vpc-1");
    expect(att?.type).toBe("unknown");
    expect(att?.cidrs).toEqual([]);
    expect(att?.associatedRouteTableId).toBeNull();
  });

  it("skips records without an id and reports orphan route batches", () => {
    const catalog = new TopologyCatalog();
    const result = normalizeRecords(catalog, {
      vpcs: [{ CidrBlock: "10.0.0.0/16" }, { VpcId: "vpc-1", CidrBlock: "10.1.0.0/16" }],
      tgwRoutes: { "tgw-rtb-missing": [{ DestinationCidrBlock: "10.0.0.0/8" }] },
    });
    expect(result.skipped).toBe(1);
    expect(result.orphanRouteBatches).toEqual(["tgw-rtb-missing"]);
    expect([...catalog.vpcs.keys()]).toEqual(["vpc-1"]);
  });

  it("appends routes to their route table in feed order", () => {
    const catalog = new TopologyCatalog();
    normalizeRecords(catalog, {
      tgwRouteTables: [{ TransitGatewayRouteTableId: "tgw-rtb-1", TransitGatewayId: "tgw-1", DefaultAssociationRouteTable: true }],
      tgwRoutes: {
        "tgw-rtb-1": [{ DestinationCidrBlock: "10.2.0.0/16" }, { DestinationCidrBlock: "10.1.0.0/16" }],
      },
    });
    const rt = catalog.tgwRouteTables.get("tgw-rtb-1");
    expect(rt?.isDefaultAssociation).toBe(true);
    expect(rt?.isDefaultPropagation).toBe(false);
    expect(rt?.routes.map((r) => r.destinationCidr)).toEqual(["10.2.0.0/16", "10.1.0.0/16"]);
  });

  it("defaults VPN tunnel status to DOWN", () => {
    const catalog = new TopologyCatalog();
    normalizeRecords(catalog, {
      vpnConnections: [
        {
          VpnConnectionId: "vpn-1",
          CustomerGatewayId: "cgw-1",
          TransitGatewayId: "tgw-1",
          VgwTelemetry: [{ OutsideIpAddress: "198.51.100.1", Status: "UP" }, { OutsideIpAddress: "198.51.100.2" }],
          Options: { StaticRoutesOnly: true },
          Routes: [{ DestinationCidrBlock: "192.168.0.0/16" }],
        },
      ],
    });
    const vpn = catalog.vpnConnections.get("vpn-1");
    expect(vpn?.tunnels.map((t) => t.status)).toEqual(["UP", "DOWN"]);
    expect(vpn?.staticRoutesOnly).toBe(true);
    expect(vpn?.vpnGatewayId).toBeNull();
    expect(vpn?.localIpv4Cidr).toBe("0.0.0.0/0");
    expect(vpn?.routes).toEqual(["192.168.0.0/16"]);
  });

  it("maps Direct Connect records with their defaults", () => {
    const catalog = new TopologyCatalog();
    normalizeRecords(catalog, {
      dxConnections: [
        { connectionId: "dxcon-1", connectionState: "available", hasLogicalRedundancy: "yes", awsDevice: "dev-a" },
      ],
      dxVirtualInterfaces: [
        {
          virtualInterfaceId: "dxvif-1",
          virtualInterfaceName: "prod-vif",
          virtualInterfaceState: "available",
          bgpPeers: [{ bgpPeerId: "peer-1", asn: 65000, customerAddress: "169.254.0.2/30" }],
        },
      ],
    });

    const conn = catalog.dxConnections.get("dxcon-1");
    expect(conn?.name).toBe("dxcon-1");
    expect(conn?.hasLogicalRedundancy).toBe(true);
    expect(conn?.awsDevice).toBe("dev-a");

    const vif = catalog.dxVirtualInterfaces.get("dxvif-1");
    expect(vif?.mtu).toBe(1500);
    expect(vif?.bgpPeers).toEqual([
      {
        peerId: "peer-1",
        asn: 65000,
        amazonAddress: "",
        customerAddress: "169.254.0.2/30",
        peerState: "",
        status: "down",
      },
    ]);
  });

  it("records only available internet gateway attachments", () => {
    const catalog = new TopologyCatalog();
    normalizeRecords(catalog, {
      internetGateways: [
        { InternetGatewayId: "igw-1", Attachments: [{ VpcId: "vpc-1", State: "available" }] },
        { InternetGatewayId: "igw-2", Attachments: [{ VpcId: "vpc-2", State: "detaching" }] },
      ],
    });
    expect([...catalog.internetGateways]).toEqual([["igw-1", "vpc-1"]]);
  });

  it("stores friendly prefix list names", () => {
    const catalog = new TopologyCatalog();
    normalizeRecords(catalog, {
      prefixLists: [{ PrefixListId: "pl-1", PrefixListName: "com.amazonaws.eu-west-1.dynamodb" }],
    });
    expect(catalog.prefixLists.get("pl-1")).toBe("dynamodb");
  });
});
