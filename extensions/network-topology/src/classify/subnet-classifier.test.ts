import { describe, it, expect } from "vitest";
import { TopologyCatalog } from "../catalog.js";
import type { Subnet, Vpc, VpcRoute, VpcRouteTable } from "../types.js";
import { classifyRoutes, classifySubnets, effectiveRouteTable, isDefaultRoute } from "./subnet-classifier.js";

function makeRoute(overrides: Partial<VpcRoute> = {}): VpcRoute {
  return { destination: "0.0.0.0/0", targetType: "igw", targetId: "igw-1", state: "active", ...overrides };
}

function makeVpc(overrides: Partial<Vpc> = {}): Vpc {
  return {
    id: "vpc-1",
    name: "vpc-1",
    cidrs: ["10.0.0.0/16"],
    ownerId: "111111111111",
    isDefault: false,
    igwId: null,
    natGatewayIds: [],
    tgwAttachmentId: null,
    mainRouteTableId: null,
    ...overrides,
  };
}

function makeSubnet(overrides: Partial<Subnet> = {}): Subnet {
  return {
    id: "subnet-1",
    vpcId: "vpc-1",
    cidr: "10.0.1.0/24",
    availabilityZone: "us-east-1a",
    name: "subnet-1",
    routeTableId: null,
    subnetClass: "isolated",
    ...overrides,
  };
}

function makeTable(overrides: Partial<VpcRouteTable> = {}): VpcRouteTable {
  return { id: "rtb-1", vpcId: "vpc-1", name: "rtb-1", isMain: false, routes: [], subnetIds: [], ...overrides };
}

describe("isDefaultRoute", () => {
  it("recognizes both address families", () => {
    expect(isDefaultRoute(makeRoute())).toBe(true);
    expect(isDefaultRoute(makeRoute({ destination: "::/0" }))).toBe(true);
    expect(isDefaultRoute(makeRoute({ destination: "10.0.0.0/8" }))).toBe(false);
  });
});

describe("classifyRoutes", () => {
  it("maps the default route target to a class", () => {
    expect(classifyRoutes([makeRoute()])).toBe("public");
    expect(classifyRoutes([makeRoute({ targetType: "nat", targetId: "nat-1" })])).toBe("private");
    expect(classifyRoutes([makeRoute({ targetType: "tgw", targetId: "tgw-1" })])).toBe("tgw-attached");
    expect(classifyRoutes([makeRoute({ targetType: "vpc-peering", targetId: "pcx-1" })])).toBe("isolated");
  });

  it("uses the first default route in table order", () => {
    const routes = [
      makeRoute({ destination: "10.0.0.0/16", targetType: "local", targetId: "local" }),
      makeRoute({ targetType: "nat", targetId: "nat-1" }),
      makeRoute({ destination: "::/0", targetType: "egress-igw", targetId: "eigw-1" }),
    ];
    expect(classifyRoutes(routes)).toBe("private");
  });

  it("stops at a first default route whose target decides nothing", () => {
    const routes = [
      makeRoute({ targetType: "vgw", targetId: "vgw-1" }),
      makeRoute({ destination: "::/0", targetType: "igw", targetId: "igw-1" }),
    ];
    expect(classifyRoutes(routes)).toBe("isolated");
  });

  it("is isolated without a default route", () => {
    expect(classifyRoutes([])).toBe("isolated");
    expect(classifyRoutes([makeRoute({ destination: "10.0.0.0/16", targetType: "local" })])).toBe("isolated");
  });
});

describe("classifySubnets", () => {
  it("prefers the explicit association over the main table", () => {
    const catalog = new TopologyCatalog();
    catalog.vpcs.set("vpc-1", makeVpc({ mainRouteTableId: "rtb-main" }));
    catalog.vpcRouteTables.set("rtb-main", makeTable({ id: "rtb-main", isMain: true, routes: [makeRoute()] }));
    catalog.vpcRouteTables.set(
      "rtb-private",
      makeTable({ id: "rtb-private", routes: [makeRoute({ targetType: "nat", targetId: "nat-1" })] }),
    );
    catalog.subnets.set("subnet-pub", makeSubnet({ id: "subnet-pub" }));
    catalog.subnets.set("subnet-priv", makeSubnet({ id: "subnet-priv", routeTableId: "rtb-private" }));

    const counts = classifySubnets(catalog);

    expect(catalog.subnets.get("subnet-pub")?.subnetClass).toBe("public");
    expect(catalog.subnets.get("subnet-priv")?.subnetClass).toBe("private");
    expect(counts).toEqual({ public: 1, private: 1, "tgw-attached": 0, isolated: 0 });
  });

  it("treats a subnet without any route table as isolated", () => {
    const catalog = new TopologyCatalog();
    catalog.vpcs.set("vpc-1", makeVpc());
    const subnet = makeSubnet({ subnetClass: "public" });
    catalog.subnets.set(subnet.id, subnet);

    expect(effectiveRouteTable(catalog, subnet)).toBeUndefined();
    expect(classifySubnets(catalog).isolated).toBe(1);
    expect(subnet.subnetClass).toBe("isolated");
  });

  it("treats a dangling route table reference as isolated", () => {
    const catalog = new TopologyCatalog();
    catalog.subnets.set("subnet-1", makeSubnet({ routeTableId: "rtb-gone" }));
    expect(classifySubnets(catalog).isolated).toBe(1);
  });
});
