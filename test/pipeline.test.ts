import { describe, it, expect } from "vitest";
import { correlate, selectCandidates } from "../src/core/pipeline.js";
import { UNKNOWN_GROUP } from "../src/core/markers.js";

const PORTS = [
  "clk",
  "rst_n",
  "m_axi_awaddr",
  "m_axi_wdata",
  "m_axi_bresp",
  "s_apb_paddr",
  "s_apb_pwdata",
];

describe("correlate", () => {
  it("binds bus signals to the ports of the hinted interface", () => {
    const result = correlate({ ports: PORTS, signals: ["awaddr", "wdata", "bresp"], hint: "m_axi" });

    expect(["m_axi", "m_axi_"]).toContain(result.marker);
    expect(result.candidates).toEqual(["m_axi_awaddr", "m_axi_wdata", "m_axi_bresp"]);
    expect([...result.mapping.entries()]).toEqual([
      ["awaddr", "m_axi_awaddr"],
      ["wdata", "m_axi_wdata"],
      ["bresp", "m_axi_bresp"],
    ]);
  });

  it("groups ports by their shared prefix", () => {
    const { groups } = correlate({ ports: PORTS, signals: [], hint: "" });
    expect(groups.get("m_axi_")).toEqual(["m_axi_awaddr", "m_axi_wdata", "m_axi_bresp"]);
    expect(groups.get("s_apb_p")).toEqual(["s_apb_paddr", "s_apb_pwdata"]);
    expect(groups.get(UNKNOWN_GROUP)).toEqual(["clk", "rst_n"]);
  });

  it("uses every port when nothing is shared", () => {
    const result = correlate({ ports: ["alpha", "beta"], signals: ["alpha"], hint: "axi" });
    expect(result.marker).toBe("");
    expect(result.candidates).toEqual(["alpha", "beta"]);
    expect(result.mapping.get("alpha")).toBe("alpha");
  });

  it("honors marker options", () => {
    const result = correlate(
      { ports: PORTS, signals: [], hint: "" },
      { minLength: 3, frequency: 3 },
    );
    expect(result.groups.get("m_axi_")).toEqual(["m_axi_awaddr", "m_axi_wdata", "m_axi_bresp"]);
    expect(result.groups.has("s_apb_p")).toBe(false);
  });

  it("returns no pairs without signals", () => {
    const result = correlate({ ports: PORTS, signals: [], hint: "m_axi" });
    expect(result.pairs).toEqual([]);
    expect(result.mapping.size).toBe(0);
  });
});

describe("selectCandidates", () => {
  const groups = new Map([
    ["m_axi_", ["m_axi_awaddr"]],
    ["S_AXI_", ["S_AXI_wdata"]],
    [UNKNOWN_GROUP, ["clk"]],
  ]);

  it("collects every group whose key contains the marker", () => {
    expect(selectCandidates(groups, "axi", ["m_axi_awaddr", "S_AXI_wdata", "clk"])).toEqual([
      "m_axi_awaddr",
      "S_AXI_wdata",
    ]);
  });

  it("falls back to all ports", () => {
    const ports = ["m_axi_awaddr", "S_AXI_wdata", "clk"];
    expect(selectCandidates(groups, "zzz", ports)).toEqual(ports);
  });
});
