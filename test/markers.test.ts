import { describe, it, expect } from "vitest";
import {
  UNKNOWN_GROUP,
  extractMarkers,
  sortMarkers,
  cluster,
  findBestGroup,
  partAwareSimilarity,
  bestMarkerForHint,
  findBestMatchingString,
} from "../src/core/markers.js";

describe("extractMarkers", () => {
  it("keeps substrings shared by enough identifiers", () => {
    const markers = extractMarkers(["u_uart0", "u_uart1", "u_spi0"], 2, 2);
    expect(markers.get("u_")).toBe(3);
    expect(markers.get("u_uart")).toBe(2);
    expect(markers.get("art")).toBe(2);
    expect(markers.has("spi")).toBe(false);
    expect(markers.has("t0")).toBe(false);
  });

  it("counts a substring once per identifier", () => {
    const markers = extractMarkers(["aaaa", "aab"], 2, 2);
    expect(markers.get("aa")).toBe(2);
    expect(markers.has("aaa")).toBe(false);
  });

  it("honors minLen", () => {
    const markers = extractMarkers(["u_uart0", "u_uart1"], 5, 2);
    for (const key of markers.keys()) {
      expect(key.length).toBeGreaterThanOrEqual(5);
    }
    expect(markers.get("u_uart")).toBe(2);
  });

  it("returns an empty map for no identifiers", () => {
    expect(extractMarkers([], 3, 2).size).toBe(0);
  });

  it("rejects non-positive parameters", () => {
    expect(() => extractMarkers(["abc"], 0, 2)).toThrow(RangeError);
    expect(() => extractMarkers(["abc"], 3, -1)).toThrow(RangeError);
    expect(() => extractMarkers(["abc"], 1.5, 2)).toThrow(RangeError);
  });
});

describe("sortMarkers", () => {
  it("orders longest first and keeps ties in input order", () => {
    expect(sortMarkers(["ab", "abcd", "cd", "abc"])).toEqual(["abcd", "abc", "ab", "cd"]);
  });
});

describe("cluster", () => {
  const ports = ["u_uart0", "u_uart1", "u_spi0", "clk"];

  it("assigns each identifier to the longest marker prefixing it", () => {
    const groups = cluster(ports, ["u_", "u_uart"]);
    expect([...groups.entries()]).toEqual([
      ["u_uart", ["u_uart0", "u_uart1"]],
      ["u_", ["u_spi0"]],
      [UNKNOWN_GROUP, ["clk"]],
    ]);
  });

  it("requires the marker to be a prefix", () => {
    const groups = cluster(["x_u_uart"], ["u_uart"]);
    expect(groups.get(UNKNOWN_GROUP)).toEqual(["x_u_uart"]);
  });

  it("places every identifier in exactly one group", () => {
    const ids = ["m_axi_awaddr", "m_axi_wdata", "s_apb_paddr", "s_apb_pwdata", "clk", "clk"];
    const groups = cluster(ids, extractMarkers(ids, 3, 2).keys());
    const members = [...groups.values()].flat();
    expect(members.sort()).toEqual([...ids].sort());
  });

  it("returns no groups for no identifiers", () => {
    expect(cluster([], ["abc"]).size).toBe(0);
  });
});

describe("findBestGroup", () => {
  it("matches markers anywhere in the identifier", () => {
    expect(findBestGroup("x_u_uart", ["u_uart", "u_"])).toBe("u_uart");
  });

  it("falls back to the unknown group", () => {
    expect(findBestGroup("clk", ["u_uart"])).toBe(UNKNOWN_GROUP);
  });
});

describe("partAwareSimilarity", () => {
  it("uses plain similarity for single-token sides", () => {
    expect(partAwareSimilarity("axi", "apb")).toBeCloseTo(1 / 3, 10);
    expect(partAwareSimilarity("AXI", "axi")).toBe(1);
  });

  it("credits reordered tokens", () => {
    expect(partAwareSimilarity("axi_lite", "lite_axi")).toBeCloseTo(1, 10);
  });

  it("gives partial credit for partially matching tokens", () => {
    // "m" has no counterpart, "axi" matches exactly: 0.5*0.7 + 1*0.3
    // which loses to the plain score 1 - 2/6
    expect(partAwareSimilarity("m_axi", "s_axi_")).toBeCloseTo(4 / 6, 10);
  });
});

describe("bestMarkerForHint", () => {
  it("picks the marker carrying all hint tokens", () => {
    expect(bestMarkerForHint("m_axi", ["s_axi_", "m_axi_", "apb_"])).toBe("m_axi_");
  });

  it("resolves camelCase hints", () => {
    expect(bestMarkerForHint("mAxi", ["s_axi_", "m_axi_", "apb_"])).toBe("m_axi_");
  });

  it("breaks ties by marker length", () => {
    expect(bestMarkerForHint("zzz", ["ab", "abcd"])).toBe("abcd");
  });

  it("returns an empty string without markers", () => {
    expect(bestMarkerForHint("axi", [])).toBe("");
  });
});

describe("findBestMatchingString", () => {
  const candidates = ["awaddr", "araddr_o", "rdata"];

  it("returns the most similar candidate", () => {
    expect(findBestMatchingString("araddr", candidates)).toBe("awaddr");
  });

  it("returns undefined when nothing beats the threshold", () => {
    expect(findBestMatchingString("araddr", candidates, 0.9)).toBeUndefined();
  });
});
