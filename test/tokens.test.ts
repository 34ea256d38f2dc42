import { describe, it, expect } from "vitest";
import {
  tokenize,
  variantsOf,
  tokenOrders,
  joinSnake,
  joinLowerCamel,
  joinUpperCamel,
  dedupeCaseInsensitive,
} from "../src/text/tokens.js";

describe("tokenize", () => {
  it("splits on underscores and lower-cases", () => {
    expect(tokenize("m_axi_araddr")).toEqual(["m", "axi", "araddr"]);
    expect(tokenize("S_AXI_Wdata")).toEqual(["s", "axi", "wdata"]);
  });

  it("keeps empty tokens from doubled or edge separators", () => {
    expect(tokenize("a__b")).toEqual(["a", "", "b"]);
    expect(tokenize("_x")).toEqual(["", "x"]);
  });

  it("splits camelCase and PascalCase at uppercase letters", () => {
    expect(tokenize("axiLite")).toEqual(["axi", "lite"]);
    expect(tokenize("AxiLiteSlave")).toEqual(["axi", "lite", "slave"]);
  });

  it("returns the whole identifier lower-cased for a single token", () => {
    expect(tokenize("clk")).toEqual(["clk"]);
    expect(tokenize("Clk")).toEqual(["clk"]);
    expect(tokenize("")).toEqual([""]);
  });

  it("prefers underscores over case boundaries", () => {
    expect(tokenize("axiLite_wdata")).toEqual(["axilite", "wdata"]);
  });

  it("is stable through a snake_case round trip", () => {
    for (const id of ["m_axi_araddr", "AxiLiteSlave", "axiLite", "clk", "a__b", "io_in_Valid"]) {
      const tokens = tokenize(id);
      expect(tokenize(joinSnake(tokens))).toEqual(tokens);
    }
  });
});

describe("joins", () => {
  const tokens = ["axi", "lite", "slave"];

  it("builds snake, lowerCamel and UpperCamel spellings", () => {
    expect(joinSnake(tokens)).toBe("axi_lite_slave");
    expect(joinLowerCamel(tokens)).toBe("axiLiteSlave");
    expect(joinUpperCamel(tokens)).toBe("AxiLiteSlave");
  });

  it("tolerates empty tokens", () => {
    expect(joinLowerCamel(["a", "", "b"])).toBe("aB");
    expect(joinUpperCamel([])).toBe("");
  });
});

describe("variantsOf", () => {
  it("includes reversed spellings for two tokens", () => {
    expect(variantsOf("axi_lite")).toEqual(["axi_lite", "axiLite", "lite_axi", "liteAxi"]);
  });

  it("keeps the original spelling first", () => {
    expect(variantsOf("AxiLite")).toEqual(["AxiLite", "axi_lite", "lite_axi", "liteAxi"]);
  });

  it("returns just the identifier for a single token", () => {
    expect(variantsOf("axi")).toEqual(["axi"]);
    expect(variantsOf("")).toEqual([""]);
  });

  it("skips reversed spellings beyond four tokens", () => {
    expect(variantsOf("a_b_c_d_e")).toEqual(["a_b_c_d_e", "aBCDE"]);
  });

  it("never repeats a spelling case-insensitively", () => {
    const variants = variantsOf("m_axi_lite");
    const lowered = variants.map((v) => v.toLowerCase());
    expect(new Set(lowered).size).toBe(variants.length);
  });
});

describe("tokenOrders", () => {
  it("adds the reversed order for 2-6 tokens", () => {
    expect(tokenOrders(["a", "b", "c"])).toEqual([
      ["a", "b", "c"],
      ["c", "b", "a"],
    ]);
  });

  it("keeps a single order otherwise", () => {
    expect(tokenOrders(["axi"])).toEqual([["axi"]]);
    expect(tokenOrders(["a", "b", "c", "d", "e", "f", "g"])).toHaveLength(1);
  });
});

describe("dedupeCaseInsensitive", () => {
  it("keeps first spelling", () => {
    expect(dedupeCaseInsensitive(["AxI", "axi", "APB", "apb", "x"])).toEqual(["AxI", "APB", "x"]);
  });
});
