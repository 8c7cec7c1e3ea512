import { describe, expect, it } from "vitest";
import {
  formatCurrency,
  formatFileTimestamp,
  formatNumber,
  formatPercent,
  formatTimestamp,
} from "@/lib/format";

describe("formatNumber", () => {
  it("separates thousands and rounds to whole numbers by default", () => {
    expect(formatNumber(113998325)).toBe("113,998,325");
    expect(formatNumber(1234.6)).toBe("1,235");
  });

  it("keeps a fixed number of decimals", () => {
    expect(formatNumber(81.9, 2)).toBe("81.90");
    expect(formatNumber(2.8981, 1)).toBe("2.9");
  });

  it("prints an explicit sign when asked", () => {
    expect(formatNumber(2.898, 2, true)).toBe("+2.90");
    expect(formatNumber(-20.9, 0, true)).toBe("-21");
  });

  it("rounds exact halves to even", () => {
    expect(formatNumber(82.5)).toBe("82");
    expect(formatNumber(83.5)).toBe("84");
    expect(formatNumber(2.125, 2, true)).toBe("+2.12");
    expect(formatPercent(82.5)).toBe("82%");
  });

  it("renders non-finite values as 0", () => {
    expect(formatNumber(Number.NaN)).toBe("0");
    expect(formatNumber(Number.POSITIVE_INFINITY, 1)).toBe("0.0");
  });
});

describe("formatCurrency", () => {
  it("prefixes the currency code", () => {
    expect(formatCurrency(26479125, "KSH")).toBe("KSH 26,479,125");
  });

  it("keeps the minus sign of negative amounts", () => {
    expect(formatCurrency(-5535314, "KSH")).toBe("KSH -5,535,314");
  });
});

describe("formatPercent", () => {
  it("appends a percent sign", () => {
    expect(formatPercent(81.946)).toBe("82%");
    expect(formatPercent(1.1111, 1)).toBe("1.1%");
    expect(formatPercent(-20.9, 0, true)).toBe("-21%");
  });
});

describe("timestamps", () => {
  const at = new Date(2025, 4, 6, 9, 5);

  it("formats a readable local timestamp", () => {
    expect(formatTimestamp(at)).toBe("2025-05-06 09:05");
  });

  it("formats a compact timestamp for file names", () => {
    expect(formatFileTimestamp(at)).toBe("20250506_0905");
  });
});
