import { describe, expect, it } from "vitest";
import { formatCurrency, formatPhoneForSms, getFirstName } from "../format.js";

describe("format - formatCurrency", () => {
  it("should format reais with prefix and two decimals", () => {
    expect(formatCurrency(10.5)).toBe("R$ 10,50");
    expect(formatCurrency(0)).toBe("R$ 0,00");
    expect(formatCurrency(1234.56)).toBe("R$ 1.234,56");
  });

  it("should use a plain space instead of NBSP", () => {
    expect(formatCurrency(1)).not.toContain("\u00a0");
  });

  it("should always produce exactly two decimal digits", () => {
    for (const value of [0, 0.1, 1, 7.005, 99.999, 1050, 123456.789]) {
      expect(formatCurrency(value)).toMatch(/^R\$ [\d.]+,\d{2}$/);
    }
  });

  it("should accept another currency", () => {
    expect(formatCurrency(10, "USD")).toBe("US$ 10,00");
  });
});

describe("format - formatPhoneForSms", () => {
  it("should prepend + when missing", () => {
    expect(formatPhoneForSms("5511999999999")).toBe("+5511999999999");
  });

  it("should keep numbers that already start with +", () => {
    expect(formatPhoneForSms("+5511999999999")).toBe("+5511999999999");
  });

  it("should be idempotent", () => {
    const once = formatPhoneForSms("5521988887777");
    expect(formatPhoneForSms(once)).toBe(once);
  });

  it("should not strip or infer anything else", () => {
    expect(formatPhoneForSms("(11) 99999-9999")).toBe("+(11) 99999-9999");
  });
});

describe("format - getFirstName", () => {
  it("should return the first name", () => {
    expect(getFirstName("  Maria   da Silva ")).toBe("Maria");
  });

  it("should return empty string when no name", () => {
    expect(getFirstName(undefined)).toBe("");
    expect(getFirstName("")).toBe("");
  });
});
