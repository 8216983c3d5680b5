import { describe, expect, it } from "vitest";

import {
  isValidProjectAddress,
  isValidProjectName,
  isValidTaskTitle,
  MAX_AMOUNT,
  parseAmount,
} from "@/lib/validation";

describe("parseAmount", () => {
  it("accepts dot and comma as the decimal separator", () => {
    expect(parseAmount("1250.50")).toBe(1250.5);
    expect(parseAmount("1250,50")).toBe(1250.5);
    expect(parseAmount(" 100 ")).toBe(100);
    expect(parseAmount(".5")).toBe(0.5);
    expect(parseAmount("5,")).toBe(5);
  });

  it("rounds to cents", () => {
    expect(parseAmount("10.456")).toBe(10.46);
  });

  it("accepts the upper bound and rejects anything above it", () => {
    expect(parseAmount("999999.99")).toBe(MAX_AMOUNT);
    expect(parseAmount("999999.999")).toBeNull();
    expect(parseAmount("1000000")).toBeNull();
  });

  it("rejects amounts that round down to zero", () => {
    expect(parseAmount("0.001")).toBeNull();
    expect(parseAmount("0,004")).toBeNull();
    expect(parseAmount("0.006")).toBe(0.01);
  });

  it("rejects zero, negatives and non-numeric input", () => {
    expect(parseAmount("0")).toBeNull();
    expect(parseAmount("0,00")).toBeNull();
    expect(parseAmount("-5")).toBeNull();
    expect(parseAmount("abc")).toBeNull();
    expect(parseAmount("1e3")).toBeNull();
    expect(parseAmount("1 000")).toBeNull();
    expect(parseAmount("")).toBeNull();
    expect(parseAmount(undefined)).toBeNull();
  });
});

describe("text length rules", () => {
  it("bounds project names to 1-255 characters", () => {
    expect(isValidProjectName("")).toBe(false);
    expect(isValidProjectName("А")).toBe(true);
    expect(isValidProjectName("x".repeat(255))).toBe(true);
    expect(isValidProjectName("x".repeat(256))).toBe(false);
  });

  it("counts characters rather than UTF-16 units", () => {
    expect(isValidProjectName("🏠".repeat(255))).toBe(true);
    expect(isValidProjectName("🏠".repeat(256))).toBe(false);
  });

  it("bounds addresses to 5-512 characters", () => {
    expect(isValidProjectAddress("ул. 5")).toBe(true);
    expect(isValidProjectAddress("ул 5")).toBe(false);
    expect(isValidProjectAddress("x".repeat(512))).toBe(true);
    expect(isValidProjectAddress("x".repeat(513))).toBe(false);
  });

  it("bounds task titles to 1-255 characters", () => {
    expect(isValidTaskTitle("")).toBe(false);
    expect(isValidTaskTitle("Заказать окна")).toBe(true);
    expect(isValidTaskTitle("x".repeat(256))).toBe(false);
  });
});
