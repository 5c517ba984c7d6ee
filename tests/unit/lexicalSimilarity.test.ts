/**
 * Unit tests for token-set similarity
 */

import { describe, it, expect } from "vitest";
import { indelRatio, tokenSetRatio } from "@/classification";

describe("indelRatio", () => {
  it("should be 100 for equal strings and 0 when either is empty", () => {
    expect(indelRatio("contador", "contador")).toBe(100);
    expect(indelRatio("", "contador")).toBe(0);
    expect(indelRatio("contador", "")).toBe(0);
  });

  it("should scale the longest common subsequence by total length", () => {
    // LCS("abc", "abd") = 2
    expect(indelRatio("abc", "abd")).toBeCloseTo(66.667, 2);
  });
});

describe("tokenSetRatio", () => {
  it("should ignore word order, case and diacritics", () => {
    expect(tokenSetRatio("Asistente Administrativo", "ADMINISTRATIVO ASISTENTE")).toBe(100);
    expect(tokenSetRatio("Técnico en Enfermería", "tecnico en enfermeria")).toBe(100);
  });

  it("should score 100 when one token set contains the other", () => {
    expect(tokenSetRatio("contador", "contador publico")).toBe(100);
    expect(tokenSetRatio("zeta", "zeta uno")).toBe(100);
  });

  it("should score 0 when either side has no tokens", () => {
    expect(tokenSetRatio("", "abogado")).toBe(0);
    expect(tokenSetRatio("---", "abogado")).toBe(0);
  });

  it("should take the best ratio over shared and combined token strings", () => {
    expect(tokenSetRatio("medico cirujano", "medico general")).toBe(62);
    expect(tokenSetRatio("Ingeniero de Sistemas", "ingeniero civil")).toBe(75);
    expect(tokenSetRatio("Asistente legal", "Asistente administrativo")).toBe(75);
  });

  it("should fall back to character overlap for disjoint tokens", () => {
    expect(tokenSetRatio("abc", "abd")).toBe(67);
    expect(tokenSetRatio("zeta", "beta")).toBe(75);
    expect(tokenSetRatio("zeta", "gamma")).toBe(22);
  });

  it("should be symmetric", () => {
    expect(tokenSetRatio("medico general", "medico cirujano")).toBe(62);
  });
});
