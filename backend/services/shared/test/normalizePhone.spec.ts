// backend/services/shared/test/normalizePhone.spec.ts
import { describe, it, expect } from "vitest";
import { normalizePhone } from "../utils/normalizePhone";

describe("normalizePhone", () => {
  it.each([
    ["+7 (999) 123-45-67", "79991234567"],
    ["8-800-555-35-35", "88005553535"],
    ["12345", "12345"],
    ["tel: 555 0100 ext", "5550100"],
    ["---+++((()))", ""],
    ["", ""],
  ])("%j → %j", (input, expected) => {
    expect(normalizePhone(input)).toBe(expected);
  });
});
