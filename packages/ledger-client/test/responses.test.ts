import { describe, it, expect } from "vitest";
import { interpretMint, interpretRedeem, interpretVerify, parseBody } from "../src/responses.js";

describe("parseBody", () => {
  it("returns undefined for empty or non-JSON text", () => {
    expect(parseBody("")).toBeUndefined();
    expect(parseBody("<html>")).toBeUndefined();
    expect(parseBody('{"a":1}')).toEqual({ a: 1 });
  });
});

describe("interpretVerify", () => {
  it("needs success:true or a data field on a 200", () => {
    expect(interpretVerify(200, { success: true })).toEqual({ kind: "accepted" });
    expect(interpretVerify(200, { data: null })).toEqual({ kind: "accepted" });
    expect(interpretVerify(200, { success: false, message: "nope" })).toEqual({
      kind: "rejected",
      reason: "nope",
    });
    expect(interpretVerify(200, undefined)).toEqual({
      kind: "rejected",
      reason: "unrecognized identity response",
    });
  });

  it("reads detail when message is absent", () => {
    expect(interpretVerify(403, { detail: "forbidden" })).toEqual({ kind: "rejected", reason: "forbidden" });
  });

  it("treats timeouts and rate limiting as unavailable, not as a bad credential", () => {
    expect(interpretVerify(429, { message: "slow down" })).toEqual({
      kind: "unavailable",
      message: "ledger returned 429",
    });
    expect(interpretVerify(408, undefined)).toEqual({ kind: "unavailable", message: "ledger returned 408" });
  });
});

describe("interpretMint", () => {
  it.each([
    [{ success: true, data: ["k1", "k2"] }, { kind: "minted", code: "k1" }],
    [{ success: true, data: "k1" }, { kind: "minted", code: "k1" }],
    [{ success: true, data: [] }, { kind: "unknown", message: "mint response carries no code" }],
    [["k1"], { kind: "unknown", message: "mint response is not a JSON object" }],
  ])("200 %j", (body, expected) => {
    expect(interpretMint(200, body)).toEqual(expected);
  });

  it("4xx is a clean rejection, 5xx is unknown", () => {
    expect(interpretMint(400, { message: "bad quota" })).toEqual({ kind: "rejected", message: "bad quota" });
    expect(interpretMint(500, undefined)).toEqual({ kind: "unknown", message: "ledger returned 500" });
  });
});

describe("interpretRedeem", () => {
  it("accepts any 2xx not marked unsuccessful", () => {
    expect(interpretRedeem(200, undefined)).toEqual({ kind: "redeemed" });
    expect(interpretRedeem(200, { success: true })).toEqual({ kind: "redeemed" });
    expect(interpretRedeem(404, {})).toEqual({ kind: "failed", message: "ledger returned 404" });
  });
});
