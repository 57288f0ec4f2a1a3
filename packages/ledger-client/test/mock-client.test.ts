import { describe, it, expect } from "vitest";
import { MockLedgerClient } from "../src/mock-client.js";

describe("MockLedgerClient", () => {
  it("verifies sk- credentials with the real fingerprint", async () => {
    const ledger = new MockLedgerClient();
    expect(await ledger.verifyIdentity("sk-test")).toEqual({
      kind: "valid",
      userId: "f3abf2a6cc4f00987743db5f544ba345",
      username: "sk-test****test",
    });
    expect((await ledger.verifyIdentity("bogus")).kind).toBe("invalid");
  });

  it("revoked credentials and transient mode", async () => {
    const ledger = new MockLedgerClient();
    ledger.revoke("sk-test");
    expect((await ledger.verifyIdentity("sk-test")).kind).toBe("invalid");
    ledger.verifyMode = "transient-error";
    expect((await ledger.verifyIdentity("sk-other")).kind).toBe("transient-error");
  });

  it("mints sequential deterministic codes and records calls", async () => {
    const ledger = new MockLedgerClient();
    expect(await ledger.mintCode("1")).toEqual({ kind: "minted", code: "MOCK-1-1" });
    expect(await ledger.mintCode("100")).toEqual({ kind: "minted", code: "MOCK-100-2" });
    ledger.mintMode = "unknown";
    expect((await ledger.mintCode("1")).kind).toBe("unknown");
    expect(ledger.calls.mint).toEqual(["1", "100", "1"]);
  });

  it("redeem can be made to fail", async () => {
    const ledger = new MockLedgerClient();
    ledger.redeemFails = true;
    expect(await ledger.autoRedeem("sk-test", "MOCK-1-1")).toEqual({
      kind: "failed",
      message: "mock: redeem failed",
    });
    expect(ledger.calls.redeem).toEqual([{ credential: "sk-test", code: "MOCK-1-1" }]);
  });
});
