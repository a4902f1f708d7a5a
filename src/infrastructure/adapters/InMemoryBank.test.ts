import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryBank } from "./InMemoryBank";

describe("InMemoryBank", () => {
  let bank: InMemoryBank;

  beforeEach(() => {
    bank = new InMemoryBank();
  });

  it("sets funds and transfers between accounts", () => {
    expect(bank.getFunds("foo")).toBe(0);
    bank.setFunds("foo", 100);
    expect(bank.getFunds("foo")).toBe(100);
    bank.setFunds("bar", 150);
    expect(bank.getFunds("bar")).toBe(150);
    expect(bank.transferFunds(50, "bar", "foo")).toBe(true);
    expect(bank.getFunds("foo")).toBe(150);
    expect(bank.getFunds("bar")).toBe(100);
  });

  describe("getFunds", () => {
    it("returns 0 for unknown accounts without creating them", () => {
      expect(bank.getFunds("ghost")).toBe(0);
      expect(bank.getFunds("ghost")).toBe(0);
      expect(bank.accounts()).toEqual({});
    });
  });

  describe("setFunds", () => {
    it("overwrites the previous balance", () => {
      bank.setFunds("alice", 10);
      bank.setFunds("alice", 3);
      expect(bank.getFunds("alice")).toBe(3);
    });

    it("accepts zero", () => {
      bank.setFunds("alice", 0);
      expect(bank.accounts()).toEqual({ alice: 0 });
    });

    it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])(
      "rejects %s",
      (amount) => {
        expect(() => bank.setFunds("alice", amount)).toThrow("Invalid Amount");
        expect(bank.getFunds("alice")).toBe(0);
      }
    );
  });

  describe("transferFunds", () => {
    it("succeeds when the amount equals the balance and leaves the source at 0", () => {
      bank.setFunds("alice", 40);
      expect(bank.transferFunds(40, "alice", "bob")).toBe(true);
      expect(bank.getFunds("alice")).toBe(0);
      expect(bank.getFunds("bob")).toBe(40);
    });

    it("fails without changes when the source is short", () => {
      bank.setFunds("alice", 40);
      bank.setFunds("bob", 5);
      expect(bank.transferFunds(41, "alice", "bob")).toBe(false);
      expect(bank.getFunds("alice")).toBe(40);
      expect(bank.getFunds("bob")).toBe(5);
    });

    it("fails from an account that was never set", () => {
      expect(bank.transferFunds(1, "ghost", "bob")).toBe(false);
      expect(bank.accounts()).toEqual({});
    });

    it("treats a zero transfer as a no-op success", () => {
      expect(bank.transferFunds(0, "ghost", "bob")).toBe(true);
      expect(bank.accounts()).toEqual({});
    });

    it.each([-5, 2.5])("rejects amount %s", (amount) => {
      bank.setFunds("alice", 10);
      expect(bank.transferFunds(amount, "alice", "bob")).toBe(false);
      expect(bank.accounts()).toEqual({ alice: 10 });
    });

    it("keeps the balance when source and destination match", () => {
      bank.setFunds("alice", 10);
      expect(bank.transferFunds(10, "alice", "alice")).toBe(true);
      expect(bank.transferFunds(11, "alice", "alice")).toBe(false);
      expect(bank.getFunds("alice")).toBe(10);
    });

    it("refuses a second overdrawing transfer after the first is applied", () => {
      bank.setFunds("alice", 60);
      const results = [
        bank.transferFunds(50, "alice", "bob"),
        bank.transferFunds(50, "alice", "carol"),
      ];
      expect(results).toEqual([true, false]);
      expect(bank.accounts()).toEqual({ alice: 10, bob: 50 });
    });
  });

  it("refuses a credit past the safe-integer limit without changes", () => {
    bank.setFunds("alice", 3);
    bank.setFunds("bob", Number.MAX_SAFE_INTEGER);
    expect(bank.transferFunds(3, "alice", "bob")).toBe(false);
    expect(bank.accounts()).toEqual({ alice: 3, bob: Number.MAX_SAFE_INTEGER });
  });

  it("allows a self-transfer of a balance at the safe-integer limit", () => {
    bank.setFunds("bob", Number.MAX_SAFE_INTEGER);
    expect(bank.transferFunds(1, "bob", "bob")).toBe(true);
    expect(bank.getFunds("bob")).toBe(Number.MAX_SAFE_INTEGER);
  });

  it("seeds opening balances", () => {
    const seeded = new InMemoryBank({ alice: 7, bob: 0 });
    expect(seeded.getFunds("alice")).toBe(7);
    expect(seeded.accounts()).toEqual({ alice: 7, bob: 0 });
  });

  it("seeds an account named __proto__", () => {
    const seeded = new InMemoryBank(Object.fromEntries([["__proto__", 5]]));
    expect(seeded.getFunds("__proto__")).toBe(5);
  });
});
