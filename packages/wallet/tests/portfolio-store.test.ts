/**
 * Tests for PortfolioStore: credit, debit and atomic batches.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { PortfolioStore, decimalsOf } from "../src/portfolio-store.js";
import { WalletError } from "../src/errors.js";
import { InMemoryPersistence } from "../src/in-memory-persistence.js";
import { catalog } from "./helpers.js";

function errorOf(fn: () => unknown): WalletError | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof WalletError) return err;
    throw err;
  }
  return undefined;
}

describe("PortfolioStore", () => {
  let persistence: InMemoryPersistence;
  let store: PortfolioStore;

  beforeEach(() => {
    persistence = new InMemoryPersistence();
    store = new PortfolioStore(persistence, catalog);
    store.ensure(1, "USD");
  });

  describe("ensure", () => {
    it("creates a zero base balance", () => {
      expect(store.getBalances(1)).toEqual({ USD: "0.00" });
      expect(persistence.loadPortfolios()).toEqual([{ userId: 1, balances: { USD: "0.00" } }]);
    });

    it("leaves an existing portfolio alone", () => {
      store.credit(1, "USD", "10");
      expect(store.ensure(1, "EUR")).toEqual({ USD: "10.00" });
    });
  });

  describe("credit", () => {
    it("creates a currency entry at the currency precision", () => {
      expect(store.credit(1, "BTC", "0.05")).toEqual({ USD: "0.00", BTC: "0.05000000" });
    });

    it("adds to an existing balance", () => {
      store.credit(1, "USD", "1000");
      expect(store.credit(1, "USD", "0.50").USD).toBe("1000.50");
    });

    it("rejects zero and negative amounts", () => {
      expect(errorOf(() => store.credit(1, "USD", "0"))?.code).toBe("INVALID_AMOUNT");
      expect(errorOf(() => store.credit(1, "USD", "-5"))?.code).toBe("INVALID_AMOUNT");
    });

    it("rejects more precision than the currency has", () => {
      expect(errorOf(() => store.credit(1, "USD", "1.234"))?.code).toBe("INVALID_AMOUNT");
      expect(errorOf(() => store.credit(1, "JPY", "1.5"))?.code).toBe("INVALID_AMOUNT");
    });

    it("rejects unknown currencies", () => {
      expect(errorOf(() => store.credit(1, "XYZ", "1"))?.code).toBe("UNKNOWN_CURRENCY");
    });
  });

  describe("debit", () => {
    beforeEach(() => {
      store.credit(1, "USD", "100");
    });

    it("decreases the balance", () => {
      expect(store.debit(1, "USD", "40.25").USD).toBe("59.75");
    });

    it("may take the balance to exactly zero", () => {
      expect(store.debit(1, "USD", "100").USD).toBe("0.00");
    });

    it("fails beyond the balance and changes nothing", () => {
      const saves = persistence.saves.portfolios;
      const err = errorOf(() => store.debit(1, "USD", "100.01"));
      expect(err?.code).toBe("INSUFFICIENT_FUNDS");
      expect(err?.details).toEqual({ currency: "USD", available: "100.00", required: "100.01" });
      expect(store.getBalances(1)).toEqual({ USD: "100.00" });
      expect(persistence.saves.portfolios).toBe(saves);
    });

    it("fails for a currency that is not held", () => {
      expect(errorOf(() => store.debit(1, "BTC", "0.1"))?.code).toBe("INSUFFICIENT_FUNDS");
      expect(store.getBalances(1)).toEqual({ USD: "100.00" });
    });
  });

  describe("apply", () => {
    beforeEach(() => {
      store.credit(1, "USD", "100");
    });

    it("applies every change in one save", () => {
      const saves = persistence.saves.portfolios;
      const after = store.apply(1, [
        { kind: "debit", currency: "USD", amount: "59.34" },
        { kind: "credit", currency: "BTC", amount: "0.001" },
      ]);
      expect(after).toEqual({ USD: "40.66", BTC: "0.00100000" });
      expect(persistence.saves.portfolios).toBe(saves + 1);
    });

    it("applies nothing when a later change fails", () => {
      const err = errorOf(() =>
        store.apply(1, [
          { kind: "credit", currency: "EUR", amount: "5" },
          { kind: "debit", currency: "USD", amount: "2000" },
        ]),
      );
      expect(err?.code).toBe("INSUFFICIENT_FUNDS");
      expect(store.getBalances(1)).toEqual({ USD: "100.00" });
    });

    it("keeps memory unchanged when saving fails", () => {
      class FailingPersistence extends InMemoryPersistence {
        override savePortfolios(): void {
          throw new Error("disk full");
        }
      }
      const failing = new PortfolioStore(
        new FailingPersistence({ portfolios: [{ userId: 1, balances: { USD: "5.00" } }] }),
        catalog,
      );
      expect(() => failing.credit(1, "USD", "1")).toThrow("disk full");
      expect(failing.getBalances(1)).toEqual({ USD: "5.00" });
    });
  });

  describe("preview", () => {
    it("computes without storing", () => {
      expect(store.preview(1, [{ kind: "credit", currency: "EUR", amount: "3" }])).toEqual({
        USD: "0.00",
        EUR: "3.00",
      });
      expect(store.getBalances(1)).toEqual({ USD: "0.00" });
    });
  });

  describe("loading", () => {
    it("normalises stored balances to currency precision", () => {
      const loaded = new PortfolioStore(
        new InMemoryPersistence({
          portfolios: [{ userId: 3, balances: { USD: "1000", BTC: "0.5", XAU: "1.25" } }],
        }),
        catalog,
      );
      expect(loaded.getBalances(3)).toEqual({ USD: "1000.00", BTC: "0.50000000", XAU: "1.25" });
      expect(loaded.balanceOf(3, "ETH")).toBe("0.00000000");
    });

    it("returns empty balances for an unknown user", () => {
      expect(store.getBalances(42)).toEqual({});
      expect(store.has(42)).toBe(false);
    });
  });
});

describe("decimalsOf", () => {
  it("counts fractional digits", () => {
    expect(decimalsOf("1.25")).toBe(2);
    expect(decimalsOf("7")).toBe(0);
  });
});
