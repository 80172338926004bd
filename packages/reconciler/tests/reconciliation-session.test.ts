/**
 * Tests for ReconciliationSession — the lock/finalize protocol.
 *
 * Verifies:
 * - Transfer mode keeps NAV unchanged; surplus raises it
 * - Sync mode changes NAV by the non-neutralized share
 * - Every rejection releases the session and leaves the pool untouched
 * - Manipulation between lock and finalize is detected
 * - Calls into one pool never overlap
 */

import { describe, it, expect } from "vitest";
import pino from "pino";
import type { DestinationMessageParams, TokenAmount } from "@navsync/types";
import { NATIVE_TOKEN } from "@navsync/types";
import { poolStreamId } from "@navsync/event-store";
import { ReconciliationError } from "../src/types.js";
import {
  BASE,
  E18,
  GatedWallet,
  POOL,
  TRANSFER,
  USDC,
  WBTC,
  WETH,
  createHarness,
  syncParams,
} from "./fixtures.js";
import type { Harness } from "./fixtures.js";

async function expectCode(promise: Promise<unknown>, code: string): Promise<void> {
  await expect(promise).rejects.toBeInstanceOf(ReconciliationError);
  await expect(promise).rejects.toMatchObject({ code });
}

/** Pool state that a rejected finalize must not touch. */
function poolState(h: Harness) {
  return {
    unitaryValue: h.pool.unitaryValue,
    activeTokens: h.pool.activeTokens(),
    ledger: h.pool.ledger.snapshot(),
    settledValue: h.session.settledValue,
  };
}

// =============================================================================
// Transfer mode
// =============================================================================

describe("transfer mode", () => {
  it("settles a transfer without moving NAV", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);

    const receipt = await h.session.finalize(BASE, 100n * E18, TRANSFER);

    expect(receipt.receivedValue).toBe(100n * E18);
    expect(receipt.amountInBase).toBe(100n * E18);
    expect(receipt.outcome).toEqual({
      virtualBalanceDelta: 0n,
      virtualSupplyDelta: 100n * E18,
      neutralizedValue: 100n * E18,
      organicValue: 0n,
    });
    expect(receipt.navBefore.unitaryValue).toBe(1_100_000_000_000_000_000n);
    expect(receipt.navAfter.unitaryValue).toBe(E18);
    expect(receipt.navAfter.effectiveSupply).toBe(1100n * E18);
    expect(h.pool.unitaryValue).toBe(E18);
    expect(h.pool.ledger.getVirtualSupply()).toBe(100n * E18);
    expect(h.session.isLocked(BASE)).toBe(false);
  });

  it("clears a positive virtual balance before adding virtual supply", async () => {
    const h = createHarness();
    h.pool.ledger.updateVirtualBalance(BASE, 60n * E18);
    const snapshot = await h.session.lock(BASE);
    expect(snapshot.storedNav).toBe(1_060_000_000_000_000_000n);

    h.wallet.credit(BASE, POOL, 100n * E18);
    const receipt = await h.session.finalize(BASE, 100n * E18, TRANSFER);

    // 40e18 left over, priced at 1.06
    expect(receipt.outcome.virtualBalanceDelta).toBe(-60n * E18);
    expect(receipt.outcome.virtualSupplyDelta).toBe(37_735_849_056_603_773_584n);
    expect(h.pool.ledger.getVirtualBalance(BASE)).toBe(0n);
    expect(receipt.navAfter.unitaryValue).toBe(1_060_000_000_000_000_000n);
  });

  it("needs no virtual supply when the virtual balance covers the amount", async () => {
    const h = createHarness();
    h.pool.ledger.updateVirtualBalance(BASE, 250n * E18);
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);

    const receipt = await h.session.finalize(BASE, 100n * E18, TRANSFER);

    expect(receipt.outcome.virtualSupplyDelta).toBe(0n);
    expect(h.pool.ledger.getVirtualBalance(BASE)).toBe(150n * E18);
    expect(receipt.navAfter.unitaryValue).toBe(1_250_000_000_000_000_000n);
  });

  it("counts value above the declared amount as organic", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 110n * E18);

    const receipt = await h.session.finalize(BASE, 100n * E18, TRANSFER);

    expect(receipt.amountDelta).toBe(110n * E18);
    expect(receipt.outcome.virtualSupplyDelta).toBe(100n * E18);
    expect(receipt.outcome.organicValue).toBe(10n * E18);
    expect(receipt.navAfter.unitaryValue).toBe(1_009_090_909_090_909_090n);
  });

  it("activates and prices a non-base token", async () => {
    const h = createHarness();
    await h.session.lock(WETH);
    h.wallet.credit(WETH, POOL, E18);

    const receipt = await h.session.finalize(WETH, E18, TRANSFER);

    expect(receipt.activated).toBe(true);
    expect(receipt.receivedValue).toBe(2000n * E18);
    expect(receipt.outcome.virtualSupplyDelta).toBe(2000n * E18);
    expect(receipt.navAfter.unitaryValue).toBe(E18);
    expect(h.pool.activeTokens()).toEqual([WETH]);
  });

  it("values an already active token at the margin", async () => {
    const h = createHarness();
    h.pool.activate(WETH);
    h.wallet.credit(WETH, POOL, E18);
    h.pool.setTotalSupply(3000n * E18);

    await h.session.lock(WETH);
    h.wallet.credit(WETH, POOL, E18 / 2n);
    const receipt = await h.session.finalize(WETH, E18 / 2n, TRANSFER);

    expect(receipt.activated).toBe(false);
    expect(receipt.receivedValue).toBe(1000n * E18);
    expect(receipt.navAfter.unitaryValue).toBe(E18);
  });

  it("unwraps the wrapped native token when asked", async () => {
    const h = createHarness();
    await h.session.lock(WETH);
    h.wallet.credit(WETH, POOL, E18);

    const receipt = await h.session.finalize(WETH, E18, { ...TRANSFER, shouldUnwrapNative: true });

    expect(receipt.unwrapped).toBe(true);
    expect(receipt.creditedToken).toBe(NATIVE_TOKEN);
    expect(await h.wallet.balanceOf(WETH, POOL)).toBe(0n);
    expect(await h.wallet.balanceOf(NATIVE_TOKEN, POOL)).toBe(E18);
    expect(h.pool.isActive(NATIVE_TOKEN)).toBe(true);
    expect(h.pool.isActive(WETH)).toBe(false);
    expect(receipt.navAfter.unitaryValue).toBe(E18);
  });

  it("ignores the unwrap flag for other tokens", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 10n * E18);

    const receipt = await h.session.finalize(BASE, 10n * E18, { ...TRANSFER, shouldUnwrapNative: true });

    expect(receipt.unwrapped).toBe(false);
    expect(receipt.creditedToken).toBe(BASE);
  });
});

// =============================================================================
// Sync mode
// =============================================================================

describe("sync mode", () => {
  it("neutralizes the multiplier share of the virtual balance", async () => {
    const h = createHarness({ baseBalance: 500n * E18 });
    h.pool.ledger.updateVirtualBalance(BASE, 500n * E18);
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);

    const receipt = await h.session.finalize(BASE, 100n * E18, syncParams(2500));

    expect(receipt.outcome).toEqual({
      virtualBalanceDelta: -25n * E18,
      virtualSupplyDelta: 0n,
      neutralizedValue: 25n * E18,
      organicValue: 75n * E18,
    });
    expect(h.pool.ledger.getVirtualBalance(BASE)).toBe(475n * E18);
    expect(receipt.navAfter.unitaryValue).toBe(1_075_000_000_000_000_000n);
    expect(h.pool.unitaryValue).toBe(1_075_000_000_000_000_000n);
  });

  it("treats a zero multiplier as pure performance", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);

    const receipt = await h.session.finalize(BASE, 100n * E18, syncParams(0));

    expect(receipt.outcome.organicValue).toBe(100n * E18);
    expect(receipt.navAfter.unitaryValue).toBe(1_100_000_000_000_000_000n);
  });

  it("clears no more than the positive virtual balance", async () => {
    const h = createHarness();
    h.pool.ledger.updateVirtualBalance(BASE, 10n * E18);
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);

    const receipt = await h.session.finalize(BASE, 100n * E18, syncParams(10_000));

    expect(receipt.outcome.virtualBalanceDelta).toBe(-10n * E18);
    expect(h.pool.ledger.getVirtualBalance(BASE)).toBe(0n);
    expect(receipt.navAfter.unitaryValue).toBe(1_100_000_000_000_000_000n);
  });

  it("leaves a negative virtual balance alone", async () => {
    const h = createHarness();
    h.pool.ledger.updateVirtualBalance(BASE, -50n * E18);
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);

    const receipt = await h.session.finalize(BASE, 100n * E18, syncParams(5_000));

    expect(receipt.outcome.virtualBalanceDelta).toBe(0n);
    expect(h.pool.ledger.getVirtualBalance(BASE)).toBe(-50n * E18);
    expect(receipt.navAfter.unitaryValue).toBe(1_050_000_000_000_000_000n);
  });
});

// =============================================================================
// Rejections
// =============================================================================

describe("rejections", () => {
  it("requires an open session", async () => {
    const h = createHarness();
    await expectCode(h.session.finalize(BASE, 100n * E18, TRANSFER), "DONATION_LOCK");
  });

  it("allows one session per token", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    await expectCode(h.session.lock(BASE), "DONATION_LOCK");
    expect(h.session.isLocked(BASE)).toBe(true);
  });

  it("refuses uninitialized pools", async () => {
    const h = createHarness({ unitaryValue: 0n });
    await expectCode(h.session.lock(BASE), "TOKEN_NOT_INITIALIZED");
  });

  it("rejects a balance that fell since lock", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    const before = poolState(h);
    h.wallet.debit(BASE, POOL, E18);

    await expectCode(h.session.finalize(BASE, 100n * E18, TRANSFER), "BALANCE_UNDERFLOW");
    expect(h.session.isLocked(BASE)).toBe(false);
    expect(poolState(h)).toEqual(before);
  });

  it("rejects a delta below the declared amount", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 50n * E18);

    await expectCode(h.session.finalize(BASE, 100n * E18, TRANSFER), "CALLER_TRANSFER_AMOUNT");
    expect(h.session.isLocked(BASE)).toBe(false);
  });

  it("rejects tokens outside the cross-chain list", async () => {
    const h = createHarness();
    await h.session.lock(WBTC);
    h.wallet.credit(WBTC, POOL, 100_000_000n);

    await expectCode(h.session.finalize(WBTC, 100_000_000n, TRANSFER), "UNSUPPORTED_CROSSCHAIN_TOKEN");
    expect(h.pool.isActive(WBTC)).toBe(false);
  });

  it("rejects amounts that do not exceed the lock sentinel", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    await expectCode(h.session.finalize(BASE, 1n, TRANSFER), "INVALID_AMOUNT");
    expect(h.session.isLocked(BASE)).toBe(false);
  });

  it("rejects op types outside the union", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);
    // Runtime value from an untyped caller
    const params: DestinationMessageParams = Object.assign({ ...TRANSFER }, { opType: "rebalance" });

    await expectCode(h.session.finalize(BASE, 100n * E18, params), "INVALID_OP_TYPE");
  });

  it("rejects sync multipliers above 10000", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);

    await expectCode(h.session.finalize(BASE, 100n * E18, syncParams(10_001)), "INVALID_SYNC_MULTIPLIER");
  });

  it("accepts a new session after a rejected one", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    await expectCode(h.session.finalize(BASE, 100n * E18, TRANSFER), "CALLER_TRANSFER_AMOUNT");

    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);
    const receipt = await h.session.finalize(BASE, 100n * E18, TRANSFER);
    expect(receipt.navAfter.unitaryValue).toBe(E18);
  });
});

// =============================================================================
// Manipulation & rollback
// =============================================================================

describe("manipulation detection", () => {
  it("rejects value that arrived through another token", async () => {
    const h = createHarness();
    h.pool.activate(USDC);
    await h.session.lock(BASE);
    const before = poolState(h);

    h.wallet.credit(BASE, POOL, 100n * E18);
    h.wallet.credit(USDC, POOL, 5_000_000n);

    await expectCode(h.session.finalize(BASE, 100n * E18, TRANSFER), "NAV_MANIPULATION_DETECTED");
    expect(h.session.isLocked(BASE)).toBe(false);
    expect(poolState(h)).toEqual(before);
  });

  it("rolls back token activation", async () => {
    const h = createHarness();
    await h.session.lock(WETH);
    h.wallet.credit(WETH, POOL, E18);
    h.wallet.credit(BASE, POOL, E18);

    await expectCode(h.session.finalize(WETH, E18, TRANSFER), "NAV_MANIPULATION_DETECTED");
    expect(h.pool.isActive(WETH)).toBe(false);
  });

  it("rolls back ledger writes when NAV drifts from the declared outcome", async () => {
    let calls = 0;
    const drifting: readonly TokenAmount[] = [{ token: BASE, amount: 7n }];
    const h = createHarness({
      applications: {
        getAppTokenBalances: async () => {
          calls += 1;
          return calls >= 3 ? drifting : [];
        },
      },
    });
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);

    await expectCode(h.session.finalize(BASE, 100n * E18, TRANSFER), "NAV_MANIPULATION_DETECTED");
    expect(calls).toBe(3);
    expect(h.pool.ledger.getVirtualSupply()).toBe(0n);
    expect(h.pool.unitaryValue).toBe(E18);
    expect(h.eventStore.streamVersion(poolStreamId(POOL))).toBe(1);
  });

  it("accounts for value settled by other sessions since lock", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    await h.session.lock(WETH);

    h.wallet.credit(WETH, POOL, E18);
    await h.session.finalize(WETH, E18, TRANSFER);
    expect(h.session.settledValue).toBe(2000n * E18);

    h.wallet.credit(BASE, POOL, 100n * E18);
    const receipt = await h.session.finalize(BASE, 100n * E18, TRANSFER);

    expect(receipt.navAfter.effectiveSupply).toBe(3100n * E18);
    expect(receipt.navAfter.unitaryValue).toBe(E18);
  });

  it("settles when another session's tokens arrived before this lock", async () => {
    const h = createHarness();
    h.pool.activate(WETH);
    await h.session.lock(WETH);
    h.wallet.credit(WETH, POOL, E18);

    const snapshot = await h.session.lock(BASE);
    expect(snapshot.storedAssets).toBe(3000n * E18);
    expect(snapshot.storedNav).toBe(3n * E18);

    await h.session.finalize(WETH, E18, TRANSFER);
    h.wallet.credit(BASE, POOL, 100n * E18);
    const receipt = await h.session.finalize(BASE, 100n * E18, TRANSFER);

    expect(receipt.receivedValue).toBe(100n * E18);
    expect(receipt.navBefore.grossAssetValue).toBe(3100n * E18);
    expect(receipt.outcome.virtualSupplyDelta).toBe(33333333333333333333n);
  });

  it("rejects unrelated value matching a delivery that preceded the lock", async () => {
    const h = createHarness();
    h.pool.activate(WETH);
    h.pool.activate(USDC);
    await h.session.lock(WETH);
    h.wallet.credit(WETH, POOL, E18);
    await h.session.lock(BASE);
    await h.session.finalize(WETH, E18, TRANSFER);

    h.wallet.credit(BASE, POOL, 100n * E18);
    h.wallet.credit(USDC, POOL, 2000n * 10n ** 6n);
    const before = poolState(h);

    await expectCode(h.session.finalize(BASE, 100n * E18, TRANSFER), "NAV_MANIPULATION_DETECTED");
    expect(poolState(h)).toEqual(before);
    expect(h.session.isLocked(BASE)).toBe(false);
  });
});

// =============================================================================
// Exclusion
// =============================================================================

describe("reentrancy", () => {
  it("rejects a call while another is suspended", async () => {
    const h = createHarness({ wallet: (inner) => new GatedWallet(inner) });
    const wallet = h.ledger;
    if (!(wallet instanceof GatedWallet)) throw new Error("wallet not gated");

    let release = (): void => undefined;
    wallet.gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = h.session.lock(BASE);
    await expectCode(h.session.lock(USDC), "REENTRANT_CALL");

    wallet.gate = undefined;
    release();
    await first;

    expect(h.session.isLocked(BASE)).toBe(true);
    expect(h.session.isLocked(USDC)).toBe(false);
  });
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("close", () => {
  it("refuses new sessions and settlements once closed", async () => {
    const h = createHarness();
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);

    await h.session.close();

    expect(h.session.closed).toBe(true);
    await expectCode(h.session.lock(USDC), "POOL_STOPPED");
    await expectCode(h.session.finalize(BASE, 100n * E18, TRANSFER), "POOL_STOPPED");
    expect(h.pool.ledger.getVirtualSupply()).toBe(0n);
  });
});

// =============================================================================
// donate()
// =============================================================================

describe("donate", () => {
  it("locks on the sentinel amount and settles otherwise", async () => {
    const h = createHarness();

    const locked = await h.session.donate(BASE, 1n, TRANSFER);
    expect(locked.kind).toBe("locked");
    expect(h.session.isLocked(BASE)).toBe(true);

    h.wallet.credit(BASE, POOL, 100n * E18);
    const settled = await h.session.donate(BASE, 100n * E18, TRANSFER);
    expect(settled.kind).toBe("settled");
    expect(h.session.isLocked(BASE)).toBe(false);
  });
});

// =============================================================================
// Journal & logging
// =============================================================================

describe("journal", () => {
  it("records lock and settlement in the pool stream", async () => {
    const h = createHarness();
    await h.session.lock(BASE, "0x9999999999999999999999999999999999999999");
    h.wallet.credit(BASE, POOL, 100n * E18);
    await h.session.finalize(BASE, 100n * E18, TRANSFER);

    const events = h.eventStore.read(poolStreamId(POOL));
    expect(events.map((e) => e.event.type)).toEqual(["pool.donation.locked", "pool.tokens.received"]);

    const [lockedEvent, receivedEvent] = events;
    expect(lockedEvent?.event.metadata.actor).toBe("0x9999999999999999999999999999999999999999");
    expect(lockedEvent?.event.metadata.correlationId).toBe("id-1");
    expect(receivedEvent?.event.metadata.correlationId).toBe("id-1");
    expect(receivedEvent?.event.metadata.eventId).toBe("id-3");
    expect(receivedEvent?.event.payload).toEqual({
      pool: POOL,
      token: BASE,
      amount: "100000000000000000000",
      amountDelta: "100000000000000000000",
      opType: "transfer",
      unwrapped: false,
      syncMultiplier: 0,
      receivedValue: "100000000000000000000",
      virtualBalanceDelta: "0",
      virtualSupplyDelta: "100000000000000000000",
      navBefore: "1100000000000000000",
      navAfter: "1000000000000000000",
    });
    expect(h.eventStore.verifyIntegrity().valid).toBe(true);
  });

  it("logs settlements and rejections through pino", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "debug" }, { write: (line: string) => { lines.push(line); } });
    const h = createHarness({ logger });

    await h.session.lock(BASE);
    await expectCode(h.session.finalize(BASE, 100n * E18, TRANSFER), "CALLER_TRANSFER_AMOUNT");
    await h.session.lock(BASE);
    h.wallet.credit(BASE, POOL, 100n * E18);
    await h.session.finalize(BASE, 100n * E18, TRANSFER);

    const entries = lines.map((line): Record<string, unknown> => JSON.parse(line));
    expect(entries.map((e) => e.msg)).toEqual([
      "Donation session locked",
      "Donation rejected",
      "Donation session locked",
      "Donation settled",
    ]);
    expect(entries[1]).toMatchObject({
      level: 40,
      pool: POOL,
      code: "CALLER_TRANSFER_AMOUNT",
      lockedAt: "2026-01-01T00:00:00.000Z",
    });
    expect(entries[3]).toMatchObject({ level: 30, opType: "transfer", unitaryValue: "1000000000000000000" });
  });
});
