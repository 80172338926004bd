/**
 * ReconciliationSession — two-phase donation protocol for one pool.
 *
 *   lock(token)                     snapshot balance + NAV, open session
 *   (bridge transfers tokens in)
 *   finalize(token, amount, params) verify, neutralize, re-verify, settle
 *
 * Rules:
 * - One open session per token; finalize always releases it
 * - Any failure after the pool checkpoint restores the pool
 * - NAV must match the declared handler outcome exactly
 * - One call at a time per pool (ReentrancyGuard)
 *
 * Usage:
 *   const session = new ReconciliationSession({ pool, wallet, converter, crossChainTokens });
 *   await session.donate(USDC, 1n, params);
 *   await session.donate(USDC, amount, params);
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { Address, DestinationMessageParams, EventMetadata, OpType } from "@navsync/types";
import { NATIVE_TOKEN, isOpType, isSyncMultiplier, normalizeAddress } from "@navsync/types";
import { minBigInt, mulDiv, pow10 } from "@navsync/ledger";
import { NavEngine, TokenRegistry } from "@navsync/nav";
import type {
  ApplicationAggregator,
  NavComponents,
  PoolAccount,
  ValueConverter,
  WalletLedger,
} from "@navsync/nav";
import { POOL_EVENTS, createPoolEvent, poolStreamId } from "@navsync/event-store";
import type { EventStore } from "@navsync/event-store";
import { DonationLocks } from "./donation-locks.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import { SyncModeHandler } from "./sync-mode-handler.js";
import { TransferModeHandler } from "./transfer-mode-handler.js";
import type {
  DonationReceipt,
  DonationResult,
  DonationSnapshot,
  ModeHandler,
} from "./types.js";
import { ReconciliationError } from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

/** Amount that opens a session instead of settling one. */
export const LOCK_SENTINEL = 1n;

const SYSTEM_ACTOR = "reconciler";

export interface ReconciliationSessionOptions {
  readonly pool: PoolAccount;
  readonly wallet: WalletLedger;
  readonly converter: ValueConverter;
  readonly applications?: ApplicationAggregator;
  /** Tokens accepted from the bridge */
  readonly crossChainTokens: Iterable<Address>;
  /** Wrapped native token; required for shouldUnwrapNative to take effect */
  readonly wrappedNative?: Address;
  readonly maxActiveTokens?: number;
  /** Journal for lock and settlement events */
  readonly eventStore?: EventStore;
  readonly logger?: Logger;
  readonly clock?: () => Date;
  readonly idGenerator?: () => string;
}

// =============================================================================
// Session
// =============================================================================

export class ReconciliationSession {
  readonly pool: PoolAccount;
  readonly engine: NavEngine;
  readonly registry: TokenRegistry;

  private readonly wallet: WalletLedger;
  private readonly crossChainTokens: ReadonlySet<Address>;
  private readonly wrappedNative: Address | undefined;
  private readonly eventStore: EventStore | undefined;
  private readonly log: Logger;
  private readonly clock: () => Date;
  private readonly newId: () => string;

  private readonly guard = new ReentrancyGuard();
  private readonly locks = new DonationLocks();
  private readonly transferHandler = new TransferModeHandler();
  private readonly syncHandler = new SyncModeHandler();

  /** Value settled by all finalized sessions. */
  private _settledValue = 0n;

  constructor(options: ReconciliationSessionOptions) {
    this.pool = options.pool;
    this.wallet = options.wallet;
    this.engine = new NavEngine({
      balances: options.wallet,
      converter: options.converter,
      applications: options.applications,
    });
    this.registry = new TokenRegistry(options.pool, options.converter, {
      maxActiveTokens: options.maxActiveTokens,
    });
    this.crossChainTokens = new Set([...options.crossChainTokens].map(normalizeAddress));
    this.wrappedNative =
      options.wrappedNative !== undefined ? normalizeAddress(options.wrappedNative) : undefined;
    this.eventStore = options.eventStore;
    this.log = (options.logger ?? pino({ level: "silent" })).child({
      pool: options.pool.address,
    });
    this.clock = options.clock ?? (() => new Date());
    this.newId = options.idGenerator ?? randomUUID;
  }

  // ─── Queries ────────────────────────────────────────────────────────

  isLocked(token: Address): boolean {
    return this.locks.isLocked(token);
  }

  getSnapshot(token: Address): DonationSnapshot | undefined {
    return this.locks.get(token);
  }

  get settledValue(): bigint {
    return this._settledValue;
  }

  get closed(): boolean {
    return this.guard.closed;
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Stop accepting lock and finalize calls. Resolves once the call in
   * flight, if any, has settled.
   */
  close(): Promise<void> {
    return this.guard.close();
  }

  // ─── Entry Points ───────────────────────────────────────────────────

  /**
   * Bridge entry point: the sentinel amount locks, anything else finalizes.
   */
  async donate(
    token: Address,
    amount: bigint,
    params: DestinationMessageParams,
    caller: string = SYSTEM_ACTOR,
  ): Promise<DonationResult> {
    if (amount === LOCK_SENTINEL) {
      return { kind: "locked", snapshot: await this.lock(token, caller) };
    }
    return { kind: "settled", receipt: await this.finalize(token, amount, params, caller) };
  }

  /**
   * Open a session for `token`. Moves no value.
   */
  async lock(token: Address, caller: string = SYSTEM_ACTOR): Promise<DonationSnapshot> {
    return this.guard.run(async () => {
      const key = normalizeAddress(token);
      if (this.locks.isLocked(key)) {
        throw new ReconciliationError("DONATION_LOCK", `Donation session already open for ${key}`, {
          token: key,
        });
      }
      this.requireInitialized();

      const [storedBalance, nav, preDelivered] = await Promise.all([
        this.wallet.balanceOf(key, this.pool.address),
        this.engine.compute(this.pool),
        this.deliveredToOpenSessions(),
      ]);

      const snapshot: DonationSnapshot = {
        token: key,
        storedBalance,
        storedNav: nav.unitaryValue > 0n ? nav.unitaryValue : this.pool.unitaryValue,
        storedAssets: nav.grossAssetValue,
        correlationId: this.newId(),
        lockedAt: this.clock().toISOString(),
      };

      const event = createPoolEvent(
        POOL_EVENTS.DONATION_LOCKED,
        {
          pool: this.pool.address,
          token: key,
          storedBalance: storedBalance.toString(),
          storedNav: snapshot.storedNav.toString(),
        },
        this.metadata(caller, snapshot.correlationId),
      );

      this.locks.open(snapshot, preDelivered);
      this.eventStore?.append(poolStreamId(this.pool.address), [event]);

      this.log.debug(
        { token: key, storedBalance: storedBalance.toString(), storedNav: snapshot.storedNav.toString() },
        "Donation session locked",
      );
      return snapshot;
    });
  }

  /**
   * Settle the open session for `token`. The session is released on
   * every path.
   */
  async finalize(
    token: Address,
    amount: bigint,
    params: DestinationMessageParams,
    caller: string = SYSTEM_ACTOR,
  ): Promise<DonationReceipt> {
    return this.guard.run(async () => {
      const key = normalizeAddress(token);
      const snapshot = this.locks.get(key);
      if (snapshot === undefined) {
        throw new ReconciliationError("DONATION_LOCK", `No donation session open for ${key}`, {
          token: key,
        });
      }

      try {
        return await this.settle(snapshot, amount, params, caller);
      } catch (err) {
        this.log.warn(
          {
            token: key,
            amount: amount.toString(),
            lockedAt: snapshot.lockedAt,
            code: errorCode(err),
            err,
          },
          "Donation rejected",
        );
        throw err;
      } finally {
        this.locks.release(key);
      }
    });
  }

  // ─── Settlement ─────────────────────────────────────────────────────

  private async settle(
    snapshot: DonationSnapshot,
    amount: bigint,
    params: DestinationMessageParams,
    caller: string,
  ): Promise<DonationReceipt> {
    this.requireInitialized();
    validateRequest(amount, params);

    const pool = this.pool;
    const balance = await this.wallet.balanceOf(snapshot.token, pool.address);
    if (balance < snapshot.storedBalance) {
      throw new ReconciliationError("BALANCE_UNDERFLOW", "Token balance fell since lock", {
        token: snapshot.token,
        storedBalance: snapshot.storedBalance.toString(),
        balance: balance.toString(),
      });
    }

    const amountDelta = balance - snapshot.storedBalance;
    if (amountDelta < amount) {
      throw new ReconciliationError(
        "CALLER_TRANSFER_AMOUNT",
        "Received less than the declared amount",
        { token: snapshot.token, amount: amount.toString(), amountDelta: amountDelta.toString() },
      );
    }

    if (!this.crossChainTokens.has(snapshot.token)) {
      throw new ReconciliationError(
        "UNSUPPORTED_CROSSCHAIN_TOKEN",
        `Token ${snapshot.token} is not accepted from the bridge`,
        { token: snapshot.token },
      );
    }

    const checkpoint = pool.checkpoint();
    try {
      return await this.apply(snapshot, amount, amountDelta, balance, params, caller);
    } catch (err) {
      pool.restore(checkpoint);
      throw err;
    }
  }

  private async apply(
    snapshot: DonationSnapshot,
    amount: bigint,
    amountDelta: bigint,
    balance: bigint,
    params: DestinationMessageParams,
    caller: string,
  ): Promise<DonationReceipt> {
    const pool = this.pool;

    let creditedToken = snapshot.token;
    let unwrapped = false;
    if (params.shouldUnwrapNative && snapshot.token === this.wrappedNative) {
      await this.wallet.unwrapNative(pool.address, amountDelta);
      creditedToken = NATIVE_TOKEN;
      unwrapped = true;
    }

    const wasActive = await this.registry.addIfNew(creditedToken);
    const balanceAfter = unwrapped
      ? await this.wallet.balanceOf(creditedToken, pool.address)
      : balance;

    const receivedValue = await this.receivedValue(creditedToken, balanceAfter, amountDelta, wasActive);
    const amountInBase = minBigInt(
      await this.engine.valueInBase(pool, creditedToken, amount),
      receivedValue,
    );

    // Everything the gross value gained since lock must be accounted for.
    const navBefore = await this.engine.compute(pool);
    const expectedAssets =
      snapshot.storedAssets + this.locks.settledSinceLock(snapshot.token) + receivedValue;
    if (navBefore.grossAssetValue !== expectedAssets) {
      throw new ReconciliationError(
        "NAV_MANIPULATION_DETECTED",
        "Assets changed by more than the received value",
        {
          token: creditedToken,
          expectedAssets: expectedAssets.toString(),
          actualAssets: navBefore.grossAssetValue.toString(),
        },
      );
    }

    const outcome = this.handlerFor(params.opType).apply({
      ledger: pool.ledger,
      baseToken: pool.baseToken,
      decimals: pool.decimals,
      amountInBase,
      receivedValue,
      storedNav: snapshot.storedNav,
      syncMultiplier: params.syncMultiplier,
    });

    const navAfter = await this.engine.compute(pool);
    this.verifyOutcome(navBefore, navAfter, outcome.virtualBalanceDelta, outcome.virtualSupplyDelta);

    if (navAfter.unitaryValue > 0n) {
      pool.recordUnitaryValue(navAfter.unitaryValue);
    }

    const receipt: DonationReceipt = {
      pool: pool.address,
      token: snapshot.token,
      creditedToken,
      amount,
      amountDelta,
      opType: params.opType,
      unwrapped,
      activated: !wasActive,
      receivedValue,
      amountInBase,
      outcome,
      navBefore,
      navAfter,
      correlationId: snapshot.correlationId,
    };

    this.journal(receipt, params.syncMultiplier, caller);
    this.locks.recordSettlement(snapshot.token, receivedValue);
    this._settledValue += receivedValue;

    this.log.info(
      {
        token: creditedToken,
        opType: params.opType,
        amount: amount.toString(),
        receivedValue: receivedValue.toString(),
        virtualBalanceDelta: outcome.virtualBalanceDelta.toString(),
        virtualSupplyDelta: outcome.virtualSupplyDelta.toString(),
        unitaryValue: navAfter.unitaryValue.toString(),
      },
      "Donation settled",
    );
    return receipt;
  }

  /**
   * Gross value each open session's token has gained since that session
   * locked.
   */
  private async deliveredToOpenSessions(): Promise<Map<Address, bigint>> {
    const delivered = new Map<Address, bigint>();
    for (const open of this.locks.openSessions()) {
      const balance = await this.wallet.balanceOf(open.token, this.pool.address);
      const gained =
        (await this.heldValue(open.token, balance)) -
        (await this.heldValue(open.token, open.storedBalance));
      delivered.set(open.token, gained);
    }
    return delivered;
  }

  /** Base-unit value `balance` of `token` contributes to gross assets. */
  private async heldValue(token: Address, balance: bigint): Promise<bigint> {
    if (token !== this.pool.baseToken && !this.pool.isActive(token)) {
      return 0n;
    }
    return this.engine.valueInBase(this.pool, token, balance);
  }

  /**
   * Base-unit value the credited balance added to gross assets.
   * Active tokens are valued at the margin so that conversion rounding
   * matches what the NAV engine sees.
   */
  private async receivedValue(
    token: Address,
    balanceAfter: bigint,
    amountDelta: bigint,
    wasActive: boolean,
  ): Promise<bigint> {
    if (token === this.pool.baseToken) {
      return amountDelta;
    }
    const after = await this.engine.valueInBase(this.pool, token, balanceAfter);
    if (!wasActive) {
      return after;
    }
    const before = await this.engine.valueInBase(this.pool, token, balanceAfter - amountDelta);
    return after - before;
  }

  private verifyOutcome(
    navBefore: NavComponents,
    navAfter: NavComponents,
    virtualBalanceDelta: bigint,
    virtualSupplyDelta: bigint,
  ): void {
    const expectedNet = navBefore.netTotalValue + virtualBalanceDelta;
    const expectedSupply = navBefore.effectiveSupply + virtualSupplyDelta;
    const expectedUnitary =
      expectedSupply > 0n
        ? mulDiv(expectedNet, pow10(this.pool.decimals), expectedSupply)
        : this.pool.unitaryValue;

    if (
      navAfter.netTotalValue !== expectedNet ||
      navAfter.effectiveSupply !== expectedSupply ||
      navAfter.unitaryValue !== expectedUnitary
    ) {
      throw new ReconciliationError(
        "NAV_MANIPULATION_DETECTED",
        "NAV after neutralization does not match the declared outcome",
        {
          expectedNet: expectedNet.toString(),
          actualNet: navAfter.netTotalValue.toString(),
          expectedSupply: expectedSupply.toString(),
          actualSupply: navAfter.effectiveSupply.toString(),
          expectedUnitary: expectedUnitary.toString(),
          actualUnitary: navAfter.unitaryValue.toString(),
        },
      );
    }
  }

  private handlerFor(opType: OpType): ModeHandler {
    switch (opType) {
      case "transfer":
        return this.transferHandler;
      case "sync":
        return this.syncHandler;
      default: {
        const unreachable: never = opType;
        throw new ReconciliationError("INVALID_OP_TYPE", `Unknown op type: ${String(unreachable)}`);
      }
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private requireInitialized(): void {
    if (!this.pool.isInitialized) {
      throw new ReconciliationError("TOKEN_NOT_INITIALIZED", "Pool has no unitary value yet", {
        pool: this.pool.address,
      });
    }
  }

  private metadata(caller: string, correlationId: string): EventMetadata {
    return {
      eventId: this.newId(),
      timestamp: this.clock().toISOString(),
      actor: caller,
      correlationId,
      source: "reconciler",
    };
  }

  private journal(receipt: DonationReceipt, syncMultiplier: number, caller: string): void {
    if (this.eventStore === undefined) return;
    const event = createPoolEvent(
      POOL_EVENTS.TOKENS_RECEIVED,
      {
        pool: receipt.pool,
        token: receipt.creditedToken,
        amount: receipt.amount.toString(),
        amountDelta: receipt.amountDelta.toString(),
        opType: receipt.opType,
        unwrapped: receipt.unwrapped,
        syncMultiplier,
        receivedValue: receipt.receivedValue.toString(),
        virtualBalanceDelta: receipt.outcome.virtualBalanceDelta.toString(),
        virtualSupplyDelta: receipt.outcome.virtualSupplyDelta.toString(),
        navBefore: receipt.navBefore.unitaryValue.toString(),
        navAfter: receipt.navAfter.unitaryValue.toString(),
      },
      this.metadata(caller, receipt.correlationId),
    );
    this.eventStore.append(poolStreamId(receipt.pool), [event]);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function validateRequest(amount: bigint, params: DestinationMessageParams): void {
  if (amount <= LOCK_SENTINEL) {
    throw new ReconciliationError("INVALID_AMOUNT", `Amount must exceed ${LOCK_SENTINEL.toString()}`, {
      amount: amount.toString(),
    });
  }
  if (!isOpType(params.opType)) {
    throw new ReconciliationError("INVALID_OP_TYPE", `Unknown op type: ${String(params.opType)}`);
  }
  if (!isSyncMultiplier(params.syncMultiplier)) {
    throw new ReconciliationError(
      "INVALID_SYNC_MULTIPLIER",
      `Sync multiplier must be an integer in [0, 10000], got ${String(params.syncMultiplier)}`,
    );
  }
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
