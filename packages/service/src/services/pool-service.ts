/**
 * PoolService — Composition root for one destination pool.
 *
 * Wires a PoolAccount to its reconciliation session, its NAV view and
 * its bridge entry point. Callers go through this service; they never
 * assemble the domain packages themselves.
 */

import type { Logger } from "pino";
import type { Address, NavData } from "@navsync/types";
import { NavEngine, NavView, PoolAccount } from "@navsync/nav";
import type {
  ApplicationAggregator,
  BalanceReader,
  PoolAccountInit,
  ValueConverter,
  WalletLedger,
} from "@navsync/nav";
import { ReconciliationSession } from "@navsync/reconciler";
import { AcrossHandler } from "@navsync/across";
import { InMemoryEventStore, poolStreamId } from "@navsync/event-store";
import type {
  EventStore,
  EventStoreIntegrityResult,
  HashedStoredEvent,
  ReadOptions,
} from "@navsync/event-store";

// =============================================================================
// Configuration
// =============================================================================

export interface PoolServiceConfig {
  readonly pool: PoolAccountInit;
  readonly wallet: WalletLedger;
  readonly converter: ValueConverter;
  readonly applications?: ApplicationAggregator;
  /** Balances behind the NAV view, e.g. a live chain reader; defaults to the wallet */
  readonly balanceReader?: BalanceReader;
  readonly crossChainTokens: readonly Address[];
  readonly spokePool: Address;
  readonly wrappedNative?: Address;
  readonly maxActiveTokens?: number;
  /** Shared journal; a private in-memory store is created when absent */
  readonly eventStore?: EventStore;
  readonly logger?: Logger;
  readonly clock?: () => Date;
}

// =============================================================================
// Service
// =============================================================================

export class PoolService {
  readonly pool: PoolAccount;
  readonly session: ReconciliationSession;
  readonly navView: NavView;
  readonly across: AcrossHandler;
  readonly eventStore: EventStore;

  constructor(config: PoolServiceConfig) {
    const clock = config.clock ?? (() => new Date());

    this.pool = new PoolAccount(config.pool);
    this.eventStore = config.eventStore ?? new InMemoryEventStore({ clock });
    this.session = new ReconciliationSession({
      pool: this.pool,
      wallet: config.wallet,
      converter: config.converter,
      applications: config.applications,
      crossChainTokens: config.crossChainTokens,
      wrappedNative: config.wrappedNative,
      maxActiveTokens: config.maxActiveTokens,
      eventStore: this.eventStore,
      logger: config.logger,
      clock,
    });
    const viewEngine =
      config.balanceReader !== undefined
        ? new NavEngine({
            balances: config.balanceReader,
            converter: config.converter,
            applications: config.applications,
          })
        : this.session.engine;
    this.navView = new NavView(this.pool, viewEngine, {
      clock: () => clock().getTime(),
    });
    this.across = new AcrossHandler(config.spokePool, this.session);
  }

  get address(): Address {
    return this.pool.address;
  }

  // ─── Queries ───────────────────────────────────────────────────────

  getNavData(): Promise<NavData> {
    return this.navView.getNavData();
  }

  /**
   * Lock and settlement events of this pool, oldest first.
   */
  getEvents(options?: ReadOptions): readonly HashedStoredEvent[] {
    return this.eventStore.read(poolStreamId(this.pool.address), options);
  }

  checkIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Lifecycle ─────────────────────────────────────────────────────

  get stopped(): boolean {
    return this.session.closed;
  }

  /**
   * Refuse further lock and finalize calls, whether they come through the
   * bridge handler or the session, and wait for the one in flight.
   */
  stop(): Promise<void> {
    return this.session.close();
  }
}
