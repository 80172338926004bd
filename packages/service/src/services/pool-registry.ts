/**
 * PoolRegistry — Maps pool addresses to isolated PoolService instances.
 *
 * Each pool gets its own account, ledger and session; every pool shares
 * the registry's wallet, price source and journal.
 */

import type { Address } from "@navsync/types";
import { normalizeAddress } from "@navsync/types";
import type { PoolAccountInit } from "@navsync/nav";
import { InMemoryEventStore } from "@navsync/event-store";
import type { EventStore } from "@navsync/event-store";
import { PoolService } from "./pool-service.js";
import type { PoolServiceConfig } from "./pool-service.js";

export type PoolDefaults = Omit<PoolServiceConfig, "pool">;

export class PoolRegistry {
  private readonly _pools = new Map<Address, PoolService>();
  private readonly _defaults: PoolDefaults;
  readonly eventStore: EventStore;

  constructor(defaults: PoolDefaults) {
    this.eventStore = defaults.eventStore ?? new InMemoryEventStore({ clock: defaults.clock });
    this._defaults = { ...defaults, eventStore: this.eventStore };
  }

  /**
   * Get or lazily create the service for a pool. `init` is only read
   * the first time a pool is seen.
   */
  getOrCreate(init: PoolAccountInit): PoolService {
    const key = normalizeAddress(init.address);
    let service = this._pools.get(key);
    if (service === undefined) {
      service = new PoolService({ ...this._defaults, pool: init });
      this._pools.set(key, service);
    }
    return service;
  }

  get(address: Address): PoolService | undefined {
    return this._pools.get(normalizeAddress(address));
  }

  has(address: Address): boolean {
    return this._pools.has(normalizeAddress(address));
  }

  poolAddresses(): readonly Address[] {
    return [...this._pools.keys()];
  }

  /**
   * Gracefully stop all pool services.
   */
  async stopAll(): Promise<void> {
    const stops = [...this._pools.values()].map((s) => s.stop());
    await Promise.all(stops);
    this._pools.clear();
  }
}
