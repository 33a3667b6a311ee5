/**
 * ConcordService — Composition root for the ledger engines.
 *
 * Route handlers delegate to this service; they never touch the runtime
 * or the engines directly. Every mutating method runs exactly one
 * atomic runtime call on behalf of `caller`.
 */

import type { Logger } from "pino";
import type { Address, Role } from "@concord/types";
import { Runtime } from "@concord/runtime";
import type { Clock } from "@concord/runtime";
import { InMemoryEventStore } from "@concord/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
} from "@concord/event-store";
import { AccessControlLedger } from "@concord/access-control";
import { RegistryEngine } from "@concord/registry";
import type { RegistryItem } from "@concord/registry";
import { AttestationEngine, FeeTreasury } from "@concord/attestation";
import type { Document } from "@concord/attestation";

// =============================================================================
// Configuration
// =============================================================================

export interface GenesisBalance {
  readonly account: Address;
  readonly amount: bigint;
}

export interface ConcordServiceConfig {
  /** Initial owner and first ADMIN */
  readonly owner: Address;
  /** Default: 0 */
  readonly storageFee?: bigint;
  /** Native value minted before the first call */
  readonly genesisBalances?: readonly GenesisBalance[];
  /** Default: SystemClock */
  readonly clock?: Clock;
  /** When set, every committed ledger event is logged at info */
  readonly logger?: Logger;
}

export interface TreasuryState {
  readonly account: Address;
  readonly storageFee: bigint;
  readonly balance: bigint;
}

export interface SignResult {
  readonly document: Document;
  readonly completed: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class ConcordService {
  readonly runtime: Runtime;
  readonly access: AccessControlLedger;
  readonly registry: RegistryEngine;
  readonly treasury: FeeTreasury;
  readonly attestation: AttestationEngine;

  constructor(config: ConcordServiceConfig) {
    const logger = config.logger;
    const eventStore = new InMemoryEventStore(
      logger !== undefined
        ? {
            onHandlerError: (err, stored) => {
              logger.error(
                { err, type: stored.event.type, position: stored.globalPosition },
                "Ledger event subscriber failed",
              );
            },
          }
        : {},
    );
    this.runtime = new Runtime({
      eventStore,
      ...(config.clock !== undefined ? { clock: config.clock } : {}),
    });

    if (logger !== undefined) {
      this.runtime.eventStore.subscribeAll((stored) => {
        logger.info(
          {
            type: stored.event.type,
            streamId: stored.streamId,
            position: stored.globalPosition,
            actor: stored.event.metadata.actor,
            correlationId: stored.event.metadata.correlationId,
          },
          "Ledger event committed",
        );
      });
    }

    for (const { account, amount } of config.genesisBalances ?? []) {
      this.runtime.bank.mint(account, amount);
    }

    this.access = new AccessControlLedger(this.runtime, config.owner);
    this.registry = new RegistryEngine(this.runtime, this.access);
    this.treasury = new FeeTreasury(this.runtime, this.access, {
      initialFee: config.storageFee ?? 0n,
    });
    this.attestation = new AttestationEngine(this.runtime, this.treasury);
  }

  // ─── Access ──────────────────────────────────────────────────────────

  owner(): Address {
    return this.access.owner;
  }

  rolesOf(account: Address): readonly Role[] {
    return this.access.rolesOf(account);
  }

  grantRole(caller: Address, account: Address, role: Role): void {
    this.runtime.execute(caller, (ctx) => this.access.grantRole(ctx, account, role));
  }

  revokeRole(caller: Address, account: Address, role: Role): void {
    this.runtime.execute(caller, (ctx) => this.access.revokeRole(ctx, account, role));
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.runtime.execute(caller, (ctx) => this.access.transferOwnership(ctx, newOwner));
  }

  // ─── Registry ────────────────────────────────────────────────────────

  registerItem(caller: Address, uri: string, category: string): RegistryItem {
    const id = this.runtime.execute(caller, (ctx) =>
      this.registry.registerItem(ctx, uri, category),
    );
    return this.registry.getItem(id);
  }

  moderateItem(caller: Address, id: number, verified: boolean, active: boolean): RegistryItem {
    this.runtime.execute(caller, (ctx) =>
      this.registry.moderateItem(ctx, id, verified, active),
    );
    return this.registry.getItem(id);
  }

  deactivateOwnItem(caller: Address, id: number): RegistryItem {
    this.runtime.execute(caller, (ctx) => this.registry.deactivateOwnItem(ctx, id));
    return this.registry.getItem(id);
  }

  getItem(id: number): RegistryItem {
    return this.registry.getItem(id);
  }

  getItemsOf(account: Address): readonly number[] {
    return this.registry.getItemsOf(account);
  }

  // ─── Attestation ─────────────────────────────────────────────────────

  createDocument(
    caller: Address,
    documentHash: string,
    requiredSigners: readonly Address[],
    value: bigint,
  ): Document {
    const id = this.runtime.execute(
      caller,
      (ctx) => this.attestation.createDocument(ctx, documentHash, requiredSigners),
      { value },
    );
    return this.attestation.getDocumentDetails(id);
  }

  signDocument(caller: Address, id: number): SignResult {
    const completed = this.runtime.execute(caller, (ctx) =>
      this.attestation.signDocument(ctx, id),
    );
    return { document: this.attestation.getDocumentDetails(id), completed };
  }

  revokeDocument(caller: Address, id: number): Document {
    this.runtime.execute(caller, (ctx) => this.attestation.revokeDocument(ctx, id));
    return this.attestation.getDocumentDetails(id);
  }

  getDocument(id: number): Document {
    return this.attestation.getDocumentDetails(id);
  }

  signerStatus(id: number, account: Address): { isRequiredSigner: boolean; hasSigned: boolean } {
    return {
      isRequiredSigner: this.attestation.isRequiredSigner(id, account),
      hasSigned: this.attestation.hasUserSigned(id, account),
    };
  }

  getUserDocuments(account: Address): readonly number[] {
    return this.attestation.getUserDocuments(account);
  }

  getSignerDocuments(account: Address): readonly number[] {
    return this.attestation.getSignerDocuments(account);
  }

  // ─── Treasury ────────────────────────────────────────────────────────

  treasuryState(): TreasuryState {
    return {
      account: this.treasury.account,
      storageFee: this.treasury.storageFee,
      balance: this.treasury.balance,
    };
  }

  setStorageFee(caller: Address, fee: bigint): TreasuryState {
    this.runtime.execute(caller, (ctx) => this.treasury.setStorageFee(ctx, fee));
    return this.treasuryState();
  }

  withdrawFees(caller: Address): bigint {
    return this.runtime.execute(caller, (ctx) => this.treasury.withdrawFees(ctx));
  }

  balanceOf(account: Address): bigint {
    return this.runtime.bank.balanceOf(account);
  }

  // ─── Events ──────────────────────────────────────────────────────────

  readEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.runtime.eventStore.readAll(options);
  }

  eventCount(): number {
    return this.runtime.eventStore.globalPosition();
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.runtime.eventStore.verifyIntegrity();
  }
}
