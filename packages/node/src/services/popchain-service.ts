/**
 * PopchainService: Composition root for the certificate stack.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service owns the host ledger, runs every
 * mint and transfer as one ledger transaction, and logs the outcome.
 */

import type { Logger } from "pino";
import { Ledger, normalizeAddress } from "@popchain/ledger";
import type { Clock, IdAllocator } from "@popchain/ledger";
import { createPopchainCatalog } from "@popchain/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@popchain/event-store";
import {
  defaultPopchainTiers,
  mintCertificate,
  transferCertificateToWallet,
} from "@popchain/certificates";
import { isCertificate } from "@popchain/types";
import type { Account, Address, CertificateNFT, Tier } from "@popchain/types";

// =============================================================================
// Configuration
// =============================================================================

export interface PopchainServiceConfig {
  /** Mint sender and escrow custodian */
  readonly serviceWallet: Address;
  readonly logger: Logger;
  /** Transaction clock; defaults to Date.now */
  readonly clock?: Clock | undefined;
  /** Certificate id source; defaults to random 32-byte ids */
  readonly idAllocator?: IdAllocator | undefined;
}

export interface MintInput {
  readonly eventId: string;
  readonly url: string;
  readonly accountId: string;
  readonly tier: Tier;
}

/** A certificate together with the address currently holding it. */
export interface CertificateView extends CertificateNFT {
  readonly custodian: Address;
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "INTERNAL_ERROR";
}

// =============================================================================
// Service
// =============================================================================

export class PopchainService {
  readonly ledger: Ledger;
  readonly serviceWallet: Address;
  private readonly logger: Logger;

  constructor(config: PopchainServiceConfig) {
    this.serviceWallet = normalizeAddress(config.serviceWallet);
    this.logger = config.logger.child({ component: "popchain-service" });
    this.ledger = new Ledger({
      clock: config.clock,
      idAllocator: config.idAllocator,
      catalog: createPopchainCatalog(),
    });
  }

  // ─── Tiers ──────────────────────────────────────────────────────────

  defaultTiers(): readonly Tier[] {
    return defaultPopchainTiers();
  }

  // ─── Accounts ───────────────────────────────────────────────────────

  registerAccount(id: string, owner: string | null): Account {
    const account = this.ledger.registerAccount(id, owner);
    this.logger.info({ accountId: id, owner: account.owner }, "Account registered");
    return account;
  }

  linkWallet(id: string, owner: string): Account {
    const account = this.ledger.linkWallet(id, owner);
    this.logger.info({ accountId: id, owner: account.owner }, "Wallet linked");
    return account;
  }

  getAccount(id: string): Account | undefined {
    return this.ledger.getAccount(id);
  }

  // ─── Certificates ───────────────────────────────────────────────────

  /**
   * Mint a certificate, signed by the service wallet.
   */
  mint(input: MintInput): CertificateView {
    let id: string;
    try {
      id = this.ledger.transact(this.serviceWallet, (tx) =>
        mintCertificate(tx, { ...input, serviceWallet: this.serviceWallet }),
      );
    } catch (err) {
      this.logger.warn(
        { accountId: input.accountId, eventId: input.eventId, code: errorCode(err) },
        "Mint rejected",
      );
      throw err;
    }

    const view = this.requireCertificate(id);
    this.logger.info(
      {
        certificateId: id,
        accountId: input.accountId,
        eventId: input.eventId,
        tierName: view.tierName,
        custodian: view.custodian,
        escrowed: view.issuedTo === null,
      },
      "Certificate minted",
    );
    return view;
  }

  /**
   * Release a certificate to the account's linked wallet.
   * `sender` must hold the certificate; it defaults to the service wallet.
   */
  transfer(certificateId: string, accountId: string, sender?: string): CertificateView {
    const from = sender ?? this.serviceWallet;
    try {
      this.ledger.transact(from, (tx) =>
        transferCertificateToWallet(tx, accountId, certificateId),
      );
    } catch (err) {
      this.logger.warn(
        { certificateId, accountId, sender: from, code: errorCode(err) },
        "Transfer rejected",
      );
      throw err;
    }

    const view = this.requireCertificate(certificateId);
    this.logger.info(
      { certificateId, accountId, recipient: view.custodian },
      "Certificate transferred to wallet",
    );
    return view;
  }

  getCertificate(id: string): CertificateView | undefined {
    const certificate = this.ledger.getObject(id, isCertificate);
    const custodian = this.ledger.custodianOf(id);
    if (certificate === undefined || custodian === undefined) {
      return undefined;
    }
    return { ...certificate, custodian };
  }

  private requireCertificate(id: string): CertificateView {
    const view = this.getCertificate(id);
    if (view === undefined) {
      throw new Error(`Certificate "${id}" missing after commit`);
    }
    return view;
  }

  // ─── Audit Log ──────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.ledger.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.ledger.eventStore.read(streamId, options);
  }

  /** Global position of the newest audit event, 0 when there are none. */
  eventPosition(): number {
    return this.ledger.eventStore.globalPosition();
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.ledger.eventStore.verifyIntegrity();
  }
}
