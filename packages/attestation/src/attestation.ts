/**
 * AttestationEngine — multi-party document attestation.
 *
 * A creator pays the storage fee and names the identities that must
 * sign. Each named identity signs once; the signature that completes
 * the set marks the document completed in the same call. Until then the
 * creator may revoke it. Revoked and completed are both terminal.
 *
 *   Created(active) ──sign*──► Completed
 *        │
 *        └──revoke (creator, pre-completion)──► Revoked
 *
 * createDocument collects value from the caller, which runs the
 * caller's transfer hook; it is guarded against re-entry.
 */

import type { Address } from "@concord/types";
import { isAccount } from "@concord/types";
import { documentStream } from "@concord/event-store";
import {
  AccountIndex,
  JournaledMap,
  LedgerError,
  ReentrancyGuard,
  Sequence,
} from "@concord/runtime";
import type { CallContext, Runtime } from "@concord/runtime";
import type { FeeTreasury } from "./treasury.js";
import type { Document } from "./types.js";

export class AttestationEngine {
  private readonly _ids: Sequence;
  private readonly _documents: JournaledMap<number, Document>;
  private readonly _byCreator: AccountIndex;
  private readonly _bySigner: AccountIndex;
  private readonly _createGuard = new ReentrancyGuard("createDocument");

  constructor(
    runtime: Runtime,
    private readonly treasury: FeeTreasury,
  ) {
    this._ids = new Sequence(runtime.journal, 1);
    this._documents = new JournaledMap(runtime.journal);
    this._byCreator = new AccountIndex(runtime.journal);
    this._bySigner = new AccountIndex(runtime.journal);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a document requiring a signature from every listed signer.
   *
   * The value attached to the call must cover the storage fee; all of it
   * goes to the treasury. Repeated signers are kept once, at their first
   * position.
   *
   * @returns The new document's id
   * @throws LedgerError INVALID_ACCOUNT, INSUFFICIENT_FEE, EMPTY_DOCUMENT_HASH,
   *   EMPTY_SIGNER_LIST, INVALID_SIGNER, REENTRANT_CALL or a transfer failure
   */
  createDocument(
    ctx: CallContext,
    documentHash: string,
    requiredSigners: readonly Address[],
  ): number {
    return this._createGuard.enter(() => {
      if (!isAccount(ctx.caller)) {
        throw new LedgerError(
          "INVALID_ACCOUNT",
          `Reserved account '${ctx.caller}' cannot create documents`,
        );
      }
      const fee = this.treasury.storageFee;
      if (ctx.value < fee) {
        throw new LedgerError(
          "INSUFFICIENT_FEE",
          `Attached value ${ctx.value} is below the storage fee ${fee}`,
        );
      }
      if (documentHash.length === 0) {
        throw new LedgerError("EMPTY_DOCUMENT_HASH", "Document hash must not be empty");
      }
      if (requiredSigners.length === 0) {
        throw new LedgerError("EMPTY_SIGNER_LIST", "At least one signer is required");
      }
      const invalid = requiredSigners.find((signer) => !isAccount(signer));
      if (invalid !== undefined) {
        throw new LedgerError("INVALID_SIGNER", `Invalid signer '${invalid}'`);
      }
      const signers = [...new Set(requiredSigners)];

      this.treasury.deposit(ctx);

      const documentId = this._ids.next();
      this._documents.set(documentId, {
        id: documentId,
        documentHash,
        creator: ctx.caller,
        createdAt: ctx.timestamp,
        requiredSigners: signers,
        signatures: [],
        signatureCount: 0,
        isActive: true,
        isCompleted: false,
      });
      this._byCreator.append(ctx.caller, documentId);
      for (const signer of signers) {
        this._bySigner.append(signer, documentId);
      }

      ctx.emit(documentStream(documentId), "attestation.document.created", {
        documentId,
        creator: ctx.caller,
        documentHash,
      });
      return documentId;
    });
  }

  /**
   * Record the caller's signature. Completes the document when the last
   * required signer signs.
   *
   * @returns Whether this signature completed the document
   * @throws LedgerError DOCUMENT_NOT_FOUND, DOCUMENT_INACTIVE,
   *   ALREADY_COMPLETED, ALREADY_SIGNED or NOT_REQUIRED_SIGNER
   */
  signDocument(ctx: CallContext, documentId: number): boolean {
    const doc = this._require(documentId);
    if (!doc.isActive) {
      throw new LedgerError("DOCUMENT_INACTIVE", `Document ${documentId} has been revoked`);
    }
    if (doc.isCompleted) {
      throw new LedgerError("ALREADY_COMPLETED", `Document ${documentId} is already completed`);
    }
    if (doc.signatures.includes(ctx.caller)) {
      throw new LedgerError(
        "ALREADY_SIGNED",
        `'${ctx.caller}' has already signed document ${documentId}`,
      );
    }
    if (!doc.requiredSigners.includes(ctx.caller)) {
      throw new LedgerError(
        "NOT_REQUIRED_SIGNER",
        `'${ctx.caller}' is not a required signer of document ${documentId}`,
      );
    }

    const signatureCount = doc.signatureCount + 1;
    const isCompleted = signatureCount === doc.requiredSigners.length;
    this._documents.set(documentId, {
      ...doc,
      signatures: [...doc.signatures, ctx.caller],
      signatureCount,
      isCompleted,
    });

    const stream = documentStream(documentId);
    ctx.emit(stream, "attestation.document.signed", { documentId, signer: ctx.caller });
    if (isCompleted) {
      ctx.emit(stream, "attestation.document.completed", { documentId });
    }
    return isCompleted;
  }

  /**
   * Withdraw a document before completion. The fee is not refunded.
   *
   * @throws LedgerError DOCUMENT_NOT_FOUND, NOT_CREATOR, ALREADY_INACTIVE
   *   or ALREADY_COMPLETED
   */
  revokeDocument(ctx: CallContext, documentId: number): void {
    const doc = this._require(documentId);
    if (doc.creator !== ctx.caller) {
      throw new LedgerError(
        "NOT_CREATOR",
        `Caller '${ctx.caller}' did not create document ${documentId}`,
      );
    }
    if (!doc.isActive) {
      throw new LedgerError("ALREADY_INACTIVE", `Document ${documentId} is already revoked`);
    }
    if (doc.isCompleted) {
      throw new LedgerError("ALREADY_COMPLETED", `Document ${documentId} is already completed`);
    }

    this._documents.set(documentId, { ...doc, isActive: false });
    ctx.emit(documentStream(documentId), "attestation.document.revoked", { documentId });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** @throws LedgerError DOCUMENT_NOT_FOUND */
  hasUserSigned(documentId: number, account: Address): boolean {
    return this._require(documentId).signatures.includes(account);
  }

  /** @throws LedgerError DOCUMENT_NOT_FOUND */
  isRequiredSigner(documentId: number, account: Address): boolean {
    return this._require(documentId).requiredSigners.includes(account);
  }

  /** @throws LedgerError DOCUMENT_NOT_FOUND */
  getDocumentDetails(documentId: number): Document {
    return this._require(documentId);
  }

  /** Ids of documents created by `account`. */
  getUserDocuments(account: Address): readonly number[] {
    return this._byCreator.list(account);
  }

  /** Ids of documents naming `account` as a required signer. */
  getSignerDocuments(account: Address): readonly number[] {
    return this._bySigner.list(account);
  }

  get documentCount(): number {
    return this._ids.allocated;
  }

  private _require(documentId: number): Document {
    const doc = this._documents.get(documentId);
    if (doc === undefined) {
      throw new LedgerError("DOCUMENT_NOT_FOUND", `Document ${documentId} does not exist`);
    }
    return doc;
  }
}
