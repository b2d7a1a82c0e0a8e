/**
 * License Repository Interface
 *
 * Every method accepts an optional transaction handle. Without one the call
 * runs on the ambient connection; with one it joins that transaction.
 */

import type { LicenseStatusType, LicenseTypeValue } from "../../types/enums";
import type { License } from "./license.entity";

export interface CreateLicenseData {
  storeId: string;
  userId: string;
  status: LicenseStatusType;
  mediaId: string;
  storageKey: string;
  issuingState: string;
  issueDate: Date | null;
  expirationDate: Date | null;
  type: LicenseTypeValue;
  number: string;
}

/**
 * Keyset position for createdAt desc, id desc ordering.
 */
export interface LicenseCursor {
  createdAt: Date;
  id: string;
}

export interface ListLicensesQuery {
  storeId: string;
  limit: number;
  cursor?: LicenseCursor;
}

export interface ILicenseRepository<Tx> {
  create(data: CreateLicenseData, tx?: Tx): Promise<License>;

  findById(id: string, tx?: Tx): Promise<License | null>;

  /**
   * Reads the row under a write lock held until the transaction ends.
   */
  findByIdForUpdate(id: string, tx: Tx): Promise<License | null>;

  updateStatus(id: string, status: LicenseStatusType, tx?: Tx): Promise<void>;

  delete(id: string, tx?: Tx): Promise<void>;

  listStatusesByStore(storeId: string, tx?: Tx): Promise<LicenseStatusType[]>;

  countByStoreAndStatus(storeId: string, status: LicenseStatusType, tx?: Tx): Promise<number>;

  /** Returns up to `limit` rows ordered by createdAt desc, id desc. */
  listByStore(query: ListLicensesQuery, tx?: Tx): Promise<License[]>;

  /** Verified licenses expiring in [from, to). */
  findExpiringBetween(from: Date, to: Date, tx?: Tx): Promise<License[]>;

  /** Pending or verified licenses whose expiration is on or before `cutoff`. */
  findExpirationCandidates(cutoff: Date, tx?: Tx): Promise<License[]>;

  /** Expired licenses last updated before `cutoff`. */
  findExpiredBefore(cutoff: Date, tx?: Tx): Promise<License[]>;
}
