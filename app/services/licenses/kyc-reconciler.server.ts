/**
 * Store KYC derivation.
 *
 * A store's compliance status is never set directly; it is recomputed from
 * the statuses of all of its licenses after every license mutation.
 */

import type { ILicenseRepository } from "../../domain/license/license.repository";
import type { IStoreRepository } from "../../domain/store/store.repository";
import type { Store } from "../../domain/store/store.entity";
import {
  KYCStatus,
  LicenseStatus,
  type KYCStatusType,
  type LicenseStatusType,
} from "../../types/enums";
import { Errors, wrapDependency } from "../../utils/errors";
import { metrics } from "../../utils/logger.server";

/**
 * First match wins: any verified license, then expired without rejections,
 * then any rejection, otherwise pending verification.
 */
export function deriveStoreKycStatus(statuses: Iterable<LicenseStatusType>): KYCStatusType {
  let hasExpired = false;
  let hasRejected = false;
  for (const status of statuses) {
    if (status === LicenseStatus.VERIFIED) {
      return KYCStatus.VERIFIED;
    }
    if (status === LicenseStatus.EXPIRED) hasExpired = true;
    if (status === LicenseStatus.REJECTED) hasRejected = true;
  }
  if (hasExpired && !hasRejected) {
    return KYCStatus.EXPIRED;
  }
  if (hasRejected) {
    return KYCStatus.REJECTED;
  }
  return KYCStatus.PENDING_VERIFICATION;
}

export interface KycReconcileResult {
  previous: KYCStatusType;
  next: KYCStatusType;
  changed: boolean;
}

/**
 * The narrow capability license workflows depend on.
 */
export interface StoreKycReconciler<Tx> {
  reconcile(tx: Tx, storeId: string): Promise<KycReconcileResult>;
}

export interface KycReconcilerDeps<Tx> {
  licenses: Pick<ILicenseRepository<Tx>, "listStatusesByStore">;
  stores: Pick<IStoreRepository<Tx>, "findById" | "updateKycStatus">;
}

export class KycReconciler<Tx> implements StoreKycReconciler<Tx> {
  constructor(private readonly deps: KycReconcilerDeps<Tx>) {}

  async reconcile(tx: Tx, storeId: string): Promise<KycReconcileResult> {
    let statuses: LicenseStatusType[];
    try {
      statuses = await this.deps.licenses.listStatusesByStore(storeId, tx);
    } catch (error) {
      throw wrapDependency(error, "list license statuses");
    }
    const next = deriveStoreKycStatus(statuses);

    let store: Store | null;
    try {
      store = await this.deps.stores.findById(storeId, tx);
    } catch (error) {
      throw wrapDependency(error, "load store");
    }
    if (!store) {
      throw Errors.storeNotFound(storeId);
    }

    const changed = store.kycStatus !== next;
    if (changed) {
      try {
        await this.deps.stores.updateKycStatus(storeId, next, tx);
      } catch (error) {
        throw wrapDependency(error, "update store kyc status");
      }
    }
    metrics.kycReconciled({ storeId, previous: store.kycStatus, next, changed });
    return { previous: store.kycStatus, next, changed };
  }
}
