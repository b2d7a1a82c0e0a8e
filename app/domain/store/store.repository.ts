/**
 * Store and Membership Repository Interfaces
 */

import type { KYCStatusType, MemberRoleType } from "../../types/enums";
import type { Store } from "./store.entity";

export interface IStoreRepository<Tx> {
  findById(id: string, tx?: Tx): Promise<Store | null>;

  updateKycStatus(id: string, status: KYCStatusType, tx?: Tx): Promise<void>;

  updateSubscriptionActive(id: string, active: boolean, tx?: Tx): Promise<void>;
}

/**
 * Authorization check delegated to store membership data.
 */
export interface IMembershipRepository {
  userHasRole(userId: string, storeId: string, roles: readonly MemberRoleType[]): Promise<boolean>;
}
