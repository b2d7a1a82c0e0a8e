/**
 * Store Domain Entity
 *
 * The compliance and billing view of a vendor store. `kycStatus` is derived
 * from the store's licenses and `subscriptionActive` from its synced
 * subscription; callers never set either directly.
 */

import type { KYCStatusType, MemberRoleType } from "../../types/enums";

export interface Store {
  readonly id: string;
  readonly companyName: string;
  readonly kycStatus: KYCStatusType;
  readonly subscriptionActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface StoreMembership {
  readonly storeId: string;
  readonly userId: string;
  readonly role: MemberRoleType;
}
