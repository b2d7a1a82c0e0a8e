/**
 * Subscription Domain Entity
 *
 * Local mirror of a payment provider subscription. At most one row exists per
 * external subscription id, and that id always belongs to one store.
 */

import { SubscriptionStatus, type SubscriptionStatusType } from "../../types/enums";

export interface Subscription {
  readonly id: string;
  readonly storeId: string;
  readonly externalSubscriptionId: string;
  readonly status: SubscriptionStatusType;
  readonly priceId: string | null;
  readonly customerId: string | null;
  readonly paymentMethodId: string | null;
  readonly currentPeriodStart: Date | null;
  readonly currentPeriodEnd: Date | null;
  readonly cancelAtPeriodEnd: boolean;
  readonly canceledAt: Date | null;
  readonly metadata: Readonly<Record<string, string>>;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

/**
 * Every provider status except canceled keeps the store's subscription flag
 * set; unpaid or incomplete subscriptions can still recover.
 */
export function isActiveSubscriptionStatus(status: SubscriptionStatusType): boolean {
  return status !== SubscriptionStatus.CANCELED;
}
