import type {
  CreateSubscriptionData,
  UpdateSubscriptionData,
} from "../../domain/subscription/subscription.repository";
import { expandableId, type ProviderSubscription } from "../../schemas/payment-event";
import { Errors } from "../../utils/errors";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const CUSTOMER_ID_METADATA_KEY = "stripe_customer_id";
export const PAYMENT_METHOD_METADATA_KEY = "stripe_payment_method_id";

/**
 * Reads the owning store from subscription metadata.
 */
export function storeIdFromMetadata(metadata: Readonly<Record<string, string>> | null | undefined): string {
  if (!metadata) {
    throw Errors.missingField("metadata", "subscription metadata is required");
  }
  const raw = metadata.store_id?.trim();
  if (!raw) {
    throw Errors.missingField("store_id", "store_id missing from metadata");
  }
  if (!UUID_PATTERN.test(raw)) {
    throw Errors.invalidFormat("store_id", "invalid store_id metadata");
  }
  return raw.toLowerCase();
}

export function determinePriceId(subscription: ProviderSubscription): string | null {
  const first = subscription.items?.data[0];
  return first?.price?.id || null;
}

function fromUnix(seconds: number | null | undefined): Date | null {
  return seconds ? new Date(seconds * 1000) : null;
}

/**
 * Billing period bounds, taken from the subscription itself and falling back
 * to its first item when the subscription does not carry them.
 */
export function periodFromSubscription(subscription: ProviderSubscription): {
  currentPeriodStart: Date | null;
  currentPeriodEnd: Date | null;
} {
  if (subscription.current_period_start && subscription.current_period_end) {
    return {
      currentPeriodStart: fromUnix(subscription.current_period_start),
      currentPeriodEnd: fromUnix(subscription.current_period_end),
    };
  }
  const first = subscription.items?.data[0];
  return {
    currentPeriodStart: fromUnix(first?.current_period_start),
    currentPeriodEnd: fromUnix(first?.current_period_end),
  };
}

function mergeMetadata(
  base: Readonly<Record<string, string>> | null | undefined,
  extras: Record<string, string | null> = {}
): Record<string, string> {
  const merged: Record<string, string> = { ...(base ?? {}) };
  for (const [key, value] of Object.entries(extras)) {
    if (value) {
      merged[key] = value;
    }
  }
  return merged;
}

export function buildSubscription(
  subscription: ProviderSubscription,
  storeId: string,
  priceId: string | null
): CreateSubscriptionData {
  const metadata = subscription.metadata ?? {};
  const customerId = expandableId(subscription.customer) ?? metadata[CUSTOMER_ID_METADATA_KEY]?.trim() ?? null;
  const paymentMethodId =
    expandableId(subscription.default_payment_method) ?? metadata[PAYMENT_METHOD_METADATA_KEY]?.trim() ?? null;

  return {
    storeId,
    externalSubscriptionId: subscription.id,
    status: subscription.status,
    priceId,
    customerId: customerId || null,
    paymentMethodId: paymentMethodId || null,
    ...periodFromSubscription(subscription),
    cancelAtPeriodEnd: subscription.cancel_at_period_end,
    canceledAt: fromUnix(subscription.canceled_at),
    metadata: mergeMetadata(metadata, {
      [CUSTOMER_ID_METADATA_KEY]: customerId || null,
      [PAYMENT_METHOD_METADATA_KEY]: paymentMethodId || null,
    }),
  };
}

/**
 * Fields refreshed on an existing subscription. The price is only replaced
 * when the provider reports one.
 */
export function subscriptionUpdate(
  subscription: ProviderSubscription,
  priceId: string | null
): UpdateSubscriptionData {
  return {
    status: subscription.status,
    ...(priceId ? { priceId } : {}),
    ...periodFromSubscription(subscription),
    cancelAtPeriodEnd: subscription.cancel_at_period_end,
    canceledAt: fromUnix(subscription.canceled_at),
    metadata: mergeMetadata(subscription.metadata),
  };
}
