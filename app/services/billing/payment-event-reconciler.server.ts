/**
 * Payment Event Reconciler
 *
 * Mirrors provider subscriptions into the local subscriptions table and keeps
 * each store's subscription flag in step with it. Invoice events carry only
 * the subscription id, so the full subscription is fetched before syncing.
 */

import type { IStoreRepository } from "../../domain/store/store.repository";
import type { Store } from "../../domain/store/store.entity";
import type { ISubscriptionRepository } from "../../domain/subscription/subscription.repository";
import {
  isActiveSubscriptionStatus,
  type Subscription,
} from "../../domain/subscription/subscription.entity";
import {
  InvoiceObjectSchema,
  PaymentEventType,
  ProviderSubscriptionSchema,
  decodePaymentPayload,
  expandableId,
  type PaymentEventEnvelope,
  type ProviderSubscription,
} from "../../schemas/payment-event";
import { AppError, ErrorCode, Errors, wrapDependency } from "../../utils/errors";
import { logger as baseLogger, type Logger } from "../../utils/logger.server";
import type { TransactionRunner } from "../db/transaction.server";
import type { PaymentProviderClient } from "./payment-provider.server";
import {
  buildSubscription,
  determinePriceId,
  storeIdFromMetadata,
  subscriptionUpdate,
} from "./subscription-mapper";

export type PaymentEventOutcome = "synced" | "ignored";

export interface SubscriptionSyncResult {
  subscription: Subscription;
  created: boolean;
  storeFlagChanged: boolean;
}

export interface PaymentEventReconcilerDeps<Tx> {
  transactions: TransactionRunner<Tx>;
  subscriptions: ISubscriptionRepository<Tx>;
  stores: Pick<IStoreRepository<Tx>, "findById" | "updateSubscriptionActive">;
  provider: Pick<PaymentProviderClient, "getSubscription">;
  logger?: Logger;
}

export class PaymentEventReconciler<Tx> {
  private readonly logger: Logger;

  constructor(private readonly deps: PaymentEventReconcilerDeps<Tx>) {
    this.logger = deps.logger ?? baseLogger.child({ component: "payment-reconciler" });
  }

  async handleEvent(event: PaymentEventEnvelope): Promise<PaymentEventOutcome> {
    switch (event.type) {
      case PaymentEventType.SUBSCRIPTION_CREATED:
      case PaymentEventType.SUBSCRIPTION_UPDATED:
      case PaymentEventType.SUBSCRIPTION_DELETED: {
        const subscription = decodePaymentPayload(
          ProviderSubscriptionSchema,
          event.data.object,
          "subscription event"
        );
        await this.syncSubscription(subscription);
        return "synced";
      }
      case PaymentEventType.INVOICE_PAID:
      case PaymentEventType.INVOICE_PAYMENT_FAILED: {
        const invoice = decodePaymentPayload(InvoiceObjectSchema, event.data.object, "invoice event");
        const subscriptionId = expandableId(invoice.subscription);
        if (!subscriptionId) {
          throw Errors.missingField("subscription", "subscription id missing");
        }
        let subscription: ProviderSubscription;
        try {
          subscription = await this.deps.provider.getSubscription(subscriptionId);
        } catch (error) {
          throw wrapDependency(error, "fetch stripe subscription", ErrorCode.DEPENDENCY_PAYMENT_PROVIDER);
        }
        await this.syncSubscription(subscription);
        return "synced";
      }
      default:
        this.logger.debug("Ignoring payment event", { eventId: event.id, eventType: event.type });
        return "ignored";
    }
  }

  /**
   * Creates or refreshes the local subscription and flips the owning store's
   * subscription flag when its active state changed, all in one transaction.
   */
  async syncSubscription(providerSub: ProviderSubscription): Promise<SubscriptionSyncResult> {
    try {
      return await this.deps.transactions.withTransaction(async (tx) => {
        const stored = await this.deps.subscriptions.findByExternalId(providerSub.id, tx);
        const storeId = this.resolveStoreId(providerSub, stored);
        const priceId = determinePriceId(providerSub);

        let persisted: Subscription | null;
        if (!stored) {
          persisted = await this.deps.subscriptions.create(buildSubscription(providerSub, storeId, priceId), tx);
        } else {
          persisted = await this.deps.subscriptions.update(stored.id, subscriptionUpdate(providerSub, priceId), tx);
        }
        if (!persisted) {
          throw Errors.internal("subscription not persisted");
        }

        let store: Store | null;
        try {
          store = await this.deps.stores.findById(storeId, tx);
        } catch (error) {
          throw wrapDependency(error, "load store");
        }
        if (!store) {
          throw Errors.storeNotFound(storeId);
        }

        const active = isActiveSubscriptionStatus(persisted.status);
        const storeFlagChanged = store.subscriptionActive !== active;
        if (storeFlagChanged) {
          try {
            await this.deps.stores.updateSubscriptionActive(storeId, active, tx);
          } catch (error) {
            throw wrapDependency(error, "update store subscription flag");
          }
        }

        this.logger.info("Subscription synced", {
          storeId,
          subscriptionId: persisted.id,
          externalSubscriptionId: providerSub.id,
          status: persisted.status,
          created: !stored,
          storeFlagChanged,
        });
        return { subscription: persisted, created: !stored, storeFlagChanged };
      }, "sync subscription");
    } catch (error) {
      throw wrapDependency(error, "sync subscription");
    }
  }

  /**
   * Metadata names the store. An already mirrored subscription covers for
   * missing or malformed metadata, but never for metadata naming another
   * store.
   */
  private resolveStoreId(providerSub: ProviderSubscription, stored: Subscription | null): string {
    let fromMetadata: string;
    try {
      fromMetadata = storeIdFromMetadata(providerSub.metadata);
    } catch (error) {
      if (stored && error instanceof AppError) {
        return stored.storeId;
      }
      throw error;
    }
    if (stored && stored.storeId !== fromMetadata) {
      throw Errors.conflict(
        ErrorCode.CONFLICT_SUBSCRIPTION_STORE,
        "subscription belongs to a different store",
        { storeId: fromMetadata, existingStoreId: stored.storeId, externalSubscriptionId: providerSub.id }
      );
    }
    return fromMetadata;
  }
}
