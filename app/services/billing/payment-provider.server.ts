import Stripe from "stripe";
import {
  PaymentEventEnvelopeSchema,
  ProviderSubscriptionSchema,
  decodePaymentPayload,
  type PaymentEventEnvelope,
  type ProviderSubscription,
} from "../../schemas/payment-event";
import { ErrorCode, Errors } from "../../utils/errors";

/**
 * The slice of the payment provider that subscription reconciliation needs.
 */
export interface PaymentProviderClient {
  /**
   * Verifies the webhook signature and decodes the event envelope.
   */
  constructEvent(rawBody: string | Buffer, signature: string): PaymentEventEnvelope;

  getSubscription(subscriptionId: string): Promise<ProviderSubscription>;
}

export interface StripePaymentProviderOptions {
  secretKey: string;
  webhookSecret: string;
  client?: Stripe;
}

export class StripePaymentProvider implements PaymentProviderClient {
  private readonly stripe: Stripe;
  private readonly webhookSecret: string;

  constructor(options: StripePaymentProviderOptions) {
    this.stripe = options.client ?? new Stripe(options.secretKey, { apiVersion: "2023-10-16" });
    this.webhookSecret = options.webhookSecret;
  }

  constructEvent(rawBody: string | Buffer, signature: string): PaymentEventEnvelope {
    if (!signature.trim()) {
      throw Errors.missingField("signature", "stripe signature missing");
    }
    if (!this.webhookSecret) {
      throw Errors.internal("stripe webhook secret is not configured");
    }
    let event: Stripe.Event;
    try {
      event = this.stripe.webhooks.constructEvent(rawBody, signature, this.webhookSecret);
    } catch (error) {
      throw Errors.signatureInvalid(error instanceof Error ? error : undefined);
    }
    return decodePaymentPayload(PaymentEventEnvelopeSchema, event, "stripe event");
  }

  async getSubscription(subscriptionId: string): Promise<ProviderSubscription> {
    let subscription: Stripe.Subscription;
    try {
      subscription = await this.stripe.subscriptions.retrieve(subscriptionId);
    } catch (error) {
      throw Errors.dependency("fetch stripe subscription", error, ErrorCode.DEPENDENCY_PAYMENT_PROVIDER);
    }
    return decodePaymentPayload(ProviderSubscriptionSchema, subscription, "stripe subscription");
  }
}
