import Stripe from "stripe";
import { describe, it, expect } from "vitest";
import { StripePaymentProvider } from "../../../app/services/billing/payment-provider.server";
import { ErrorCode } from "../../../app/utils/errors";

const WEBHOOK_SECRET = "test-webhook-secret";

describe("StripePaymentProvider.constructEvent", () => {
  const stripe = new Stripe("test-stripe-key", { apiVersion: "2023-10-16" });
  const provider = new StripePaymentProvider({
    secretKey: "test-stripe-key",
    webhookSecret: WEBHOOK_SECRET,
    client: stripe,
  });
  const payload = JSON.stringify({
    id: "evt_1",
    object: "event",
    type: "invoice.paid",
    data: { object: { id: "in_1", subscription: "sub_1" } },
  });

  it("decodes an event signed with the webhook secret", () => {
    const signature = stripe.webhooks.generateTestHeaderString({ payload, secret: WEBHOOK_SECRET });

    expect(provider.constructEvent(payload, signature)).toMatchObject({
      id: "evt_1",
      type: "invoice.paid",
      data: { object: { id: "in_1", subscription: "sub_1" } },
    });
  });

  it("rejects a signature made with another secret", () => {
    const signature = stripe.webhooks.generateTestHeaderString({ payload, secret: "other-secret" });

    let thrown: unknown;
    try {
      provider.constructEvent(payload, signature);
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toMatchObject({ code: ErrorCode.VALIDATION_SIGNATURE_INVALID });
  });

  it("rejects a body altered after signing", () => {
    const signature = stripe.webhooks.generateTestHeaderString({ payload, secret: WEBHOOK_SECRET });

    expect(() => provider.constructEvent(payload.replace("sub_1", "sub_2"), signature)).toThrow(
      "webhook signature verification failed"
    );
  });

  it("requires a signature header", () => {
    expect(() => provider.constructEvent(payload, " ")).toThrow("stripe signature missing");
  });

  it("requires a configured webhook secret", () => {
    const unconfigured = new StripePaymentProvider({ secretKey: "test-stripe-key", webhookSecret: "", client: stripe });

    expect(() => unconfigured.constructEvent(payload, "t=1,v1=abc")).toThrow(
      "stripe webhook secret is not configured"
    );
  });
});
