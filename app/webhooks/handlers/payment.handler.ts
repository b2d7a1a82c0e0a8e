import type { IdempotencyGuard } from "../../services/idempotency/idempotency-guard.server";
import { normalizeEventId } from "../../services/idempotency/idempotency-guard.server";
import type { PaymentProviderClient } from "../../services/billing/payment-provider.server";
import { getErrorMessage } from "../../utils/errors";
import { createTimer, logger as baseLogger, metrics, withCorrelation, type Logger } from "../../utils/logger.server";
import type {
  PaymentEventHandler,
  PaymentWebhookRequest,
  WebhookHandler,
  WebhookHandlerResult,
} from "../types";

export interface PaymentWebhookDeps {
  provider: Pick<PaymentProviderClient, "constructEvent">;
  guard: Pick<IdempotencyGuard, "checkAndMark" | "delete">;
  reconciler: PaymentEventHandler;
  logger?: Logger;
}

/**
 * Verifies, deduplicates and reconciles one payment provider webhook.
 * A redelivered event is acknowledged without side effects. When
 * reconciliation fails the idempotency key is released so the provider's
 * retry can process the event again, and the error propagates to the caller.
 */
export async function handlePaymentWebhook(
  deps: PaymentWebhookDeps,
  request: PaymentWebhookRequest
): Promise<WebhookHandlerResult> {
  const log = deps.logger ?? baseLogger.child({ component: "payment-webhook" });
  const timer = createTimer();

  const event = deps.provider.constructEvent(request.rawBody, request.signature);
  const eventId = normalizeEventId(event.id);

  return withCorrelation({ eventId }, async (): Promise<WebhookHandlerResult> => {
    const duplicate = await deps.guard.checkAndMark(eventId);
    if (duplicate) {
      metrics.paymentWebhook({ eventId, eventType: event.type, status: "duplicate" });
      return {
        success: true,
        status: 200,
        message: "OK (duplicate)",
        eventId,
        outcome: "duplicate",
      };
    }

    try {
      const outcome = await deps.reconciler.handleEvent(event);
      metrics.paymentWebhook({
        eventId,
        eventType: event.type,
        status: outcome === "ignored" ? "ignored" : "processed",
        duration: timer.elapsed(),
      });
      log.info(`Payment event ${eventId} processed`, { eventType: event.type, outcome });
      return { success: true, status: 200, message: "OK", eventId, outcome };
    } catch (error) {
      try {
        await deps.guard.delete(eventId);
      } catch (releaseError) {
        log.error("Failed to release idempotency key", releaseError, { eventType: event.type });
      }
      metrics.paymentWebhook({
        eventId,
        eventType: event.type,
        status: "failed",
        duration: timer.elapsed(),
        error: getErrorMessage(error),
      });
      throw error;
    }
  });
}

export function createPaymentWebhookHandler(deps: PaymentWebhookDeps): WebhookHandler {
  return (request) => handlePaymentWebhook(deps, request);
}
