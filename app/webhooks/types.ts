import type { PaymentEventEnvelope } from "../schemas/payment-event";
import type { PaymentEventOutcome } from "../services/billing/payment-event-reconciler.server";

export interface PaymentWebhookRequest {
  /** Body exactly as received; signature verification runs over these bytes. */
  rawBody: string | Buffer;
  signature: string;
}

export type PaymentWebhookOutcome = PaymentEventOutcome | "duplicate";

export interface WebhookHandlerResult {
  success: boolean;
  status: number;
  message: string;
  eventId?: string;
  outcome?: PaymentWebhookOutcome;
}

export interface PaymentEventHandler {
  handleEvent(event: PaymentEventEnvelope): Promise<PaymentEventOutcome>;
}

export type WebhookHandler = (request: PaymentWebhookRequest) => Promise<WebhookHandlerResult>;
