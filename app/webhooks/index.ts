export type {
  PaymentWebhookRequest,
  PaymentWebhookOutcome,
  WebhookHandlerResult,
  PaymentEventHandler,
  WebhookHandler,
} from "./types";

export {
  handlePaymentWebhook,
  createPaymentWebhookHandler,
  type PaymentWebhookDeps,
} from "./handlers";
