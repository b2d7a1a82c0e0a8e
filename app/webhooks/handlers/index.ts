export {
  handlePaymentWebhook,
  createPaymentWebhookHandler,
  type PaymentWebhookDeps,
} from "./payment.handler";
