import { z } from "zod";
import { SUBSCRIPTION_STATUSES } from "../types/enums";
import { Errors } from "../utils/errors";

export const PaymentEventType = {
  SUBSCRIPTION_CREATED: "customer.subscription.created",
  SUBSCRIPTION_UPDATED: "customer.subscription.updated",
  SUBSCRIPTION_DELETED: "customer.subscription.deleted",
  INVOICE_PAID: "invoice.paid",
  INVOICE_PAYMENT_FAILED: "invoice.payment_failed",
} as const;

const ExpandableIdSchema = z.union([
  z.string(),
  z.object({ id: z.string() }).passthrough(),
]);

export const PaymentEventEnvelopeSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  created: z.number().optional(),
  data: z.object({
    object: z.record(z.unknown()),
  }).passthrough(),
}).passthrough();

export const SubscriptionItemSchema = z.object({
  id: z.string().optional(),
  price: z.object({ id: z.string() }).passthrough().nullable().optional(),
  current_period_start: z.number().nullable().optional(),
  current_period_end: z.number().nullable().optional(),
}).passthrough();

export const ProviderSubscriptionSchema = z.object({
  id: z.string().min(1),
  status: z.enum(SUBSCRIPTION_STATUSES),
  customer: ExpandableIdSchema.nullable().optional(),
  default_payment_method: ExpandableIdSchema.nullable().optional(),
  current_period_start: z.number().nullable().optional(),
  current_period_end: z.number().nullable().optional(),
  cancel_at_period_end: z.boolean().default(false),
  canceled_at: z.number().nullable().optional(),
  metadata: z.record(z.string()).nullable().optional(),
  items: z.object({
    data: z.array(SubscriptionItemSchema),
  }).passthrough().nullable().optional(),
}).passthrough();

export const InvoiceObjectSchema = z.object({
  id: z.string().optional(),
  subscription: ExpandableIdSchema.nullable().optional(),
}).passthrough();

export type PaymentEventEnvelope = z.infer<typeof PaymentEventEnvelopeSchema>;
export type ProviderSubscription = z.infer<typeof ProviderSubscriptionSchema>;
export type InvoiceObject = z.infer<typeof InvoiceObjectSchema>;

/**
 * Parses a provider payload, turning schema mismatches into a validation
 * error that names the first offending path.
 */
export function decodePaymentPayload<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string
): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? issue.path.join(".") : label;
    throw Errors.invalidFormat(path, `decode ${label}: ${issue?.message ?? "invalid payload"}`, result.error);
  }
  return result.data;
}

export function expandableId(value: z.infer<typeof ExpandableIdSchema> | null | undefined): string | null {
  if (!value) {
    return null;
  }
  const id = typeof value === "string" ? value : value.id;
  return id.trim() || null;
}
