import { z } from "zod";
import { WebhookSource } from "../enums.js";
import type { PaymentEvent } from "../payment-event.js";

const stringish = z.union([z.string(), z.number()]).transform(String);

const duckfyTransactionSchema = z.object({
  id: stringish,
  status: z.string().min(1),
  paymentMethod: z.string().min(1),
  amount: z.number().nonnegative(),
  // Código ISO 4217; o Intl.NumberFormat rejeita qualquer outro formato
  currency: z.string().regex(/^[A-Za-z]{3}$/).transform((code) => code.toUpperCase()).default("BRL"),
  checkoutUrl: z.string().optional(),
  paymentLink: z.string().optional(),
}).passthrough();

const duckfyClientSchema = z.object({
  phone: stringish.refine((phone) => phone.length > 0, "Required"),
  name: z.string().optional(),
}).passthrough();

const duckfyOrderItemSchema = z.object({
  product: z.object({ name: z.string().optional() }).passthrough().optional(),
}).passthrough();

export const duckfyWebhookSchema = z.object({
  token: z.string().optional(),
  transaction: duckfyTransactionSchema,
  client: duckfyClientSchema,
  orderItems: z.array(duckfyOrderItemSchema).optional(),
}).passthrough().transform((data): PaymentEvent => ({
  source: WebhookSource.DUCKFY,
  paymentId: data.transaction.id,
  paymentMethod: data.transaction.paymentMethod,
  status: data.transaction.status,
  amount: data.transaction.amount,
  currency: data.transaction.currency,
  customerPhone: data.client.phone,
  customerName: data.client.name,
  checkoutUrl: data.transaction.checkoutUrl ?? data.transaction.paymentLink,
  productName: data.orderItems?.[0]?.product?.name,
}));

export type DuckfyWebhookDTO = z.input<typeof duckfyWebhookSchema>;
