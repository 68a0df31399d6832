import { z } from "zod";
import { WebhookSource } from "../enums.js";
import type { PaymentEvent } from "../payment-event.js";

// Gateways mandam telefone/ID ora como string, ora como número
const stringish = z.union([z.string(), z.number()]).transform(String);

const ghostPayCustomerSchema = z.object({
  name: z.string().optional(),
  phone: stringish.optional(),
}).passthrough();

/**
 * Schema do webhook GhostPay.
 * Aceita o formato plano (amount/customerPhone) e o formato aninhado
 * do gateway (totalValue/customer.phone); o plano tem prioridade.
 */
export const ghostPayWebhookSchema = z.object({
  paymentId: stringish.optional(),
  paymentMethod: z.string().min(1),
  status: z.string().min(1),
  amount: z.number().nonnegative().optional(),
  totalValue: z.number().nonnegative().optional(),
  customerPhone: stringish.optional(),
  customer: ghostPayCustomerSchema.optional(),
  checkoutUrl: z.string().optional(),
  pixQrCode: z.string().optional(),
}).passthrough().transform((data, ctx): PaymentEvent => {
  const amount = data.amount ?? data.totalValue;
  const customerPhone = data.customerPhone || data.customer?.phone;

  if (amount === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["amount"], message: "Required" });
  }
  if (!customerPhone) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["customerPhone"], message: "Required" });
  }
  if (amount === undefined || !customerPhone) return z.NEVER;

  return {
    source: WebhookSource.GHOSTPAY,
    paymentId: data.paymentId,
    paymentMethod: data.paymentMethod,
    status: data.status,
    amount,
    currency: "BRL",
    customerPhone,
    customerName: data.customer?.name,
    checkoutUrl: data.checkoutUrl ?? data.pixQrCode,
  };
});

export type GhostPayWebhookDTO = z.input<typeof ghostPayWebhookSchema>;
