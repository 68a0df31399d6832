import type { WebhookOutcomeStatus, WebhookSource } from "./enums.js";

/**
 * Evento de pagamento normalizado, independente do gateway de origem.
 * Vive apenas durante a requisição.
 */
export interface PaymentEvent {
  source: WebhookSource;
  paymentId?: string;
  paymentMethod: string;
  status: string;
  amount: number;        // unidade original do gateway (ver GHOSTPAY_AMOUNT_UNIT)
  currency: string;
  customerPhone: string; // como veio do gateway
  customerName?: string;
  checkoutUrl?: string;
  productName?: string;
}

export interface WebhookOutcome {
  status: WebhookOutcomeStatus;
  message: string;
  messageSid?: string;
}
