export enum PaymentMethod {
  PIX = "PIX",
  BOLETO = "BOLETO",
  CARTAO = "CARTAO"
}

export enum GhostPayPaymentStatus {
  PENDING = "PENDING",
  APPROVED = "APPROVED"
}

export enum DuckfyTransactionStatus {
  PENDING = "PENDING",
  COMPLETED = "COMPLETED"
}

export enum WebhookSource {
  GHOSTPAY = "ghostpay",
  DUCKFY = "duckfy"
}

export enum WebhookOutcomeStatus {
  SUCCESS = "success",
  IGNORED = "ignored"
}
