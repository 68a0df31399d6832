import type { AppConfig } from "../config/env.js";
import { logger } from "../config/logger.js";
import { DuckfyTransactionStatus, GhostPayPaymentStatus, PaymentMethod, WebhookOutcomeStatus } from "../types/enums.js";
import type { PaymentEvent, WebhookOutcome } from "../types/payment-event.js";
import { toReais } from "../utils/currency.utils.js";
import { formatPhoneForSms } from "../utils/format.js";
import { ReminderTemplates } from "./notifications/templates/reminder.template.js";
import type { SmsSender } from "./sms.service.js";

type ReminderConfig = Pick<AppConfig, "ghostpay" | "store">;

/**
 * Decide, a partir do evento de pagamento, se o cliente recebe o
 * lembrete de PIX pendente. Sem estado entre requisições.
 */
export class PaymentReminderService {

    constructor(
        private readonly config: ReminderConfig,
        private readonly sms: SmsSender
    ) {}

    /** Comparação exata: "pix" ou "Pending" não disparam lembrete */
    isPendingPix(event: Pick<PaymentEvent, "paymentMethod" | "status">): boolean {
        return event.paymentMethod === PaymentMethod.PIX && event.status === GhostPayPaymentStatus.PENDING;
    }

    buildMessage(event: PaymentEvent): string {
        return ReminderTemplates.pendingPix({
            nomeLoja: this.config.store.name,
            valor: toReais(event.amount, this.config.ghostpay.amountUnit),
            moeda: event.currency,
            nomeCliente: event.customerName,
            nomeProduto: event.productName,
            linkPagamento: event.checkoutUrl ?? this.config.store.checkoutUrl,
        });
    }

    async handleGhostPayEvent(event: PaymentEvent): Promise<WebhookOutcome> {
        const { paymentId, paymentMethod, status } = event;

        if (this.isPendingPix(event)) {
            logger.info({ paymentId }, "[GhostPay] PIX pendente. Preparando lembrete por SMS.");
            return this.sendReminder(event);
        }

        if (status === GhostPayPaymentStatus.APPROVED) {
            logger.info({ paymentId, paymentMethod, status }, "[GhostPay] Pagamento aprovado. Nenhum lembrete necessário.");
            return {
                status: WebhookOutcomeStatus.SUCCESS,
                message: `Pagamento ${status}, nenhum lembrete necessário.`,
            };
        }

        logger.info({ paymentId, paymentMethod, status }, "[GhostPay] Evento ignorado.");
        return {
            status: WebhookOutcomeStatus.IGNORED,
            message: "Evento não relevante para lembrete de PIX.",
        };
    }

    async handleDuckfyEvent(event: PaymentEvent): Promise<WebhookOutcome> {
        const { paymentId, paymentMethod, status } = event;

        // Produto só aceita PIX
        if (paymentMethod !== PaymentMethod.PIX) {
            logger.info({ paymentId, paymentMethod }, "[Duckfy] Método de pagamento ignorado.");
            return {
                status: WebhookOutcomeStatus.IGNORED,
                message: `Método de pagamento ${paymentMethod} não suportado. Apenas PIX é aceito.`,
            };
        }

        if (status === DuckfyTransactionStatus.PENDING) {
            logger.info({ paymentId }, "[Duckfy] PIX pendente. Preparando lembrete por SMS.");
            return this.sendReminder(event);
        }

        if (status === DuckfyTransactionStatus.COMPLETED) {
            logger.info({ paymentId, status }, "[Duckfy] PIX concluído. Nenhum lembrete necessário.");
            return {
                status: WebhookOutcomeStatus.SUCCESS,
                message: `Pagamento PIX ${status}, nenhum lembrete necessário.`,
            };
        }

        logger.info({ paymentId, status }, "[Duckfy] Evento PIX ignorado.");
        return {
            status: WebhookOutcomeStatus.IGNORED,
            message: `Evento PIX com status ${status} não processado.`,
        };
    }

    private async sendReminder(event: PaymentEvent): Promise<WebhookOutcome> {
        const to = formatPhoneForSms(event.customerPhone);
        const body = this.buildMessage(event);

        // DeliveryFailureError sobe até o errorHandler (500, sem retry)
        const result = await this.sms.send(to, body);

        logger.info({ source: event.source, paymentId: event.paymentId, sid: result.sid }, "Lembrete de PIX enviado.");
        return {
            status: WebhookOutcomeStatus.SUCCESS,
            message: "Lembrete por SMS enviado para PIX pendente.",
            messageSid: result.sid,
        };
    }
}
