import twilio from "twilio";
import type { AppConfig, TwilioConfig } from "../config/env.js";
import { logger } from "../config/logger.js";
import { DeliveryFailureError } from "../errors/AppError.js";

export interface SmsDeliveryResult {
    sid: string;
    status: string;
}

/** Contrato consumido pelo restante da aplicação */
export interface SmsSender {
    send(to: string, body: string): Promise<SmsDeliveryResult>;
}

/** Subconjunto do client Twilio que usamos */
export interface MessagingClient {
    messages: {
        create(params: { to: string; from: string; body: string }): Promise<{ sid: string; status: string }>;
    };
}

function describeProviderError(error: unknown): { message: string; code?: number | string } {
    if (error instanceof Error) {
        const code = "code" in error && (typeof error.code === "number" || typeof error.code === "string")
            ? error.code
            : undefined;
        return { message: error.message, code };
    }
    return { message: String(error) };
}

/**
 * Serviço de SMS via Twilio.
 * Uma tentativa por chamada; retry/fila ficam a cargo do provedor.
 */
export class SmsService implements SmsSender {

    constructor(
        private readonly client: MessagingClient | null,
        private readonly fromNumber: string | null
    ) {}

    get enabled(): boolean {
        return this.client !== null && this.fromNumber !== null;
    }

    async send(to: string, body: string): Promise<SmsDeliveryResult> {
        if (!this.client || !this.fromNumber) {
            logger.error("Cliente Twilio não inicializado. SMS não enviado.");
            throw new DeliveryFailureError("Envio de SMS não configurado.");
        }

        try {
            const message = await this.client.messages.create({
                body,
                from: this.fromNumber,
                to,
            });

            logger.info({ sid: message.sid, status: message.status }, "SMS enviado");
            return { sid: message.sid, status: message.status };

        } catch (error) {
            const { message, code } = describeProviderError(error);
            logger.error({ error: message, code }, "Erro do Twilio ao enviar SMS");
            throw new DeliveryFailureError("Falha ao enviar lembrete por SMS.", code);
        }
    }
}

function createTwilioClient(config: TwilioConfig): MessagingClient {
    if (config.auth.type === "apiKey") {
        return twilio(config.auth.apiKeySid, config.auth.apiKeySecret, { accountSid: config.accountSid });
    }
    return twilio(config.accountSid, config.auth.authToken);
}

/**
 * Monta o SmsService a partir da config. Credenciais ausentes ou erro
 * na criação do client desabilitam o SMS sem derrubar o servidor.
 */
export function createSmsService(config: AppConfig): SmsService {
    if (!config.twilio) {
        logger.fatal(
            { missing: config.missingTwilioCredentials },
            "Credenciais Twilio ausentes. Envio de SMS desabilitado."
        );
        return new SmsService(null, null);
    }

    try {
        const client = createTwilioClient(config.twilio);
        logger.info("Cliente Twilio inicializado.");
        return new SmsService(client, config.twilio.phoneNumber);
    } catch (error) {
        logger.fatal({ error: describeProviderError(error).message }, "Falha ao inicializar o Twilio. Envio de SMS desabilitado.");
        return new SmsService(null, null);
    }
}
