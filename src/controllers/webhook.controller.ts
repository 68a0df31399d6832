import type { FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import type { AppConfig } from "../config/env.js";
import { logger } from "../config/logger.js";
import { ForbiddenError, MalformedRequestError } from "../errors/AppError.js";
import type { PaymentReminderService } from "../services/payment-reminder.service.js";
import { duckfyWebhookSchema } from "../types/dtos/duckfy.dto.js";
import { ghostPayWebhookSchema } from "../types/dtos/ghostpay.dto.js";
import type { WebhookOutcome } from "../types/payment-event.js";
import { tokensMatch } from "../utils/token.utils.js";

function isJsonObject(body: unknown): body is Record<string, unknown> {
  return typeof body === "object" && body !== null && !Array.isArray(body);
}

function requireJsonObject(body: unknown): Record<string, unknown> {
  if (!isJsonObject(body)) {
    throw new MalformedRequestError("A requisição deve ser um objeto JSON.");
  }
  return body;
}

function parsePayload<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const fields = [...new Set(result.error.issues.map((issue) => issue.path.join(".")))];
    throw new MalformedRequestError(`Campos obrigatórios ausentes ou inválidos: ${fields.join(", ")}`, fields[0]);
  }
  return result.data;
}

function sendOutcome(reply: FastifyReply, outcome: WebhookOutcome) {
  return reply.status(200).send({ status: outcome.status, message: outcome.message });
}

type WebhookControllerConfig = Pick<AppConfig, "duckfy">;

export function createWebhookController(reminderService: PaymentReminderService, config: WebhookControllerConfig) {
  return {
    /**
     * Webhook GhostPay
     * TODO: validar assinatura do webhook assim que a GhostPay documentar o header/algoritmo (GHOSTPAY_SECRET_KEY)
     */
    async handleGhostPay(req: FastifyRequest, reply: FastifyReply) {
      const body = requireJsonObject(req.body);
      logger.info({ body }, "[GhostPay] Webhook recebido");

      const event = parsePayload(ghostPayWebhookSchema, body);
      const outcome = await reminderService.handleGhostPayEvent(event);
      return sendOutcome(reply, outcome);
    },

    /**
     * Webhook Duckfy (token opcional via DUCKFY_WEBHOOK_TOKEN)
     */
    async handleDuckfy(req: FastifyRequest, reply: FastifyReply) {
      const body = requireJsonObject(req.body);
      logger.info({ body }, "[Duckfy] Webhook recebido");

      const expectedToken = config.duckfy.webhookToken;
      if (expectedToken && !tokensMatch(expectedToken, body.token)) {
        throw new ForbiddenError("Token inválido.");
      }

      const event = parsePayload(duckfyWebhookSchema, body);
      const outcome = await reminderService.handleDuckfyEvent(event);
      return sendOutcome(reply, outcome);
    },
  };
}

export type WebhookController = ReturnType<typeof createWebhookController>;
