// Aplicação Fastify compartilhada (servidor e testes)
import Fastify, { type FastifyInstance } from "fastify";
import routes from "./api/routes.js";
import { env, type AppConfig } from "./config/env.js";
import { createWebhookController } from "./controllers/webhook.controller.js";
import { globalErrorHandler } from "./errors/errorHandler.js";
import { PaymentReminderService } from "./services/payment-reminder.service.js";
import { createSmsService, type SmsSender } from "./services/sms.service.js";

export interface CreateAppOptions {
  config: AppConfig;
  /** Substitui o Twilio (testes / ambientes sem credenciais) */
  smsSender?: SmsSender;
}

export async function createApp({ config, smsSender }: CreateAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: env.LOG_LEVEL || "info",
      transport:
        env.NODE_ENV === "development"
          ? {
              target: "pino-pretty",
              options: { colorize: true },
            }
          : undefined,
    },
  });

  app.setErrorHandler(globalErrorHandler);

  const reminderService = new PaymentReminderService(config, smsSender ?? createSmsService(config));
  const webhookController = createWebhookController(reminderService, config);

  await app.register(routes, { webhookController });
  await app.ready();

  return app;
}
