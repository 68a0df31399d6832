import "dotenv/config";
import { createApp } from "./app.js";
import { loadConfig } from "./config/env.js";
import { logger } from "./config/logger.js";
import { initSentry } from "./config/sentry.js";

const start = async () => {
  initSentry();

  const config = loadConfig();

  // Assinatura dos webhooks não é verificada (ver TODO no webhook.controller)
  logger.warn(
    { ghostpayApiUrl: config.ghostpay.apiUrl, secretKeyConfigured: Boolean(config.ghostpay.secretKey) },
    "Verificação de assinatura do webhook GhostPay desabilitada."
  );

  const app = await createApp({ config });

  try {
    await app.listen({ port: config.port, host: config.host });
    logger.info(`Servidor rodando em http://${config.host}:${config.port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  logger.fatal({ err }, "Falha ao iniciar o servidor");
  process.exit(1);
});
