import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import type { WebhookController } from "../controllers/webhook.controller.js";

export interface WebhookRoutesOptions {
  controller: WebhookController;
}

const webhookRoutes: FastifyPluginAsync<WebhookRoutesOptions> = async (app: FastifyInstance, opts) => {
  // POST /webhook/ghostpay
  app.post("/ghostpay", opts.controller.handleGhostPay);

  // POST /webhook/duckfy
  app.post("/duckfy", opts.controller.handleDuckfy);
};

export default webhookRoutes;
