import type { FastifyInstance, FastifyPluginAsync } from "fastify";
import type { WebhookController } from "../controllers/webhook.controller.js";
import webhookRoutes from "./webhook.routes.js";

export interface RoutesOptions {
  webhookController: WebhookController;
}

const routes: FastifyPluginAsync<RoutesOptions> = async (app: FastifyInstance, opts) => {
  app.get("/health", async () => ({ status: "ok" }));

  app.register(webhookRoutes, { prefix: "/webhook", controller: opts.webhookController });
};

export default routes;
