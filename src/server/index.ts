/**
 * Payment gateway HTTP server.
 *
 * A small Express app that exposes the gateway operations as JSON routes.
 * The gateway is built before the app listens, so a missing API key or a
 * missing Stripe install stops startup instead of failing the first request.
 *
 * Run: payment-gateway-adapter [--port 3141]
 */

import express, { type Express } from "express";
import type { Server } from "node:http";
import { loadConfig } from "../config.js";
import type { PaymentGateway } from "../services/payment/gateway.js";
import { createPaymentGateway } from "../services/payment/stripe.js";
import type { ProviderRecord } from "../services/payment/types.js";
import { createRoutes } from "./routes.js";

export function createApp<
  TCharge extends ProviderRecord,
  TCustomer extends ProviderRecord,
  TSubscription
>(gateway: PaymentGateway<TCharge, TCustomer, TSubscription>): Express {
  const app = express();

  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", mode: gateway.mode });
  });

  app.use(createRoutes(gateway));

  return app;
}

export async function startServer(options: { port?: number } = {}): Promise<Server> {
  const config = loadConfig();
  const port = options.port ?? config.serverPort;
  const gateway = await createPaymentGateway(config);

  const app = createApp(gateway);

  return app.listen(port, () => {
    console.log(`Payment gateway running on http://localhost:${port}`);
    console.log(`  Mode: ${gateway.mode}`);
    console.log(`  Currency: ${config.currency}`);
  });
}
