#!/usr/bin/env node
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { startServer } from "./server/index.js";

const args = process.argv.slice(2);

if (args.includes("--help") || args.includes("-h")) {
  console.log(`payment-gateway-adapter — Stripe charges, customers and subscriptions over HTTP

USAGE:
  payment-gateway-adapter                 Start the HTTP server
  payment-gateway-adapter --port 8080     Start on a specific port
  payment-gateway-adapter --help          Show this help message
  payment-gateway-adapter --version       Show version

ROUTES:
  POST   /charges                         Charge a token or stored customer
  POST   /customers                       Create a customer from a token
  GET    /customers/:id                   Retrieve a customer
  PUT    /customers/:id/subscription      Subscribe to a plan
  DELETE /customers/:id/subscription      Cancel the current subscription

CONFIGURATION:
  PAYMENT_MODE                Test or Live (default: Test)
  PAYMENT_TEST_SECRET_KEY     Secret key used in Test mode
  PAYMENT_LIVE_SECRET_KEY     Secret key used in Live mode
  PAYMENT_CURRENCY            Default charge currency (default: usd)
  PAYMENT_RESULT_FIELDS       JSON field map for charge results (default: {"id":"id"})
  PAYMENT_SERVER_PORT         HTTP port (default: 3141)`);
  process.exit(0);
}

if (args.includes("--version") || args.includes("-v")) {
  try {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = dirname(__filename);
    const pkg: unknown = JSON.parse(
      readFileSync(join(__dirname, "..", "package.json"), "utf8")
    );
    const version =
      typeof pkg === "object" && pkg !== null ? Reflect.get(pkg, "version") : undefined;
    console.log(typeof version === "string" ? version : "0.1.0");
  } catch {
    console.log("0.1.0");
  }
  process.exit(0);
}

function parsePortArg(): number | undefined {
  const index = args.indexOf("--port");
  if (index === -1) return undefined;

  const port = Number(args[index + 1]);
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error("--port must be a positive integer");
  }
  return port;
}

async function main() {
  await startServer({ port: parsePortArg() });
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
