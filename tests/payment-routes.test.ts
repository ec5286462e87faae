import { once } from "node:events";
import type { Server } from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../src/server/index.js";
import { PaymentGateway } from "../src/services/payment/gateway.js";
import {
  createFakeClient,
  createRecordingLogger,
  FakeProviderError,
  testSettings,
} from "./fake-provider.js";

let server: Server;
let baseUrl: string;
let client: ReturnType<typeof createFakeClient>;

beforeEach(async () => {
  client = createFakeClient();
  const gateway = new PaymentGateway(testSettings(), client, createRecordingLogger());
  server = createApp(gateway).listen(0);
  await once(server, "listening");

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("server did not bind a TCP port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.close();
  await once(server, "close");
});

async function send(method: string, path: string, body?: unknown) {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers: { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return { status: response.status, body: await response.json() };
}

describe("payment routes", () => {
  it("reports health with the active mode", async () => {
    expect(await send("GET", "/health")).toEqual({
      status: 200,
      body: { status: "ok", mode: "Test" },
    });
  });

  it("charges a token and returns the projected result", async () => {
    const response = await send("POST", "/charges", { amount: 25, token: "tok_visa" });

    expect(response).toEqual({ status: 201, body: { id: "ch_1" } });
    expect(client.createCharge.mock.calls[0]?.[0]).toEqual({
      amount: 2500,
      currency: "usd",
      description: null,
      source: { token: "tok_visa" },
    });
  });

  it("charges a stored customer from customer_id", async () => {
    await send("POST", "/charges", { amount: "9.99", customer_id: "cus_42" });

    expect(client.createCharge.mock.calls[0]?.[0]?.source).toEqual({ customerId: "cus_42" });
    expect(client.createCharge.mock.calls[0]?.[0]?.amount).toBe(999);
  });

  it("answers 400 with the validation code when the source is missing", async () => {
    expect(await send("POST", "/charges", { amount: 25 })).toEqual({
      status: 400,
      body: {
        error: "A payment token or a stored customer id is required to charge.",
        code: "missing_payment_source",
      },
    });
  });

  it("answers 402 for a declined card", async () => {
    client.createCharge.mockRejectedValueOnce(
      new FakeProviderError("card_error", "Your card was declined.")
    );

    expect(await send("POST", "/charges", { amount: 25, token: "tok_visa" })).toEqual({
      status: 402,
      body: { error: "Your card was declined.", kind: "card_error" },
    });
  });

  it("answers 502 when the provider cannot be reached", async () => {
    client.createCharge.mockRejectedValueOnce(
      new FakeProviderError("connection_error", "ECONNRESET")
    );

    expect(await send("POST", "/charges", { amount: 25, token: "tok_visa" })).toEqual({
      status: 502,
      body: {
        error: "Network communication with payment processor failed, try again later.",
        kind: "connection_error",
      },
    });
  });

  it("creates a customer", async () => {
    const response = await send("POST", "/customers", {
      token: "tok_visa",
      email: "customer@example.com",
      plan: "gold",
    });

    expect(response).toEqual({ status: 201, body: { customer_id: "cus_1" } });
    expect(client.createCustomer.mock.calls[0]?.[0]).toEqual({
      token: "tok_visa",
      description: null,
      email: "customer@example.com",
      planId: "gold",
    });
  });

  it("answers 400 when a customer is created without a token", async () => {
    const response = await send("POST", "/customers", { email: "customer@example.com" });

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      error: "A payment token is required to create a customer.",
      code: "missing_payment_token",
    });
  });

  it("retrieves a customer", async () => {
    expect(await send("GET", "/customers/cus_7")).toEqual({
      status: 200,
      body: { id: "cus_7", object: "customer", email: "customer@example.com" },
    });
  });

  it("updates a subscription", async () => {
    const response = await send("PUT", "/customers/cus_7/subscription", {
      plan: "gold",
      prorate: true,
    });

    expect(response).toEqual({
      status: 200,
      body: { id: "sub_1", plan: "gold", status: "active" },
    });
    expect(client.updateSubscription).toHaveBeenCalledWith(
      "cus_7",
      { planId: "gold", prorate: true },
      { apiKey: "test-secret" }
    );
  });

  it("cancels a subscription", async () => {
    client.cancelSubscription.mockResolvedValueOnce(null);

    expect(await send("DELETE", "/customers/cus_7/subscription")).toEqual({
      status: 200,
      body: { subscription: null },
    });
  });
});
