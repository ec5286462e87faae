/**
 * Express routes for the payment gateway.
 *
 * POST   /charges                     Charge a token or stored customer
 * POST   /customers                   Create a customer from a token
 * GET    /customers/:id               Retrieve a customer
 * PUT    /customers/:id/subscription  Subscribe to a plan (replaces the current one)
 * DELETE /customers/:id/subscription  Cancel the current subscription
 *
 * Bodies use the snake_case field names web forms post (customer_id, plan).
 */

import { Router, type Request, type Response } from "express";
import { ValidationError } from "../services/payment/errors.js";
import type { PaymentGateway } from "../services/payment/gateway.js";
import type {
  ErrorKind,
  OperationResult,
  ProviderRecord,
} from "../services/payment/types.js";

function failureStatus(kind: ErrorKind): number {
  if (kind === "card_error") return 402;
  if (kind === "invalid_request_error") return 400;
  return 502;
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalAmount(value: unknown): number | string | undefined {
  return typeof value === "number" || typeof value === "string" ? value : undefined;
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === "boolean" ? value : undefined;
}

function bodyField(req: Request, field: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null) return undefined;
  return Reflect.get(body, field);
}

function sendResult<T>(
  res: Response,
  result: OperationResult<T>,
  successStatus: number,
  toBody: (value: T) => unknown
): void {
  if (!result.ok) {
    res.status(failureStatus(result.kind)).json({ error: result.message, kind: result.kind });
    return;
  }
  res.status(successStatus).json(toBody(result.value));
}

function sendError(res: Response, err: unknown, context: string): void {
  if (err instanceof ValidationError) {
    res.status(400).json({ error: err.message, code: err.code });
    return;
  }
  const msg = err instanceof Error ? err.message : String(err);
  console.error(`${context} error:`, msg);
  res.status(500).json({ error: "There was an error, try again later." });
}

export function createRoutes<
  TCharge extends ProviderRecord,
  TCustomer extends ProviderRecord,
  TSubscription
>(gateway: PaymentGateway<TCharge, TCustomer, TSubscription>): Router {
  const router = Router();

  /**
   * POST /charges
   * Body: { amount, token? | customer_id?, description?, currency? }
   * Returns: the charge projected through the configured field map
   */
  router.post("/charges", async (req: Request, res: Response) => {
    try {
      const result = await gateway.charge({
        amount: optionalAmount(bodyField(req, "amount")),
        token: optionalString(bodyField(req, "token")),
        customerId: optionalString(bodyField(req, "customer_id")),
        description: optionalString(bodyField(req, "description")),
        currency: optionalString(bodyField(req, "currency")),
      });
      sendResult(res, result, 201, (charge) => charge);
    } catch (err) {
      sendError(res, err, "Charge");
    }
  });

  /**
   * POST /customers
   * Body: { token, description?, email?, plan? }
   * Returns: { customer_id }
   */
  router.post("/customers", async (req: Request, res: Response) => {
    try {
      const result = await gateway.createCustomer({
        token: optionalString(bodyField(req, "token")),
        description: optionalString(bodyField(req, "description")),
        email: optionalString(bodyField(req, "email")),
        planId: optionalString(bodyField(req, "plan")),
      });
      sendResult(res, result, 201, (created) => ({ customer_id: created.customerId }));
    } catch (err) {
      sendError(res, err, "Customer");
    }
  });

  router.get("/customers/:id", async (req: Request, res: Response) => {
    try {
      const result = await gateway.retrieveCustomer(req.params.id ?? "");
      sendResult(res, result, 200, (customer) => customer);
    } catch (err) {
      sendError(res, err, "Customer");
    }
  });

  /**
   * PUT /customers/:id/subscription
   * Body: { plan, prorate? }
   * Returns: the provider's subscription object, unmodified
   */
  router.put("/customers/:id/subscription", async (req: Request, res: Response) => {
    try {
      const result = await gateway.updateSubscription(req.params.id ?? "", {
        planId: optionalString(bodyField(req, "plan")) ?? "",
        prorate: optionalBoolean(bodyField(req, "prorate")),
      });
      sendResult(res, result, 200, (subscription) => subscription);
    } catch (err) {
      sendError(res, err, "Subscription");
    }
  });

  router.delete("/customers/:id/subscription", async (req: Request, res: Response) => {
    try {
      const result = await gateway.cancelSubscription(req.params.id ?? "");
      sendResult(res, result, 200, (subscription) => ({ subscription }));
    } catch (err) {
      sendError(res, err, "Subscription");
    }
  });

  return router;
}
