/**
 * Stripe payment provider.
 *
 * Wraps the official `stripe` package behind PaymentProviderClient. The
 * library is imported lazily so a missing install surfaces as a
 * ConfigurationError when the gateway is built, not on the first charge.
 *
 * Subscription changes go through the Subscriptions API: "update" moves the
 * customer's current subscription to the new price (or creates one), "cancel"
 * cancels the current one. "Current" is any subscription not yet canceled.
 */

import type Stripe from "stripe";
import type { Logger } from "../logger.js";
import { ConfigurationError } from "./errors.js";
import { PaymentGateway, resolveCredentials } from "./gateway.js";
import type {
  ChargePayload,
  CustomerPayload,
  GatewaySettings,
  PaymentProviderClient,
  ProviderFailure,
  ProviderRequestOptions,
  SubscriptionUpdate,
} from "./types.js";

export type StripeLibrary = typeof Stripe;
export type StripeCustomerRecord = Stripe.Customer | Stripe.DeletedCustomer;
export type StripePaymentGateway = PaymentGateway<
  Stripe.Charge,
  StripeCustomerRecord,
  Stripe.Subscription
>;

type ProrationBehavior = "create_prorations" | "none";

function prorationBehavior(prorate: boolean | undefined): ProrationBehavior | undefined {
  if (prorate === undefined) return undefined;
  return prorate ? "create_prorations" : "none";
}

export async function loadStripeLibrary(): Promise<StripeLibrary> {
  try {
    const library = await import("stripe");
    return library.default;
  } catch (error) {
    throw new ConfigurationError(
      "Stripe API library is missing or could not be loaded.",
      { cause: error }
    );
  }
}

export class StripeProviderClient
  implements
    PaymentProviderClient<Stripe.Charge, StripeCustomerRecord, Stripe.Subscription>
{
  name = "stripe";
  private readonly stripe: Stripe;
  private readonly errors: StripeLibrary["errors"];

  constructor(stripe: Stripe, errors: StripeLibrary["errors"]) {
    this.stripe = stripe;
    this.errors = errors;
  }

  async createCharge(
    payload: ChargePayload,
    options: ProviderRequestOptions
  ): Promise<Stripe.Charge> {
    const params: Stripe.ChargeCreateParams = {
      amount: payload.amount,
      currency: payload.currency,
    };
    if (payload.description !== null) params.description = payload.description;
    if ("token" in payload.source) {
      params.source = payload.source.token;
    } else {
      params.customer = payload.source.customerId;
    }

    return this.stripe.charges.create(params, { apiKey: options.apiKey });
  }

  async createCustomer(
    payload: CustomerPayload,
    options: ProviderRequestOptions
  ): Promise<Stripe.Customer> {
    const params: Stripe.CustomerCreateParams = { source: payload.token };
    if (payload.description !== null) params.description = payload.description;
    if (payload.email) params.email = payload.email;

    const customer = await this.stripe.customers.create(params, {
      apiKey: options.apiKey,
    });

    // Customers API no longer takes a plan; subscribe right after creation.
    // Remove the customer again if the subscription fails.
    if (payload.planId) {
      try {
        await this.stripe.subscriptions.create(
          { customer: customer.id, items: [{ price: payload.planId }] },
          { apiKey: options.apiKey }
        );
      } catch (error) {
        await this.stripe.customers.del(customer.id, {}, { apiKey: options.apiKey });
        throw error;
      }
    }

    return customer;
  }

  async retrieveCustomer(
    customerId: string,
    options: ProviderRequestOptions
  ): Promise<StripeCustomerRecord> {
    return this.stripe.customers.retrieve(customerId, undefined, {
      apiKey: options.apiKey,
    });
  }

  async updateSubscription(
    customerId: string,
    update: SubscriptionUpdate,
    options: ProviderRequestOptions
  ): Promise<Stripe.Subscription> {
    const proration = prorationBehavior(update.prorate);
    const active = await this.findActiveSubscription(customerId, options);

    if (active) {
      const currentItem = active.items.data[0];
      const params: Stripe.SubscriptionUpdateParams = {
        items: [
          currentItem
            ? { id: currentItem.id, price: update.planId }
            : { price: update.planId },
        ],
      };
      if (proration) params.proration_behavior = proration;
      return this.stripe.subscriptions.update(active.id, params, {
        apiKey: options.apiKey,
      });
    }

    const params: Stripe.SubscriptionCreateParams = {
      customer: customerId,
      items: [{ price: update.planId }],
    };
    if (proration) params.proration_behavior = proration;
    return this.stripe.subscriptions.create(params, { apiKey: options.apiKey });
  }

  async cancelSubscription(
    customerId: string,
    options: ProviderRequestOptions
  ): Promise<Stripe.Subscription | null> {
    const active = await this.findActiveSubscription(customerId, options);
    if (!active) return null;

    return this.stripe.subscriptions.cancel(active.id, {}, {
      apiKey: options.apiKey,
    });
  }

  classifyError(error: unknown): ProviderFailure {
    const errors = this.errors;

    if (error instanceof errors.StripeCardError) {
      return {
        kind: "card_error",
        detail: `${error.rawType ?? error.type}: ${error.code ?? "no_code"}: ${error.message}`,
        providerMessage: error.message,
      };
    }
    if (error instanceof errors.StripeInvalidRequestError) {
      return {
        kind: "invalid_request_error",
        detail: `${error.rawType ?? error.type}: ${error.message}`,
        providerMessage: error.message,
      };
    }
    if (error instanceof errors.StripeAuthenticationError) {
      return { kind: "authentication_error", detail: "API key rejected!" };
    }
    if (error instanceof errors.StripeConnectionError) {
      return { kind: "connection_error", detail: "Stripe could not be reached." };
    }
    if (error instanceof errors.StripeError) {
      return {
        kind: "processor_error",
        detail: `${error.rawType ?? error.type}: Stripe could be down.`,
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    return { kind: "unknown_error", detail: `Unknown error: ${message}` };
  }

  private async findActiveSubscription(
    customerId: string,
    options: ProviderRequestOptions
  ): Promise<Stripe.Subscription | undefined> {
    // The default listing leaves out canceled subscriptions only, so trialing
    // and past_due ones are found too.
    const subscriptions = await this.stripe.subscriptions.list(
      { customer: customerId, limit: 1 },
      { apiKey: options.apiKey }
    );
    return subscriptions.data[0];
  }
}

export function createStripeProviderClient(
  library: StripeLibrary,
  secretKey: string
): StripeProviderClient {
  // Retries belong to the caller; one request per operation.
  const stripe = new library(secretKey, { maxNetworkRetries: 0 });
  return new StripeProviderClient(stripe, library.errors);
}

export interface CreatePaymentGatewayOptions {
  logger?: Logger;
  loadLibrary?: () => Promise<StripeLibrary>;
}

/**
 * Build a Stripe-backed gateway. Throws ConfigurationError when the key for
 * the selected mode is missing or the Stripe library cannot be loaded.
 */
export async function createPaymentGateway(
  settings: GatewaySettings,
  options: CreatePaymentGatewayOptions = {}
): Promise<StripePaymentGateway> {
  const credentials = resolveCredentials(settings);
  const library = await (options.loadLibrary ?? loadStripeLibrary)();
  const client = createStripeProviderClient(library, credentials.secretKey);
  return new PaymentGateway(settings, client, options.logger);
}
