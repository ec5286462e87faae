/**
 * Payment gateway adapter.
 *
 * Validates caller input, shapes the provider payload, makes one provider
 * call and turns the outcome into an OperationResult. Broken call contracts
 * (missing token, bad amount) throw ValidationError before the provider is
 * touched; provider failures come back as `{ ok: false }` with a message that
 * is safe to show the end user. Raw provider errors only reach the log.
 */

import type { FieldMap, PaymentMode } from "../../config.js";
import { consoleLogger, type Logger } from "../logger.js";
import { ConfigurationError, ValidationError, userMessageFor } from "./errors.js";
import { formatChargeResult } from "./field-map.js";
import type {
  ChargePayload,
  ChargeRequest,
  ChargeResult,
  ChargeSource,
  CreatedCustomer,
  Credentials,
  CustomerPayload,
  CustomerRequest,
  GatewaySettings,
  OperationResult,
  PaymentProviderClient,
  ProviderRecord,
  SubscriptionUpdate,
} from "./types.js";

export const PAYMENT_LOG_CHANNEL = "payment";

function isPresent(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

export function resolveCredentials(
  settings: Pick<GatewaySettings, "mode" | "secretKeys">
): Credentials {
  const secretKey = settings.secretKeys[settings.mode];
  if (!isPresent(secretKey)) {
    throw new ConfigurationError(
      `Payment provider API key is not set for ${settings.mode} mode.`
    );
  }
  return { mode: settings.mode, secretKey: secretKey.trim() };
}

/** Major units to integer minor units (19.99 -> 1999). */
export function toMinorUnits(amount: number | string | undefined): number {
  const numeric =
    typeof amount === "string"
      ? amount.trim() === ""
        ? Number.NaN
        : Number(amount)
      : amount;

  if (numeric === undefined || !Number.isFinite(numeric) || numeric <= 0) {
    throw new ValidationError(
      "invalid_amount",
      "Amount is required and must be a positive number."
    );
  }

  const minor = Math.round(numeric * 100);
  if (minor < 1) {
    throw new ValidationError(
      "invalid_amount",
      "Amount must be at least one minor currency unit."
    );
  }
  return minor;
}

function chargeSourceFor(request: ChargeRequest): ChargeSource {
  const { token, customerId } = request;

  if (isPresent(token)) {
    if (isPresent(customerId)) {
      throw new ValidationError(
        "ambiguous_payment_source",
        "Provide either a payment token or a stored customer id, not both."
      );
    }
    return { token };
  }
  if (isPresent(customerId)) {
    return { customerId };
  }

  throw new ValidationError(
    "missing_payment_source",
    "A payment token or a stored customer id is required to charge."
  );
}

function copyFieldMap(fields: FieldMap): FieldMap {
  return Object.fromEntries(
    Object.entries(fields).map(([local, source]) => [
      local,
      typeof source === "string" ? source : { ...source },
    ])
  );
}

function requireCustomerId(customerId: string): string {
  if (!isPresent(customerId)) {
    throw new ValidationError("missing_customer_id", "A customer id is required.");
  }
  return customerId.trim();
}

export class PaymentGateway<
  TCharge extends ProviderRecord = ProviderRecord,
  TCustomer extends ProviderRecord = ProviderRecord,
  TSubscription = unknown
> {
  readonly mode: PaymentMode;
  private readonly credentials: Credentials;
  private readonly currency: string;
  private readonly fields: FieldMap;
  private readonly client: PaymentProviderClient<TCharge, TCustomer, TSubscription>;
  private readonly logger: Logger;

  constructor(
    settings: GatewaySettings,
    client: PaymentProviderClient<TCharge, TCustomer, TSubscription>,
    logger: Logger = consoleLogger
  ) {
    this.credentials = resolveCredentials(settings);
    this.mode = this.credentials.mode;
    this.currency = settings.currency;
    this.fields = copyFieldMap(settings.fields);
    this.client = client;
    this.logger = logger;
  }

  async charge(request: ChargeRequest): Promise<OperationResult<ChargeResult>> {
    const source = chargeSourceFor(request);
    const payload: ChargePayload = {
      amount: toMinorUnits(request.amount),
      currency: request.currency?.trim().toLowerCase() || this.currency,
      description: request.description ?? null,
      source,
    };

    return this.invoke(
      "charge",
      () => this.client.createCharge(payload, this.requestOptions()),
      (charge) => {
        this.logger.info(`charge id ${charge.id}`, PAYMENT_LOG_CHANNEL);
        return formatChargeResult(charge, this.fields);
      }
    );
  }

  async createCustomer(
    request: CustomerRequest
  ): Promise<OperationResult<CreatedCustomer>> {
    if (!isPresent(request.token)) {
      throw new ValidationError(
        "missing_payment_token",
        "A payment token is required to create a customer."
      );
    }

    const payload: CustomerPayload = {
      token: request.token,
      description: request.description ?? null,
    };
    if (isPresent(request.email)) payload.email = request.email;
    if (isPresent(request.planId)) payload.planId = request.planId;

    return this.invoke(
      "createCustomer",
      () => this.client.createCustomer(payload, this.requestOptions()),
      (customer) => {
        this.logger.info(`customer id ${customer.id}`, PAYMENT_LOG_CHANNEL);
        return { customerId: customer.id };
      }
    );
  }

  /** Returns the provider's subscription as-is; no field map applies. */
  async updateSubscription(
    customerId: string,
    update: SubscriptionUpdate
  ): Promise<OperationResult<TSubscription>> {
    const id = requireCustomerId(customerId);
    if (!isPresent(update.planId)) {
      throw new ValidationError("missing_plan", "A plan id is required.");
    }

    return this.invoke(
      "updateSubscription",
      async () => {
        const options = this.requestOptions();
        const customer = await this.client.retrieveCustomer(id, options);
        return this.client.updateSubscription(customer.id, update, options);
      },
      (subscription) => subscription
    );
  }

  /** Cancels the current subscription. Succeeds with null when there is none. */
  async cancelSubscription(
    customerId: string
  ): Promise<OperationResult<TSubscription | null>> {
    const id = requireCustomerId(customerId);

    return this.invoke(
      "cancelSubscription",
      async () => {
        const options = this.requestOptions();
        const customer = await this.client.retrieveCustomer(id, options);
        return this.client.cancelSubscription(customer.id, options);
      },
      (subscription) => subscription
    );
  }

  async retrieveCustomer(customerId: string): Promise<OperationResult<TCustomer>> {
    const id = requireCustomerId(customerId);

    return this.invoke(
      "retrieveCustomer",
      () => this.client.retrieveCustomer(id, this.requestOptions()),
      (customer) => {
        this.logger.info(`customer id ${customer.id}`, PAYMENT_LOG_CHANNEL);
        return customer;
      }
    );
  }

  private requestOptions() {
    return { apiKey: this.credentials.secretKey };
  }

  private async invoke<TRaw, TValue>(
    operation: string,
    call: () => Promise<TRaw>,
    onSuccess: (raw: TRaw) => TValue
  ): Promise<OperationResult<TValue>> {
    let raw: TRaw;
    try {
      raw = await call();
    } catch (error) {
      const failure = this.client.classifyError(error);
      this.logger.error(
        `${operation}::${failure.kind}: ${failure.detail}`,
        PAYMENT_LOG_CHANNEL
      );
      return { ok: false, kind: failure.kind, message: userMessageFor(failure) };
    }

    return { ok: true, value: onSuccess(raw) };
  }
}
