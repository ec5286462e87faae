/**
 * Payment provider contract and the adapter's data model.
 *
 * The gateway only knows this interface. A provider client owns its SDK:
 * it performs the calls and sorts whatever the SDK throws into one of the
 * six error kinds.
 */

import type { FieldMap, PaymentMode } from "../../config.js";

export type ErrorKind =
  | "card_error"
  | "invalid_request_error"
  | "authentication_error"
  | "connection_error"
  | "processor_error"
  | "unknown_error";

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; kind: ErrorKind; message: string };

export interface Credentials {
  mode: PaymentMode;
  secretKey: string;
}

export interface ChargeRequest {
  /** Major units, e.g. 19.99 for $19.99. Numeric strings are accepted. */
  amount?: number | string;
  currency?: string;
  description?: string;
  /** One-time payment token. */
  token?: string;
  /** Stored customer to charge instead of a token. */
  customerId?: string;
}

export interface CustomerRequest {
  token?: string;
  description?: string;
  email?: string;
  planId?: string;
}

export interface SubscriptionUpdate {
  planId: string;
  prorate?: boolean;
}

export type ChargeResult = Record<string, unknown>;

export interface CreatedCustomer {
  customerId: string;
}

export type ChargeSource = { token: string } | { customerId: string };

export interface ChargePayload {
  amount: number;
  currency: string;
  description: string | null;
  source: ChargeSource;
}

export interface CustomerPayload {
  token: string;
  description: string | null;
  email?: string;
  planId?: string;
}

export interface ProviderRequestOptions {
  apiKey: string;
}

/** Provider failure after classification. `detail` is for logs only. */
export interface ProviderFailure {
  kind: ErrorKind;
  detail: string;
  /** Provider-supplied human message (card and invalid request errors). */
  providerMessage?: string;
}

export interface ProviderRecord {
  id: string;
}

export interface PaymentProviderClient<
  TCharge extends ProviderRecord = ProviderRecord,
  TCustomer extends ProviderRecord = ProviderRecord,
  TSubscription = unknown
> {
  readonly name: string;
  createCharge(payload: ChargePayload, options: ProviderRequestOptions): Promise<TCharge>;
  createCustomer(payload: CustomerPayload, options: ProviderRequestOptions): Promise<TCustomer>;
  retrieveCustomer(customerId: string, options: ProviderRequestOptions): Promise<TCustomer>;
  /** Replace the current subscription with `update.planId`, or create one. */
  updateSubscription(
    customerId: string,
    update: SubscriptionUpdate,
    options: ProviderRequestOptions
  ): Promise<TSubscription>;
  /** Cancel the current subscription; null when the customer has none. */
  cancelSubscription(
    customerId: string,
    options: ProviderRequestOptions
  ): Promise<TSubscription | null>;
  classifyError(error: unknown): ProviderFailure;
}

export interface GatewaySettings {
  mode: PaymentMode;
  secretKeys: Partial<Record<PaymentMode, string>>;
  currency: string;
  fields: FieldMap;
}
