import type { ErrorKind, ProviderFailure } from "./types.js";

/** Thrown for misconfiguration and broken call contracts; never returned. */
export class PaymentGatewayError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PaymentGatewayError {}

export type ValidationErrorCode =
  | "missing_payment_source"
  | "ambiguous_payment_source"
  | "invalid_amount"
  | "missing_payment_token"
  | "missing_customer_id"
  | "missing_plan";

export class ValidationError extends PaymentGatewayError {
  readonly code: ValidationErrorCode;

  constructor(code: ValidationErrorCode, message: string) {
    super(message);
    this.code = code;
  }
}

const CANNED_MESSAGES: Record<ErrorKind, string> = {
  card_error: "Your card could not be charged.",
  invalid_request_error: "The payment request was invalid.",
  authentication_error: "Payment processor API key error.",
  connection_error:
    "Network communication with payment processor failed, try again later.",
  processor_error: "Payment processor error, try again later.",
  unknown_error: "There was an error, try again later.",
};

/**
 * Message safe to show the caller. Card and invalid-request failures pass the
 * provider's human message through; every other kind gets a fixed sentence.
 */
export function userMessageFor(failure: ProviderFailure): string {
  if (
    (failure.kind === "card_error" || failure.kind === "invalid_request_error") &&
    failure.providerMessage?.trim()
  ) {
    return failure.providerMessage;
  }
  return CANNED_MESSAGES[failure.kind];
}
