/**
 * Centralized configuration for the payment gateway adapter.
 *
 * Reads all environment variables once and exports a typed config object.
 * Secret keys are kept per mode; the gateway picks the one matching `mode`
 * when it is constructed.
 */

import { z } from "zod";

export type PaymentMode = "Test" | "Live";

/** local_field => provider_field, or local_field => { subobject: field } */
export type FieldMap = Record<string, string | Record<string, string>>;

export interface Config {
  mode: PaymentMode;
  secretKeys: Partial<Record<PaymentMode, string>>;
  currency: string;
  fields: FieldMap;
  serverPort: number;
}

let _config: Config | undefined;

export const DEFAULT_MODE: PaymentMode = "Test";
export const DEFAULT_CURRENCY = "usd";
export const DEFAULT_FIELDS: FieldMap = { id: "id" };
const DEFAULT_SERVER_PORT = 3141;

const fieldMapSchema = z.record(
  z.union([z.string().min(1), z.record(z.string().min(1))])
);

function parseMode(rawValue: string | undefined): PaymentMode {
  if (!rawValue) return DEFAULT_MODE;

  const normalized = rawValue.trim().toLowerCase();
  if (normalized === "test") return "Test";
  if (normalized === "live") return "Live";

  throw new Error("PAYMENT_MODE must be one of: Test, Live");
}

function parseCurrency(rawValue: string | undefined): string {
  const normalized = rawValue?.trim().toLowerCase();
  if (!normalized) return DEFAULT_CURRENCY;

  if (!/^[a-z]{3}$/.test(normalized)) {
    throw new Error("PAYMENT_CURRENCY must be a three-letter ISO currency code");
  }
  return normalized;
}

export function parseFieldMap(rawValue: string | undefined): FieldMap {
  if (!rawValue?.trim()) return { ...DEFAULT_FIELDS };

  let parsed: unknown;
  try {
    parsed = JSON.parse(rawValue);
  } catch {
    throw new Error("PAYMENT_RESULT_FIELDS must be valid JSON");
  }

  const result = fieldMapSchema.safeParse(parsed);
  if (!result.success || Object.keys(result.data).length === 0) {
    throw new Error(
      'PAYMENT_RESULT_FIELDS must map local names to a field name or a {"object": "field"} pair'
    );
  }
  return result.data;
}

function parsePositiveInteger(
  rawValue: string | undefined,
  envName: string,
  defaultValue: number
): number {
  if (!rawValue) return defaultValue;

  const parsed = Number(rawValue);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${envName} must be a positive integer`);
  }

  return parsed;
}

function optionalSecret(rawValue: string | undefined): string | undefined {
  const trimmed = rawValue?.trim();
  return trimmed ? trimmed : undefined;
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return {
    mode: parseMode(env.PAYMENT_MODE),
    secretKeys: {
      Test: optionalSecret(env.PAYMENT_TEST_SECRET_KEY),
      Live: optionalSecret(env.PAYMENT_LIVE_SECRET_KEY),
    },
    currency: parseCurrency(env.PAYMENT_CURRENCY),
    fields: parseFieldMap(env.PAYMENT_RESULT_FIELDS),
    serverPort: parsePositiveInteger(
      env.PAYMENT_SERVER_PORT,
      "PAYMENT_SERVER_PORT",
      DEFAULT_SERVER_PORT
    ),
  };
}

export function loadConfig(): Config {
  if (_config) return _config;

  _config = parseConfig(process.env);
  return _config;
}
