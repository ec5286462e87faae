import { afterEach, describe, expect, it, vi } from "vitest";

afterEach(() => {
  vi.doUnmock("stripe");
  vi.resetModules();
});

describe("loadStripeLibrary", () => {
  it("returns the Stripe constructor with its error classes", async () => {
    const { loadStripeLibrary } = await import("../src/services/payment/stripe.js");

    const library = await loadStripeLibrary();

    expect(typeof library).toBe("function");
    expect(typeof library.errors.StripeCardError).toBe("function");
  });

  it("reports a missing install as a configuration error", async () => {
    vi.doMock("stripe", () => {
      throw new Error("Cannot find package 'stripe'");
    });

    const { loadStripeLibrary } = await import("../src/services/payment/stripe.js");
    const { ConfigurationError } = await import("../src/services/payment/errors.js");

    const attempt = loadStripeLibrary();
    await expect(attempt).rejects.toBeInstanceOf(ConfigurationError);
    await expect(attempt).rejects.toThrow(
      "Stripe API library is missing or could not be loaded."
    );
  });
});
