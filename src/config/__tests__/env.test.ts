import { describe, expect, it } from "vitest";
import { loadConfig } from "../env.js";

describe("env - loadConfig", () => {
  it("should apply defaults and disable SMS without credentials", () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.host).toBe("0.0.0.0");
    expect(config.twilio).toBeNull();
    expect(config.missingTwilioCredentials).toEqual(["TWILIO_ACCOUNT_SID", "TWILIO_PHONE_NUMBER", "TWILIO_AUTH_TOKEN"]);
    expect(config.ghostpay).toEqual({
      secretKey: undefined,
      apiUrl: "https://app.ghostspaysv1.com",
      amountUnit: "cents",
    });
    expect(config.duckfy.webhookToken).toBeUndefined();
    expect(config.store).toEqual({ name: "Nossa Loja", checkoutUrl: undefined });
  });

  it("should build the Twilio config with auth token", () => {
    const config = loadConfig({
      PORT: "8080",
      TWILIO_ACCOUNT_SID: "ACtest",
      TWILIO_AUTH_TOKEN: "test-secret",
      TWILIO_PHONE_NUMBER: "+15550001111",
    });

    expect(config.port).toBe(8080);
    expect(config.missingTwilioCredentials).toEqual([]);
    expect(config.twilio).toEqual({
      accountSid: "ACtest",
      phoneNumber: "+15550001111",
      auth: { type: "token", authToken: "test-secret" },
    });
  });

  it("should prefer the API key pair over the auth token", () => {
    const config = loadConfig({
      TWILIO_ACCOUNT_SID: "ACtest",
      TWILIO_AUTH_TOKEN: "test-secret",
      TWILIO_API_KEY_SID: "SKtest",
      TWILIO_API_KEY_SECRET: "test-key-secret",
      TWILIO_PHONE_NUMBER: "+15550001111",
    });

    expect(config.twilio?.auth).toEqual({ type: "apiKey", apiKeySid: "SKtest", apiKeySecret: "test-key-secret" });
  });

  it("should treat blank values as missing", () => {
    const config = loadConfig({ TWILIO_ACCOUNT_SID: "   ", DUCKFY_WEBHOOK_TOKEN: "" });

    expect(config.missingTwilioCredentials).toContain("TWILIO_ACCOUNT_SID");
    expect(config.duckfy.webhookToken).toBeUndefined();
  });

  it("should read store and gateway settings", () => {
    const config = loadConfig({
      STORE_NAME: "Loja Teste",
      DEFAULT_CHECKOUT_URL: "https://loja.example.com/pix",
      GHOSTPAY_AMOUNT_UNIT: "reais",
      GHOSTPAY_SECRET_KEY: "test-secret",
      GHOSTPAY_API_URL: "https://sandbox.ghostpay.test",
    });

    expect(config.store).toEqual({ name: "Loja Teste", checkoutUrl: "https://loja.example.com/pix" });
    expect(config.ghostpay).toEqual({
      secretKey: "test-secret",
      apiUrl: "https://sandbox.ghostpay.test",
      amountUnit: "reais",
    });
  });

  it("should reject invalid values", () => {
    expect(() => loadConfig({ GHOSTPAY_AMOUNT_UNIT: "dolares" })).toThrow();
    expect(() => loadConfig({ PORT: "abc" })).toThrow();
  });
});
