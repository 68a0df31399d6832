import { describe, expect, it, vi } from "vitest";
import { loadConfig } from "../../config/env.js";
import { DeliveryFailureError } from "../../errors/AppError.js";
import { createSmsService, SmsService, type MessagingClient } from "../sms.service.js";

function fakeClient(create: MessagingClient["messages"]["create"]): MessagingClient {
  return { messages: { create } };
}

describe("SmsService", () => {
  it("should send from the configured number", async () => {
    const create = vi.fn<MessagingClient["messages"]["create"]>().mockResolvedValue({ sid: "SM1", status: "queued" });
    const service = new SmsService(fakeClient(create), "+15550001111");

    const result = await service.send("+5511999999999", "Olá!");

    expect(result).toEqual({ sid: "SM1", status: "queued" });
    expect(create).toHaveBeenCalledWith({ body: "Olá!", from: "+15550001111", to: "+5511999999999" });
  });

  it("should wrap provider errors in DeliveryFailureError", async () => {
    const providerError = Object.assign(new Error("The 'To' number is not a valid phone number."), { code: 21211 });
    const create = vi.fn<MessagingClient["messages"]["create"]>().mockRejectedValue(providerError);
    const service = new SmsService(fakeClient(create), "+15550001111");

    const error = await service.send("+123", "Olá!").then(() => null, (err: unknown) => err);

    expect(error).toBeInstanceOf(DeliveryFailureError);
    if (error instanceof DeliveryFailureError) {
      expect(error.statusCode).toBe(500);
      expect(error.providerCode).toBe(21211);
      expect(error.message).toBe("Falha ao enviar lembrete por SMS.");
    }
    expect(create).toHaveBeenCalledTimes(1);
  });

  it("should fail when SMS is not configured", async () => {
    const service = new SmsService(null, null);

    expect(service.enabled).toBe(false);
    await expect(service.send("+5511999999999", "Olá!")).rejects.toThrow("Envio de SMS não configurado.");
  });
});

describe("createSmsService", () => {
  it("should disable SMS when credentials are missing", () => {
    const service = createSmsService(loadConfig({ TWILIO_ACCOUNT_SID: "ACtest" }));

    expect(service.enabled).toBe(false);
  });

  it("should build an enabled service with token credentials", () => {
    const service = createSmsService(loadConfig({
      TWILIO_ACCOUNT_SID: "ACtest",
      TWILIO_AUTH_TOKEN: "test-secret",
      TWILIO_PHONE_NUMBER: "+15550001111",
    }));

    expect(service.enabled).toBe(true);
  });
});
