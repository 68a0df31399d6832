import { z } from "zod";

/**
 * Variáveis de runtime (log / observabilidade).
 * Credenciais de provedores NÃO ficam aqui: veja `loadConfig`.
 */
export const env = {
  NODE_ENV: process.env.NODE_ENV || "development",
  LOG_LEVEL: process.env.LOG_LEVEL,
  LOGTAIL_TOKEN: process.env.LOGTAIL_TOKEN,
  SENTRY_DSN: process.env.SENTRY_DSN,
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT,
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE,
};

export const AMOUNT_UNITS = ["cents", "reais"] as const;
export type AmountUnit = (typeof AMOUNT_UNITS)[number];

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("0.0.0.0"),
  NODE_ENV: z.string().default("development"),

  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_API_KEY_SID: optionalString,
  TWILIO_API_KEY_SECRET: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,

  GHOSTPAY_SECRET_KEY: optionalString,
  GHOSTPAY_API_URL: z.string().url().default("https://app.ghostspaysv1.com"),
  GHOSTPAY_AMOUNT_UNIT: z.enum(AMOUNT_UNITS).default("cents"),

  DUCKFY_WEBHOOK_TOKEN: optionalString,

  STORE_NAME: z.string().min(1).default("Nossa Loja"),
  DEFAULT_CHECKOUT_URL: optionalString,
});

export interface TwilioConfig {
  accountSid: string;
  phoneNumber: string;
  // Auth token OU par API Key (SID + secret)
  auth: { type: "token"; authToken: string } | { type: "apiKey"; apiKeySid: string; apiKeySecret: string };
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  /** null quando faltam credenciais: o envio de SMS fica desabilitado */
  twilio: TwilioConfig | null;
  missingTwilioCredentials: string[];
  ghostpay: {
    secretKey?: string;
    apiUrl: string;
    amountUnit: AmountUnit;
  };
  duckfy: {
    webhookToken?: string;
  };
  store: {
    name: string;
    checkoutUrl?: string;
  };
}

function resolveTwilioConfig(vars: z.infer<typeof envSchema>): { twilio: TwilioConfig | null; missing: string[] } {
  const missing: string[] = [];
  if (!vars.TWILIO_ACCOUNT_SID) missing.push("TWILIO_ACCOUNT_SID");
  if (!vars.TWILIO_PHONE_NUMBER) missing.push("TWILIO_PHONE_NUMBER");

  let auth: TwilioConfig["auth"] | null = null;
  if (vars.TWILIO_API_KEY_SID && vars.TWILIO_API_KEY_SECRET) {
    auth = { type: "apiKey", apiKeySid: vars.TWILIO_API_KEY_SID, apiKeySecret: vars.TWILIO_API_KEY_SECRET };
  } else if (vars.TWILIO_AUTH_TOKEN) {
    auth = { type: "token", authToken: vars.TWILIO_AUTH_TOKEN };
  } else {
    missing.push("TWILIO_AUTH_TOKEN");
  }

  if (!vars.TWILIO_ACCOUNT_SID || !vars.TWILIO_PHONE_NUMBER || !auth) {
    return { twilio: null, missing };
  }

  return {
    twilio: { accountSid: vars.TWILIO_ACCOUNT_SID, phoneNumber: vars.TWILIO_PHONE_NUMBER, auth },
    missing,
  };
}

/**
 * Monta a configuração da aplicação a partir do ambiente.
 * Chamado uma única vez no bootstrap; o resultado é repassado explicitamente.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const vars = envSchema.parse(source);
  const { twilio, missing } = resolveTwilioConfig(vars);

  return {
    port: vars.PORT,
    host: vars.HOST,
    nodeEnv: vars.NODE_ENV,
    twilio,
    missingTwilioCredentials: missing,
    ghostpay: {
      secretKey: vars.GHOSTPAY_SECRET_KEY,
      apiUrl: vars.GHOSTPAY_API_URL,
      amountUnit: vars.GHOSTPAY_AMOUNT_UNIT,
    },
    duckfy: {
      webhookToken: vars.DUCKFY_WEBHOOK_TOKEN,
    },
    store: {
      name: vars.STORE_NAME,
      checkoutUrl: vars.DEFAULT_CHECKOUT_URL,
    },
  };
}
