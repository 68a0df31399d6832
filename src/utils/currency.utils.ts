import type { AmountUnit } from "../config/env.js";

/**
 * Converte o valor recebido do gateway para reais.
 * `cents` => valor inteiro em centavos (1050 => 10.5)
 */
export const toReais = (amount: number, unit: AmountUnit): number => {
  if (unit === "cents") return amount / 100;
  return amount;
};
