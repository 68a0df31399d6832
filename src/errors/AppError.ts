export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public field?: string;

  constructor(message: string, statusCode = 400, isOperational = true, field?: string) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.field = field;

    // Captura o stack trace, excluindo o construtor dessa classe
    Error.captureStackTrace(this, this.constructor);
    this.name = "AppError";
  }
}

/** Payload ausente, não-JSON ou com campos obrigatórios inválidos */
export class MalformedRequestError extends AppError {
  constructor(message: string, field?: string) {
    super(message, 400, true, field);
    this.name = "MalformedRequestError";
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string) {
    super(message, 403);
    this.name = "ForbiddenError";
  }
}

/** Falha no envio do SMS (provedor fora, número inválido, SMS desabilitado). Sem retry. */
export class DeliveryFailureError extends AppError {
  public readonly providerCode?: number | string;

  constructor(message: string, providerCode?: number | string) {
    super(message, 500);
    this.name = "DeliveryFailureError";
    this.providerCode = providerCode;
  }
}
