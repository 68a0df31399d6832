import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { ZodError } from "zod";
import { logger } from "../config/logger.js";
import { captureException } from "../config/sentry.js";
import { AppError, DeliveryFailureError } from "./AppError.js";

export function globalErrorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
    const { method, url } = request;

    // 1. Erro Conhecido (AppError e derivados)
    if (error instanceof AppError) {
        const log = {
            msg: error instanceof DeliveryFailureError ? "Falha na entrega do SMS" : "Erro Operacional",
            error: error.message,
            statusCode: error.statusCode,
            method,
            url
        };
        if (error.statusCode >= 500) {
            logger.error(log);
        } else {
            logger.warn(log);
        }
        return reply.status(error.statusCode).send({
            status: "error",
            message: error.message
        });
    }

    // 1.5 Erro de Validação Zod
    if (error instanceof ZodError) {
        logger.warn({
            msg: "Erro de Validação (Zod)",
            details: error.issues,
            method,
            url
        });
        return reply.status(400).send({
            status: "error",
            message: "Dados de entrada inválidos.",
            details: error.issues
        });
    }

    // 2. Erros do próprio Fastify (JSON inválido, content-type não suportado, schema)
    const { statusCode } = error;
    if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
        logger.warn({
            msg: "Requisição rejeitada",
            error: error.message,
            statusCode,
            method,
            url
        });
        return reply.status(statusCode).send({
            status: "error",
            message: error.message
        });
    }

    // 3. Erro Desconhecido (Bug / Infra)
    captureException(error, { method, url });
    logger.error({
        msg: "Erro Interno (500)",
        error: error.message,
        stack: error.stack,
        method,
        url
    });

    return reply.status(500).send({
        status: "error",
        message: "Ocorreu um erro interno no servidor."
    });
}
