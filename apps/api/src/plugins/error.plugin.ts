/**
 * Error Handling Plugin for Fastify
 */
import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { InvoiceProcessingError, logger, type InvoiceProcessingErrorCode } from '@tariffline/core';
import { API_ERROR_CODES, type ErrorResponse } from '@tariffline/shared';
import { ZodError } from 'zod';

const errorPluginCallback: FastifyPluginAsync = async (fastify) => {
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const requestId = request.id;

    logger.error(
      {
        requestId,
        error: error.message,
        stack: error.stack,
        code: error.code,
        statusCode: error.statusCode,
      },
      'Request error'
    );

    if (error instanceof InvoiceProcessingError) {
      const body: ErrorResponse = { error: error.code, message: error.message };
      return reply.code(getProcessingErrorStatusCode(error.code)).send(body);
    }

    // Many routes use zod.parse directly
    if (error instanceof ZodError) {
      const body: ErrorResponse = {
        error: API_ERROR_CODES.VALIDATION_ERROR,
        message: 'Request validation failed',
        details: error.flatten(),
      };
      return reply.code(400).send(body);
    }

    if (error.validation) {
      const body: ErrorResponse = {
        error: API_ERROR_CODES.VALIDATION_ERROR,
        message: 'Request validation failed',
        details: error.validation,
      };
      return reply.code(400).send(body);
    }

    if (error.statusCode === 413 || error.code === 'FST_REQ_FILE_TOO_LARGE') {
      const body: ErrorResponse = {
        error: API_ERROR_CODES.FILE_TOO_LARGE,
        message: 'Uploaded file exceeds the maximum allowed size',
      };
      return reply.code(413).send(body);
    }

    const statusCode = error.statusCode || 500;
    const isServerError = statusCode >= 500;
    const body: ErrorResponse = {
      error: isServerError ? API_ERROR_CODES.INTERNAL_ERROR : API_ERROR_CODES.REQUEST_ERROR,
      message: isServerError ? 'An unexpected error occurred' : error.message,
    };
    return reply.code(statusCode).send(body);
  });

  fastify.setNotFoundHandler((request, reply) => {
    const body: ErrorResponse = {
      error: API_ERROR_CODES.NOT_FOUND,
      message: `Route ${request.method} ${request.url} not found`,
    };
    reply.code(404).send(body);
  });
};

function getProcessingErrorStatusCode(code: InvoiceProcessingErrorCode): number {
  switch (code) {
    case 'NO_FILES':
      return 400;
    case 'NO_READABLE_FILES':
      return 422;
  }
}

export const errorPlugin = fp(errorPluginCallback, {
  name: 'error',
});
