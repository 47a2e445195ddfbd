import type { FastifyReply } from 'fastify';
import { PipelineErrorCode, type PipelineError } from '@invoice-intake/core';

/**
 * Lookups that find nothing are 404, refusals about the attachment itself
 * are 422, and failures of the mail service or LLM are 502.
 */
export function statusForPipelineError(error: PipelineError): number {
  switch (error.code) {
    case PipelineErrorCode.NO_CANDIDATES:
    case PipelineErrorCode.NOT_FOUND:
      return 404;
    case PipelineErrorCode.LOW_CONFIDENCE:
    case PipelineErrorCode.DECODE_FAILED:
      return 422;
    case PipelineErrorCode.STORAGE_FAILED:
      return 500;
    default:
      return error.kind ? 502 : 500;
  }
}

export function sendPipelineError(reply: FastifyReply, error: PipelineError): FastifyReply {
  return reply.status(statusForPipelineError(error)).send({
    error: error.code,
    message: error.message,
    ...(error.kind ? { kind: error.kind } : {}),
    ...(error.details ? { details: error.details } : {}),
  });
}

export function sendStorageError(reply: FastifyReply, error: Error): FastifyReply {
  return reply.status(500).send({ error: PipelineErrorCode.STORAGE_FAILED, message: error.message });
}
