/**
 * Pipeline error taxonomy
 *
 * Every predictable failure in the analysis pipeline is a PipelineError with a
 * kind; the HTTP layer maps kinds to status codes through sendPipelineError.
 */

import type { Response } from "express";

export const ErrorKind = {
  InvalidInput: "InvalidInput",
  InvalidState: "InvalidState",
  DependencyUnavailable: "DependencyUnavailable",
  NotFound: "NotFound",
} as const;

export type ErrorKind = typeof ErrorKind[keyof typeof ErrorKind];

export type ErrorDetails = Record<string, unknown>;

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InvalidInput: 400,
  NotFound: 404,
  InvalidState: 409,
  DependencyUnavailable: 503,
};

export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly details?: ErrorDetails;

  constructor(kind: ErrorKind, message: string, details?: ErrorDetails) {
    super(message);
    this.name = "PipelineError";
    this.kind = kind;
    this.details = details;
  }
}

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

export function invalidInput(message: string, details?: ErrorDetails): PipelineError {
  return new PipelineError(ErrorKind.InvalidInput, message, details);
}

export function invalidState(message: string, details?: ErrorDetails): PipelineError {
  return new PipelineError(ErrorKind.InvalidState, message, details);
}

export function notFound(message: string, details?: ErrorDetails): PipelineError {
  return new PipelineError(ErrorKind.NotFound, message, details);
}

export function dependencyUnavailable(message: string, details?: ErrorDetails): PipelineError {
  return new PipelineError(ErrorKind.DependencyUnavailable, message, details);
}

export function httpStatusFor(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function sendPipelineError(res: Response, error: PipelineError): void {
  res.status(httpStatusFor(error.kind)).json({
    message: error.message,
    kind: error.kind,
    ...(error.details ? { details: error.details } : {}),
  });
}
