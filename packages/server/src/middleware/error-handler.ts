import type { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { FlowLabError } from "@flowlab/routing";
import type { ErrorResponse } from "../models/responses.js";

export interface MappedError {
  status: number;
  body: ErrorResponse;
}

/** HTTP status and body for a thrown value; null for non-errors */
export function mapError(err: unknown): MappedError | null {
  if (err instanceof ZodError) {
    return {
      status: 422,
      body: { message: "Validation failed", details: err.issues },
    };
  }

  if (err instanceof FlowLabError) {
    return { status: err.status, body: { message: err.message } };
  }

  if (err instanceof Error) {
    // body-parser sets status on malformed JSON
    const status = "status" in err && typeof err.status === "number" ? err.status : 500;
    return { status, body: { message: err.message } };
  }

  return null;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  const mapped = mapError(err);
  if (!mapped) {
    next(err);
    return;
  }

  if (err instanceof ZodError) {
    console.warn(`[validation] ${JSON.stringify(err.issues)}`);
  } else {
    console.error(`[error] ${mapped.body.message}`);
  }
  res.status(mapped.status).json(mapped.body);
}
