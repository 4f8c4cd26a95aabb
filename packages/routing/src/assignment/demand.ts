import { NotFoundError } from "../domain/errors.js";

/** Reject demands for which flow conservation has no meaning */
export function requireValidDemand(demand: number): void {
  if (!Number.isFinite(demand) || demand < 0) {
    throw new NotFoundError(`Vehicle demand must be a non-negative number (got ${demand})`);
  }
}
