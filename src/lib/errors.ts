import type { ZodError } from "zod";

/**
 * Guidance contract error
 *
 * Raised when the simulation hands the bot input that breaks the per-tick
 * contract (empty terrain, missing player entry, bad configuration).
 */
export class GuidanceContractError extends Error {
  constructor(
    message: string,
    public field?: string,
  ) {
    super(message);
    this.name = "GuidanceContractError";
  }
}

/**
 * Convert the first zod issue into a contract error.
 */
export function fromZodError(context: string, error: ZodError): GuidanceContractError {
  const issue = error.issues[0];
  if (!issue) {
    return new GuidanceContractError(`${context}: invalid input`);
  }
  const field = issue.path.length > 0 ? issue.path.join(".") : undefined;
  const where = field ? ` at ${field}` : "";
  return new GuidanceContractError(`${context}${where}: ${issue.message}`, field);
}
