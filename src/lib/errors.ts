export type ErrorKind =
  | "bad_request"
  | "validation"
  | "unauthorized"
  | "forbidden"
  | "not_found"
  | "method_not_allowed"
  | "conflict";

const STATUS: Record<ErrorKind, number> = {
  bad_request: 400,
  unauthorized: 401,
  forbidden: 403,
  not_found: 404,
  method_not_allowed: 405,
  conflict: 409,
  validation: 422,
};

export interface ErrorDetail {
  code: string;
  message: string;
  details?: Array<{ field: string; message: string }>;
}

/**
 * Expected failure of a portal operation. Functions turn it into an
 * `{ error: ErrorDetail }` response with the status for its kind.
 */
export class PortalError extends Error {
  readonly kind: ErrorKind;
  readonly details?: ErrorDetail["details"];

  constructor(kind: ErrorKind, message: string, details?: ErrorDetail["details"]) {
    super(message);
    this.name = "PortalError";
    this.kind = kind;
    this.details = details;
  }

  get status(): number {
    return STATUS[this.kind];
  }

  get code(): string {
    return this.kind.toUpperCase() + (this.kind === "validation" ? "_ERROR" : "");
  }

  toDetail(): ErrorDetail {
    const detail: ErrorDetail = { code: this.code, message: this.message };
    if (this.details) detail.details = this.details;
    return detail;
  }
}

export const notFound = (what: string) => new PortalError("not_found", `${what} not found`);
export const forbidden = (message: string) => new PortalError("forbidden", message);
export const unauthorized = (message = "Could not validate credentials") =>
  new PortalError("unauthorized", message);
export const conflict = (message: string) => new PortalError("conflict", message);
