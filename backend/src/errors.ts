/**
 * Service error taxonomy. Each error carries the HTTP status the routes answer
 * with and a stable machine-readable code.
 */
export class AppError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

/** Start/end rejected before any provider call (out of bounds, identical points). */
export class InvalidRouteRequestError extends AppError {
  constructor(message: string) {
    super(message, 400, "invalid_route_request");
  }
}

/** The routing provider could not be reached or answered with an error. */
export class ProviderUnavailableError extends AppError {
  readonly providerStatus: number | null;

  constructor(message: string, providerStatus: number | null = null) {
    super(message, 502, "provider_unavailable");
    this.providerStatus = providerStatus;
  }
}

/** The provider answered but had no usable route between the two points. */
export class NoRouteFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, "no_route_found");
  }
}

export class InvalidGeometryError extends AppError {
  constructor(message: string) {
    super(message, 500, "invalid_geometry");
  }
}

/** Flood-zone source unusable. Fatal at startup. */
export class DataLoadError extends AppError {
  constructor(message: string) {
    super(message, 500, "data_load_failed");
  }
}
