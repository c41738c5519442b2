export type GeodesyErrorCode = "INVALID_PARAMETER" | "FORMAT_ERROR" | "CONVERGENCE_ERROR" | "CONFIGURATION_ERROR";

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class of every error raised by the geodesy core.
 */
export class GeodesyError extends Error {
  constructor(
    message: string,
    public readonly code: GeodesyErrorCode,
    public readonly details?: ErrorDetails
  ) {
    super(message);
    this.name = "GeodesyError";
  }
}

/**
 * A parameter outside its valid domain: zone, band, latitude, easting or northing.
 */
export class InvalidParameterError extends GeodesyError {
  constructor(
    message: string,
    public readonly parameter: string,
    details?: ErrorDetails
  ) {
    super(message, "INVALID_PARAMETER", { parameter, ...details });
    this.name = "InvalidParameterError";
  }
}

/**
 * Malformed text or a value that fails range verification.
 */
export class FormatError extends GeodesyError {
  constructor(
    message: string,
    public readonly input?: string,
    details?: ErrorDetails
  ) {
    super(message, "FORMAT_ERROR", { input, ...details });
    this.name = "FormatError";
  }
}

/**
 * An iterative solver hit its iteration ceiling (or diverged) without converging.
 */
export class ConvergenceError extends GeodesyError {
  constructor(
    message: string,
    public readonly solver: string,
    public readonly iterations: number,
    details?: ErrorDetails
  ) {
    super(message, "CONVERGENCE_ERROR", { solver, iterations, ...details });
    this.name = "ConvergenceError";
  }
}

export class ConfigurationError extends GeodesyError {
  constructor(message: string, details?: ErrorDetails) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

export type Result<T, E extends Error = GeodesyError> = { ok: true; value: T } | { ok: false; error: E };

export const toGeodesyError = (error: unknown): GeodesyError => {
  if (error instanceof GeodesyError) {
    return error;
  }
  return new GeodesyError(error instanceof Error ? error.message : String(error), "FORMAT_ERROR", {
    originalError: error instanceof Error ? error.name : typeof error
  });
};

export const attempt = <T>(fn: () => T): Result<T> => {
  try {
    return { ok: true, value: fn() };
  } catch (error) {
    return { ok: false, error: toGeodesyError(error) };
  }
};
