export type WeatherErrorKind = 'InvalidInput' | 'UpstreamError' | 'NoStationsFound';

export class WeatherPipelineError extends Error {
  readonly kind: WeatherErrorKind;
  readonly statusCode: number;

  constructor(kind: WeatherErrorKind, message: string, statusCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.statusCode = statusCode;
  }
}

export class InvalidInputError extends WeatherPipelineError {
  constructor(message: string, options?: ErrorOptions) {
    super('InvalidInput', message, 400, options);
  }
}

/** Raised before any network activity when CLI/runtime configuration is unusable. */
export class ConfigError extends InvalidInputError {}

interface UpstreamErrorOptions extends ErrorOptions {
  status?: number | null;
}

export class UpstreamError extends WeatherPipelineError {
  /** HTTP status returned by the upstream, when one was received. */
  readonly upstreamStatus: number | null;

  constructor(message: string, { status = null, ...options }: UpstreamErrorOptions = {}) {
    super('UpstreamError', message, 502, options);
    this.upstreamStatus = status;
  }
}

export class NoStationsFoundError extends WeatherPipelineError {
  constructor(message: string = 'no observation stations found') {
    super('NoStationsFound', message, 502);
  }
}

export const isWeatherPipelineError = (error: unknown): error is WeatherPipelineError => error instanceof WeatherPipelineError;

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
