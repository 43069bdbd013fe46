/**
 * Errors that map to an HTTP status. Anything else surfaces as a 500.
 */
export class AppError extends Error {
  constructor(
    message: string,
    readonly statusCode: number,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 404, details);
  }
}

/**
 * A categorical input the salary model never saw during training
 */
export class UnknownCategoryError extends AppError {
  constructor(
    readonly feature: string,
    readonly value: string
  ) {
    super(`Prediction failed: unknown ${feature} '${value}'`, 400, { feature, value });
  }
}

export class ModelUnavailableError extends AppError {
  constructor(model: string) {
    super(`Model '${model}' is not loaded`, 503);
  }
}

export class ModelFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ModelFormatError';
  }
}
