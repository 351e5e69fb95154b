export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational: boolean = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class ServiceError extends Error {
  constructor(
    public service: string,
    public operation: string,
    public originalError: Error,
    public retryable: boolean = true
  ) {
    super(`${service}.${operation} failed: ${originalError.message}`);
    Object.setPrototypeOf(this, ServiceError.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(400, message, true);
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Free text could not be turned into a date/time. Carries example phrases the
 * caller can show back to the client.
 */
export class UnresolvedError extends AppError {
  constructor(
    public originalInput: string,
    public referenceDateContext: string,
    public suggestions: string[]
  ) {
    super(
      422,
      `Sorry, I couldn't understand the date or time "${originalInput}", could you try something like "${suggestions[0] ?? 'tomorrow at 2pm'}"?`,
      true
    );
    Object.setPrototypeOf(this, UnresolvedError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(public lookup: string) {
    super(404, "Sorry, I couldn't find a booking with those details, please check them and try again.", true);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class InsufficientIdentifierError extends AppError {
  constructor() {
    super(
      400,
      'Sorry, I need either your booking ID or the phone number, date and time of the booking to cancel it.',
      true
    );
    Object.setPrototypeOf(this, InsufficientIdentifierError.prototype);
  }
}

export type CalendarFailureKind = 'transport' | 'auth';

export class CalendarBackendError extends ServiceError {
  constructor(
    operation: string,
    originalError: Error,
    public kind: CalendarFailureKind = 'transport'
  ) {
    super('GoogleCalendar', operation, originalError, kind === 'transport');
    Object.setPrototypeOf(this, CalendarBackendError.prototype);
  }
}

export type DeliveryFailureKind = 'network' | 'rejected' | 'unavailable';

export class DeliveryError extends AppError {
  constructor(
    public provider: string,
    public kind: DeliveryFailureKind,
    public originalError: Error
  ) {
    super(502, `Message delivery error: ${provider} (${kind})`, true);
    Object.setPrototypeOf(this, DeliveryError.prototype);
  }
}

export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}

export function errorMessage(value: unknown): string {
  return toError(value).message;
}
