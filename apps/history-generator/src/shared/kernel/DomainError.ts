export class DomainError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class InvalidCrashPointError extends DomainError {}
export class InvalidTimeWindowError extends DomainError {}
export class InvalidSamplerRangeError extends DomainError {}
