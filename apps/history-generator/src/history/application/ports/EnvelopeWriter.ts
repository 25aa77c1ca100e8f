import { ResponseEnvelope } from '@history/domain/ResponseEnvelope';

export interface WriteOptions {
  pretty: boolean;
}

export interface EnvelopeWriter {
  write<T>(envelope: ResponseEnvelope<T>, destination: string, options: WriteOptions): Promise<void>;
}

export class EnvelopeWriteError extends Error {
  constructor(
    readonly destination: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${destination}: ${reason}`, { cause });
    this.name = 'EnvelopeWriteError';
  }
}
