import { writeFile } from 'fs/promises';
import { Logger } from '@shared/ports/Logger';
import { ResponseEnvelope } from '@history/domain/ResponseEnvelope';
import {
  EnvelopeWriter,
  EnvelopeWriteError,
  WriteOptions,
} from '@history/application/ports/EnvelopeWriter';

export function serializeEnvelope<T>(envelope: ResponseEnvelope<T>, pretty: boolean): string {
  return pretty ? JSON.stringify(envelope, null, 2) : JSON.stringify(envelope);
}

/**
 * Writes one envelope per file. Parent directories are not created and a
 * failed write is not retried.
 */
export class JsonFileEnvelopeWriter implements EnvelopeWriter {
  constructor(private readonly logger: Logger) {}

  async write<T>(
    envelope: ResponseEnvelope<T>,
    destination: string,
    options: WriteOptions,
  ): Promise<void> {
    const text = serializeEnvelope(envelope, options.pretty);

    try {
      await writeFile(destination, text, 'utf8');
    } catch (err) {
      throw new EnvelopeWriteError(destination, err);
    }

    this.logger.info('Saved mock data', {
      destination,
      bytes: Buffer.byteLength(text, 'utf8'),
      pretty: options.pretty,
    });
  }
}
