import { LineseekError } from './base.js';

export class ProtocolError extends LineseekError {
  constructor(message: string, cause?: unknown) {
    super(message, 'PROTOCOL_ERROR', cause);
  }
}
