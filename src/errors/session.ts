import { LineseekError } from './base.js';
import type { SessionState } from '../types/session.types.js';

export class SessionStateError extends LineseekError {
  constructor(
    message: string,
    public readonly state: SessionState,
  ) {
    super(message, 'SESSION_STATE_ERROR');
  }
}
