import type { AppConfig } from '../types/config.types.js';
import { LineseekError } from '../errors/base.js';

export class ConfigValidationError extends LineseekError {
  constructor(message: string) {
    super(message, 'CONFIG_VALIDATION_ERROR');
  }
}

export function validateConfig(config: AppConfig): void {
  if (!config.search.findCommand.includes('{dir}')) {
    throw new ConfigValidationError('search.findCommand must contain the {dir} placeholder.');
  }
  if (!config.search.grepCommand.includes('{dir}')) {
    throw new ConfigValidationError('search.grepCommand must contain the {dir} placeholder.');
  }

  if (config.worker.command.trim() === '') {
    throw new ConfigValidationError('worker.command must not be empty.');
  }

  if (!Number.isInteger(config.worker.maxCandidates) || config.worker.maxCandidates < 1) {
    throw new ConfigValidationError('worker.maxCandidates must be an integer >= 1.');
  }

  if (!Number.isInteger(config.worker.chunkSize) || config.worker.chunkSize < 16) {
    throw new ConfigValidationError(
      `worker.chunkSize must be an integer of at least 16, got ${config.worker.chunkSize}.`,
    );
  }

  if (!Number.isInteger(config.session.requestTimeoutMs) || config.session.requestTimeoutMs < 0) {
    throw new ConfigValidationError('session.requestTimeoutMs must be an integer >= 0 (0 disables it).');
  }

  if (!Number.isInteger(config.picker.limit) || config.picker.limit < 1) {
    throw new ConfigValidationError('picker.limit must be an integer >= 1.');
  }
}
