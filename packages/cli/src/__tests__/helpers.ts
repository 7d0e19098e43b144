import type { Logger } from '@queens/core';

export interface CapturedLogger {
  logger: Logger;
  info: string[];
  errors: string[];
}

export function captureLogger(): CapturedLogger {
  const info: string[] = [];
  const errors: string[] = [];
  return {
    logger: {
      info: message => info.push(message),
      error: message => errors.push(message),
    },
    info,
    errors,
  };
}
