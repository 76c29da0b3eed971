import type { Response } from 'express';
import type { SuccessEnvelope } from '@crm/shared';

interface SendOptions<M> {
  status?: number;
  meta?: M;
  message?: string;
}

export function send_success<T, M = Record<string, unknown>>(
  res: Response,
  data: T,
  options: SendOptions<M> = {}
): void {
  const body: SuccessEnvelope<T, M> = {
    status: 'success',
    timestamp: new Date().toISOString(),
    data,
  };

  if (options.meta !== undefined) {
    body.meta = options.meta;
  }
  if (options.message !== undefined) {
    body.message = options.message;
  }

  res.status(options.status ?? 200).json(body);
}
