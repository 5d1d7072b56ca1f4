import type { Response } from 'express';

export function json(res: Response, data: unknown, status = 200) {
  res.status(status).type('application/json').send(JSON.stringify(data));
}
