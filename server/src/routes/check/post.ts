import { Request, Response } from 'express';
import { asyncHandler } from '../../utils/errors';
import { MonitorView } from '../types';

/**
 * Poll every location now. The result is returned to the caller only; the
 * scheduled monitor state is not touched.
 */
export function postCheck(monitor: MonitorView) {
  return asyncHandler(async (_req: Request, res: Response) => {
    const result = await monitor.checkNow();
    res.json(result);
  });
}
