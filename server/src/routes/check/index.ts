import { Router } from 'express';
import { MonitorView } from '../types';
import { postCheck } from './post';

export function createCheckRouter(monitor: MonitorView): Router {
  const router = Router();

  router.post('/', postCheck(monitor));

  return router;
}
