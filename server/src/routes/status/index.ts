import { Router } from 'express';
import { MonitorView, SubscriberCount } from '../types';
import { getStatus } from './get';

export function createStatusRouter(monitor: MonitorView, subscribers: SubscriberCount): Router {
  const router = Router();

  router.get('/', getStatus(monitor, subscribers));

  return router;
}
