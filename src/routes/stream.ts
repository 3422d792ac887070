import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { JobManager } from '../jobs/manager';

const streamQuery = z.object({
  task: z.coerce.number().int().min(0).optional(),
});

export function createStreamRouter(manager: JobManager): Router {
  const router = Router();

  // GET /jobs/:id/stream: Server-Sent Events, optionally scoped to one task
  router.get('/jobs/:id/stream', async (req: Request, res: Response) => {
    const parsed = streamQuery.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation failed', details: parsed.error.issues });
      return;
    }

    const id = Array.isArray(req.params.id) ? req.params.id[0] : req.params.id;
    if (!manager.getJob(id)) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    const disconnected = new AbortController();
    res.on('close', () => disconnected.abort());

    for await (const message of manager.stream(id, parsed.data.task, disconnected.signal)) {
      res.write(`data: ${JSON.stringify(message)}\n\n`);
    }
    res.end();
  });

  // GET /events: every job's events, recent history first
  router.get('/events', async (_req: Request, res: Response) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    const disconnected = new AbortController();
    res.on('close', () => disconnected.abort());

    for await (const event of manager.streamAll(disconnected.signal)) {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    }
    res.end();
  });

  return router;
}
