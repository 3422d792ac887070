import { Router, Request, Response } from 'express';
import { jobDefinitionSchema } from '../jobs/definitions';
import type { JobManager } from '../jobs/manager';
import { isJobFinished, Job, Task } from '../types';

function serializeTask(task: Task, withOutput: boolean) {
  return {
    task_order: task.taskOrder,
    task_type: task.kind,
    task_name: task.name,
    status: task.status,
    return_code: task.returnCode,
    error: task.error,
    started_at: task.startedAt,
    completed_at: task.completedAt,
    ...(withOutput ? { parameters: task.parameters, output: task.outputLines } : {}),
  };
}

export function serializeJob(job: Job, withOutput = false) {
  return {
    id: job.id,
    job_type: job.jobType,
    type: job.operation,
    status: job.status,
    repository_id: job.repositoryId,
    total_tasks: job.totalTasks,
    completed_tasks: job.completedTasks,
    current_task_index: job.currentTaskIndex,
    started_at: job.startedAt,
    finished_at: job.finishedAt,
    error: job.error,
    tasks: job.tasks.map((task) => serializeTask(task, withOutput)),
  };
}

function jobIdParam(req: Request): string {
  return Array.isArray(req.params.id) ? req.params.id[0] : req.params.id;
}

export function createJobsRouter(manager: JobManager, apiToken: string): Router {
  const router = Router();

  const authorized = (req: Request, res: Response): boolean => {
    const authHeader = req.headers.authorization;
    if (!authHeader || authHeader !== `Bearer ${apiToken}`) {
      res.status(401).json({ error: 'Unauthorized' });
      return false;
    }
    return true;
  };

  // POST /jobs: submit a job definition
  router.post('/jobs', async (req: Request, res: Response) => {
    if (!authorized(req, res)) return;

    const parsed = jobDefinitionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: 'Validation failed', details: parsed.error.issues });
      return;
    }

    const job = manager.submit(parsed.data);
    res.status(201).json({ job_id: job.id, status: job.status });
  });

  router.get('/jobs', async (_req: Request, res: Response) => {
    res.json({ jobs: manager.listJobs().map((job) => serializeJob(job)) });
  });

  router.get('/jobs/:id', async (req: Request, res: Response) => {
    const id = jobIdParam(req);
    const job = manager.getJob(id);
    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    res.json({ ...serializeJob(job, true), progress: manager.progress(id) });
  });

  router.post('/jobs/:id/cancel', async (req: Request, res: Response) => {
    if (!authorized(req, res)) return;

    const id = jobIdParam(req);
    const job = manager.getJob(id);
    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }
    if (isJobFinished(job.status) || !manager.cancel(id)) {
      res.status(409).json({ error: `Job already ${job.status}` });
      return;
    }
    res.status(202).json({ job_id: id, status: 'cancelling' });
  });

  router.get('/queue', async (_req: Request, res: Response) => {
    res.json(manager.queueStats());
  });

  return router;
}
